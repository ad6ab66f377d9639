import type { Token } from "./types.js";

export interface TokenizeOptions {
  /** If false, yield raw pieces as-is (no trimming, case folding or punctuation removal). */
  normalize?: boolean;
}

/**
 * Turns one line of text into the words to index.
 *
 * Contract notes:
 * - should be deterministic for given input+options
 * - never yields an empty word
 */
export interface Tokenizer {
  tokenize(line: string, options?: TokenizeOptions): Iterable<Token>;
}
