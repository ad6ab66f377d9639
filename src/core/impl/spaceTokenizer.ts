import type { Token } from "../types.js";
import type { TokenizeOptions, Tokenizer } from "../tokenizer.js";
import { normalizeWord } from "./normalize.js";

const SPACE = 32;

/**
 * Line tokenizer:
 * - splits on the single space character only (tabs stay inside pieces)
 * - normalizes each piece unless told otherwise
 * - skips pieces that end up empty, but still counts them for positions
 */
export class SpaceTokenizer implements Tokenizer {
  *tokenize(line: string, options?: TokenizeOptions): Iterable<Token> {
    const normalize = options?.normalize ?? true;

    const n = line.length;
    let start = 0;
    let position = 0;

    for (let i = 0; i <= n; i++) {
      if (i < n && line.charCodeAt(i) !== SPACE) continue;

      const piece = line.slice(start, i);
      const word = normalize ? normalizeWord(piece) : piece;
      if (word.length) {
        yield { word, position, startOffset: start, endOffset: i };
      }

      position++;
      start = i + 1;
    }
  }
}
