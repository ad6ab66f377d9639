import type { Word } from "../types.js";

/** Punctuation removed from every token. Apostrophes and backslashes are kept. */
const PUNCTUATION = /[!"#$%&()*+,\-./:;<=>?@^_`{|}~[\]]/g;

/**
 * Turns a raw token into an index key: trims surrounding whitespace,
 * lower-cases and strips punctuation. May return an empty string, which
 * callers must not index.
 */
export function normalizeWord(token: string): Word {
  return token.trim().toLowerCase().replace(PUNCTUATION, "");
}
