import type { IndexEntry, IndexStats, LineNumber, Word } from "./types.js";

export interface EntriesOptions {
  /** Start strictly after this word (for paging). */
  after?: Word;
}

/**
 * Word -> line-occurrence index with exact-match lookup.
 *
 * Contract notes:
 * - `insert` rejects an empty word or a non-positive line number without mutating anything
 * - a (word, line) pair inserted twice is recorded once
 * - `lookup` of an unknown word returns an empty array
 * - `entries()` yields words in ascending order and may be restarted at any time
 */
export interface WordIndex extends Iterable<IndexEntry> {
  readonly size: number;

  insert(word: Word, line: LineNumber): void;
  lookup(word: Word): LineNumber[];
  has(word: Word): boolean;

  entries(options?: EntriesOptions): IterableIterator<IndexEntry>;

  height(): number;
  /** Re-checks ordering, balance and cached heights over the whole structure. */
  isBalanced(): boolean;
  stats(): IndexStats;
}
