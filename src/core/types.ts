/** Shared core types used by module contracts. */

/** A normalized index key (trimmed, lower-cased, punctuation stripped). */
export type Word = string;
/** 1-based line number within the indexed source. */
export type LineNumber = number;

/** A word produced by a tokenizer. */
export interface Token {
  word: Word;
  /** 0-based position among the space-separated pieces of the line. */
  position: number;
  /** Optional character offsets of the raw piece, for highlighting. */
  startOffset?: number;
  endOffset?: number;
}

/** One word of the index together with the lines it occurs on. */
export interface IndexEntry {
  word: Word;
  lines: LineNumber[];
}

export interface IndexStats {
  /** number of distinct words */
  words: number;
  /** height of the tree, -1 when empty */
  height: number;
}
