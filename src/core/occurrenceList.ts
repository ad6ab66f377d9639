import type { LineNumber } from "./types.js";

/**
 * Append-only record of the lines a word was seen on, in insertion order.
 *
 * Duplicate suppression is up to the caller (check `contains` before `append`).
 */
export interface OccurrenceList {
  readonly size: number;
  append(line: LineNumber): void;
  contains(line: LineNumber): boolean;
  /** Copy of the lines; mutating it does not touch the list. */
  toArray(): LineNumber[];
}
