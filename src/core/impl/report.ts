import type { IndexEntry, LineNumber, Word } from "../types.js";

export function formatEntry(word: Word, lines: readonly LineNumber[]): string {
  return `${word}: [${lines.join(", ")}]`;
}

/** One `word: [lines]` row per entry, in iteration order. */
export function formatIndex(entries: Iterable<IndexEntry>): string {
  const rows: string[] = [];
  for (const e of entries) rows.push(formatEntry(e.word, e.lines));
  return rows.join("\n");
}
