import {
  AvlWordIndex,
  InvalidArgumentError,
  LineIndexer,
  SpaceTokenizer,
  normalizeWord,
  type IndexEntry,
  type IndexSummary,
  type LineNumber,
  type WordIndex,
} from "../core/index.js";
import { isRecord } from "./validation.js";

export type IngestInput =
  | { lines: string[]; firstLine?: LineNumber }
  | { text: string; firstLine?: LineNumber };

export interface WordLookup {
  word: string;
  normalized: string;
  lines: LineNumber[];
}

export interface ListQuery {
  limit: number;
  /** engine-level cursor token (the last word of the previous page) */
  after?: string;
}

export interface ListResponse {
  entries: IndexEntry[];
  nextCursor: string | null;
}

export interface IndexServiceStats {
  words: number;
  height: number;
  balanced: boolean;
}

export interface IndexService {
  /** Without `firstLine`, numbering continues after the last line indexed so far. */
  ingest(input: IngestInput): IndexSummary;
  /**
   * Numbers the file's lines after those indexed so far. Meant for preloading
   * before the server listens: an `ingest` that lands while the file is still
   * being read would be numbered from the same starting line.
   */
  ingestFile(path: string): Promise<IndexSummary>;
  lookup(word: string): WordLookup;
  list(q: ListQuery): ListResponse;
  stats(): IndexServiceStats;
}

/**
 * HTTP-friendly cursor encoding.
 *
 * The token is the last word of a page, wrapped in JSON so the format can
 * grow without breaking clients.
 */
export function encodeCursor(payload: { token: string }): string {
  return Buffer.from(JSON.stringify(payload), "utf8").toString("base64");
}

export function decodeCursor(cursor: string): { token: string } {
  const raw = Buffer.from(cursor, "base64").toString("utf8");
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed) || typeof parsed.token !== "string" || !parsed.token.length) {
    throw new Error("invalid cursor");
  }
  return { token: parsed.token };
}

export function createInMemoryIndexService(index: WordIndex = new AvlWordIndex()): IndexService {
  const indexer = new LineIndexer({ tokenizer: new SpaceTokenizer(), index });
  let nextLine: LineNumber = 1;

  function advance(firstLine: LineNumber, summary: IndexSummary): IndexSummary {
    nextLine = Math.max(nextLine, firstLine + summary.lines);
    return summary;
  }

  return {
    ingest(input) {
      const firstLine = input.firstLine ?? nextLine;
      const summary =
        "lines" in input
          ? indexer.indexLines(input.lines, { firstLine })
          : indexer.indexText(input.text, { firstLine });
      return advance(firstLine, summary);
    },
    async ingestFile(path) {
      const firstLine = nextLine;
      return advance(firstLine, await indexer.indexFile(path, { firstLine }));
    },
    lookup(word) {
      const normalized = normalizeWord(word);
      if (!normalized.length) {
        throw new InvalidArgumentError("word is empty after normalization", "word");
      }
      return { word, normalized, lines: index.lookup(normalized) };
    },
    list(q) {
      const entries: IndexEntry[] = [];
      let more = false;
      for (const e of index.entries({ after: q.after })) {
        if (entries.length === q.limit) {
          more = true;
          break;
        }
        entries.push(e);
      }

      const last = entries[entries.length - 1];
      return {
        entries,
        nextCursor: more && last ? encodeCursor({ token: last.word }) : null,
      };
    },
    stats() {
      return { ...index.stats(), balanced: index.isBalanced() };
    },
  };
}
