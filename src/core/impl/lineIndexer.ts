import { open } from "node:fs/promises";

import type { LineNumber } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";
import type { WordIndex } from "../wordIndex.js";
import { InvalidArgumentError } from "../errors.js";

export interface IndexLinesOptions {
  /** number given to the first line; defaults to 1 */
  firstLine?: LineNumber;
}

export interface IndexSummary {
  /** lines consumed */
  lines: number;
  /** words inserted, repeats included */
  words: number;
}

export interface LineIndexerDeps {
  tokenizer: Tokenizer;
  index: WordIndex;
}

/** Lines handed to the indexer, in order. */
export type LineSource = Iterable<string> | AsyncIterable<string>;

/** `count`, when known, is checked so the whole run keeps exact line numbers. */
function firstLineOf(options?: IndexLinesOptions, count = 1): LineNumber {
  const firstLine = options?.firstLine ?? 1;
  if (!Number.isSafeInteger(firstLine) || firstLine < 1) {
    throw new InvalidArgumentError("firstLine must be a positive integer", "firstLine");
  }
  if (count > 0 && firstLine > Number.MAX_SAFE_INTEGER - (count - 1)) {
    throw new InvalidArgumentError("line numbers would exceed Number.MAX_SAFE_INTEGER", "firstLine");
  }
  return firstLine;
}

const LINE_END = /\r\n|\r|\n/;

/**
 * Splits text the way a line reader would: on "\n", "\r\n" or a lone "\r",
 * not counting an empty piece after a final line end.
 */
export function splitLines(text: string): string[] {
  if (!text.length) return [];
  const lines = text.split(LINE_END);
  if (text.endsWith("\n") || text.endsWith("\r")) lines.pop();
  return lines;
}

/**
 * Feeds (word, line) pairs into a word index. Lines are numbered from 1
 * unless `firstLine` says otherwise.
 */
export class LineIndexer {
  constructor(private readonly deps: LineIndexerDeps) {}

  get index(): WordIndex {
    return this.deps.index;
  }

  /** Returns the number of words inserted for this line. */
  indexLine(line: string, lineNumber: LineNumber): number {
    let words = 0;
    for (const tok of this.deps.tokenizer.tokenize(line)) {
      this.deps.index.insert(tok.word, lineNumber);
      words++;
    }
    return words;
  }

  indexLines(lines: Iterable<string>, options?: IndexLinesOptions): IndexSummary {
    let lineNumber = firstLineOf(options, Array.isArray(lines) ? lines.length : 1);
    const summary: IndexSummary = { lines: 0, words: 0 };

    for (const line of lines) {
      summary.words += this.indexLine(line, lineNumber++);
      summary.lines++;
    }
    return summary;
  }

  indexText(text: string, options?: IndexLinesOptions): IndexSummary {
    return this.indexLines(splitLines(text), options);
  }

  async indexLineStream(lines: LineSource, options?: IndexLinesOptions): Promise<IndexSummary> {
    let lineNumber = firstLineOf(options);
    const summary: IndexSummary = { lines: 0, words: 0 };

    for await (const line of lines) {
      summary.words += this.indexLine(line, lineNumber++);
      summary.lines++;
    }
    return summary;
  }

  /**
   * Reads a UTF-8 file line by line. Rejects if the file cannot be opened or read;
   * lines indexed before a read failure stay in the index.
   */
  async indexFile(path: string, options?: IndexLinesOptions): Promise<IndexSummary> {
    const file = await open(path, "r");
    try {
      return await this.indexLineStream(file.readLines({ encoding: "utf8" }), options);
    } finally {
      await file.close();
    }
  }
}
