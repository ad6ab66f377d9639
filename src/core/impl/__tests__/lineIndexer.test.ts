import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  AvlWordIndex,
  InvalidArgumentError,
  LineIndexer,
  SpaceTokenizer,
  formatEntry,
  formatIndex,
  splitLines,
} from "../../index.js";

function makeIndexer(): LineIndexer {
  return new LineIndexer({ tokenizer: new SpaceTokenizer(), index: new AvlWordIndex() });
}

describe("splitLines", () => {
  it("behaves like a line reader", () => {
    expect(splitLines("")).toEqual([]);
    expect(splitLines("a\r\nb\n")).toEqual(["a", "b"]);
    expect(splitLines("a\n\nb")).toEqual(["a", "", "b"]);
    expect(splitLines("alpha\rbeta\n")).toEqual(["alpha", "beta"]);
    expect(splitLines("a\r\rb\r")).toEqual(["a", "", "b"]);
  });
});

describe("LineIndexer", () => {
  it("numbers lines from 1 and normalizes words", () => {
    const indexer = makeIndexer();
    const summary = indexer.indexText("The cat sat.\nthe CAT, the cat!\n\nA dog");

    expect(summary).toEqual({ lines: 4, words: 9 });
    expect(indexer.index.lookup("the")).toEqual([1, 2]);
    expect(indexer.index.lookup("cat")).toEqual([1, 2]);
    expect(indexer.index.lookup("dog")).toEqual([4]);
    expect(indexer.index.lookup("Dog")).toEqual([]);
  });

  it("continues numbering from firstLine", () => {
    const indexer = makeIndexer();
    indexer.indexLines(["alpha beta"], { firstLine: 10 });

    expect(indexer.index.lookup("beta")).toEqual([10]);
    expect(() => indexer.indexLines(["x"], { firstLine: 0 })).toThrow(InvalidArgumentError);
    expect(() => indexer.indexLines(["x"], { firstLine: 2 ** 53 })).toThrow("firstLine must be a positive integer");
    expect(() => indexer.indexLines(["x", "y", "z"], { firstLine: Number.MAX_SAFE_INTEGER - 1 })).toThrow(
      "line numbers would exceed Number.MAX_SAFE_INTEGER",
    );
    expect(indexer.index.has("z")).toBe(false);
  });

  it("numbers lone carriage returns like a file read", () => {
    const indexer = makeIndexer();
    expect(indexer.indexText("alpha\rbeta\n")).toEqual({ lines: 2, words: 2 });
    expect(indexer.index.lookup("beta")).toEqual([2]);
  });

  it("accepts async line sources", async () => {
    async function* source(): AsyncGenerator<string> {
      yield "one two";
      yield "two";
    }
    const indexer = makeIndexer();
    const summary = await indexer.indexLineStream(source());

    expect(summary).toEqual({ lines: 2, words: 3 });
    expect(indexer.index.lookup("two")).toEqual([1, 2]);
  });

  describe("indexFile", () => {
    let dir = "";

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "word-index-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("reads a file line by line", async () => {
      const file = join(dir, "poem.txt");
      await writeFile(file, "Roses are red,\r\nviolets are blue.\n", "utf8");

      const indexer = makeIndexer();
      const summary = await indexer.indexFile(file);

      expect(summary).toEqual({ lines: 2, words: 6 });
      expect(formatIndex(indexer.index)).toBe(
        ["are: [1, 2]", "blue: [2]", "red: [1]", "roses: [1]", "violets: [2]"].join("\n"),
      );
    });

    it("treats a lone carriage return as a line end", async () => {
      const file = join(dir, "old-mac.txt");
      await writeFile(file, "alpha\rbeta\n", "utf8");

      const indexer = makeIndexer();
      expect(await indexer.indexFile(file)).toEqual({ lines: 2, words: 2 });
      expect(indexer.index.lookup("alpha")).toEqual([1]);
      expect(indexer.index.lookup("beta")).toEqual([2]);
    });

    it("rejects when the file is missing", async () => {
      const indexer = makeIndexer();
      await expect(indexer.indexFile(join(dir, "missing.txt"))).rejects.toThrow(/ENOENT/);
      expect(indexer.index.size).toBe(0);
    });
  });
});

describe("report", () => {
  it("formats entries", () => {
    expect(formatEntry("cat", [1, 3])).toBe("cat: [1, 3]");
    expect(formatEntry("zzz", [])).toBe("zzz: []");
    expect(formatIndex(new AvlWordIndex())).toBe("");
  });
});
