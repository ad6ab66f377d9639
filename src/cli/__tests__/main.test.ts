import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { USAGE, runCli, type CliOutput } from "../main.js";

function capture(): CliOutput & { logs: string[]; errors: string[] } {
  const logs: string[] = [];
  const errors: string[] = [];
  return {
    logs,
    errors,
    log: (m) => logs.push(m),
    error: (m) => errors.push(m),
  };
}

describe("runCli", () => {
  let dir = "";
  let file = "";

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "word-index-cli-"));
    file = join(dir, "text.txt");
    await writeFile(file, "One fish, two fish.\nRed fish; blue fish!\n", "utf8");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("prints the whole index with progress lines", async () => {
    const out = capture();
    expect(await runCli([file], out)).toBe(0);

    expect(out.logs).toEqual([
      `Constructing index from file: ${file}`,
      "File successfully read.",
      "",
      ["blue: [2]", "fish: [1, 2]", "one: [1]", "red: [2]", "two: [1]"].join("\n"),
    ]);
    expect(out.errors).toEqual([]);
  });

  it("looks up normalized words quietly", async () => {
    const out = capture();
    expect(await runCli([file, "--quiet", "--lookup", "FISH!", "-l", "cat"], out)).toBe(0);

    expect(out.logs).toEqual(["fish: [1, 2]", "cat: []"]);
  });

  it("refuses a lookup word that normalizes to nothing", async () => {
    const out = capture();
    expect(await runCli([file, "--lookup", "fish", "--lookup=--"], out)).toBe(1);

    expect(out.logs).toEqual([]);
    expect(out.errors).toEqual(['cannot look up "--": word is empty after normalization']);
  });

  it("fails on a missing file", async () => {
    const out = capture();
    const missing = join(dir, "missing.txt");
    expect(await runCli([missing, "-q"], out)).toBe(1);

    expect(out.errors).toHaveLength(1);
    expect(out.errors[0]).toMatch(new RegExp(`^cannot read ${missing.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")}: ENOENT`));
  });

  it("prints usage on bad arguments", async () => {
    const out = capture();
    expect(await runCli([], out)).toBe(1);
    expect(out.errors).toEqual([USAGE]);

    const help = capture();
    expect(await runCli(["--help"], help)).toBe(0);
    expect(help.logs).toEqual([USAGE]);

    const unknown = capture();
    expect(await runCli([file, "--bogus"], unknown)).toBe(1);
    expect(unknown.errors[1]).toBe(USAGE);
  });
});
