import { parseArgs } from "node:util";

import { AvlWordIndex, LineIndexer, SpaceTokenizer, formatEntry, formatIndex, normalizeWord } from "../core/index.js";

export const USAGE = "usage: word-index <file> [--lookup <word>]... [--quiet]";

/** Where the CLI writes; `console` fits. */
export interface CliOutput {
  log(message: string): void;
  error(message: string): void;
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      lookup: { type: "string", short: "l", multiple: true },
      quiet: { type: "boolean", short: "q", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });
}

function message(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/** Runs the CLI and resolves to the process exit code. */
export async function runCli(argv: string[], out: CliOutput = console): Promise<number> {
  let args: ReturnType<typeof parseCliArgs>;
  try {
    args = parseCliArgs(argv);
  } catch (e) {
    out.error(message(e));
    out.error(USAGE);
    return 1;
  }

  const { values, positionals } = args;
  if (values.help) {
    out.log(USAGE);
    return 0;
  }

  const [file, ...extra] = positionals;
  if (file === undefined || extra.length) {
    out.error(USAGE);
    return 1;
  }

  const lookups = (values.lookup ?? []).map((raw) => ({ raw, word: normalizeWord(raw) }));
  const empty = lookups.find((l) => !l.word.length);
  if (empty) {
    out.error(`cannot look up "${empty.raw}": word is empty after normalization`);
    return 1;
  }

  const indexer = new LineIndexer({ tokenizer: new SpaceTokenizer(), index: new AvlWordIndex() });

  if (!values.quiet) out.log(`Constructing index from file: ${file}`);
  try {
    await indexer.indexFile(file);
  } catch (e) {
    out.error(`cannot read ${file}: ${message(e)}`);
    return 1;
  }
  if (!values.quiet) {
    out.log("File successfully read.");
    out.log("");
  }

  if (!lookups.length) {
    const dump = formatIndex(indexer.index);
    if (dump.length) out.log(dump);
    return 0;
  }

  for (const { word } of lookups) {
    out.log(formatEntry(word, indexer.index.lookup(word)));
  }
  return 0;
}
