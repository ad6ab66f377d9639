export type { Word, LineNumber, Token, IndexEntry, IndexStats } from "./types.js";
export type { OccurrenceList } from "./occurrenceList.js";
export type { EntriesOptions, WordIndex } from "./wordIndex.js";
export type { TokenizeOptions, Tokenizer } from "./tokenizer.js";
export { InvalidArgumentError } from "./errors.js";
export * from "./impl/index.js";
