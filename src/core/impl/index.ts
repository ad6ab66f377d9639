export { ArrayOccurrenceList } from "./arrayOccurrenceList.js";
export { AvlWordIndex } from "./avlWordIndex.js";
export { normalizeWord } from "./normalize.js";
export { SpaceTokenizer } from "./spaceTokenizer.js";
export { LineIndexer, splitLines, type IndexLinesOptions, type IndexSummary, type LineIndexerDeps, type LineSource } from "./lineIndexer.js";
export { formatEntry, formatIndex } from "./report.js";
