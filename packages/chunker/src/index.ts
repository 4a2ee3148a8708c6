export type { IChunker } from "./chunker.interface.js";
export { SentenceChunker, splitSentences } from "./sentence-chunker.js";
