export interface ChunkingConfig {
  /** Upper bound on a chunk's summed sentence length, in characters; joining spaces are not counted. */
  maxChars: number;
  /** Budget for the summed length of the trailing sentences carried into the next chunk. */
  overlapChars: number;
}

export interface ChunkResult {
  content: string;
  index: number;
  charCount: number;
  metadata: ChunkMetadata;
}

export interface ChunkMetadata {
  /** Index of the first sentence in the chunk, counted over the split input. */
  firstSentence: number;
  lastSentence: number;
  /** How many leading sentences were carried over from the previous chunk. */
  overlapSentences: number;
}

/**
 * A chunk held by the retrieval service. `position` aligns 1:1 with the
 * embedding stored at the same slot of the vector index.
 */
export interface Chunk {
  text: string;
  sourceName: string;
  position: number;
}
