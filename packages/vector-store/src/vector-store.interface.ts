import type { VectorMatch } from "@docsage/types";

/**
 * Nearest-neighbour index over the embeddings of one corpus. Positions are
 * the slots the vectors were given to `build` in.
 */
export interface IVectorIndex {
  readonly size: number;
  /** Vector length, or 0 while empty. */
  readonly dimensions: number;
  /** Replace the whole contents of the index. */
  build(vectors: readonly number[][]): void;
  /** Up to `k` closest vectors, nearest first. */
  query(vector: readonly number[], k: number): VectorMatch[];
}
