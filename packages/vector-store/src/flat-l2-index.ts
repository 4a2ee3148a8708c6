import type { VectorMatch } from "@docsage/types";
import { EmptyIndexError, ValidationError } from "@docsage/errors";
import type { IVectorIndex } from "./vector-store.interface.js";

/**
 * Exact (brute-force) index using squared Euclidean distance over the raw
 * vectors. Vectors are copied into one contiguous Float32Array on build.
 */
export class FlatL2Index implements IVectorIndex {
  private data = new Float32Array(0);
  private count = 0;
  private dims = 0;

  get size(): number {
    return this.count;
  }

  get dimensions(): number {
    return this.dims;
  }

  build(vectors: readonly number[][]): void {
    const dims = vectors[0]?.length ?? 0;

    for (const [position, vector] of vectors.entries()) {
      if (vector.length !== dims || dims === 0) {
        throw new ValidationError("All vectors must share one non-zero dimension", {
          [`vectors[${String(position)}]`]: `expected length ${String(dims)}, got ${String(vector.length)}`,
        });
      }
    }

    const data = new Float32Array(vectors.length * dims);
    vectors.forEach((vector, position) => data.set(vector, position * dims));

    this.data = data;
    this.count = vectors.length;
    this.dims = dims;
  }

  query(vector: readonly number[], k: number): VectorMatch[] {
    if (!Number.isInteger(k) || k <= 0) {
      throw new ValidationError("k must be a positive integer", { k: String(k) });
    }
    if (this.count === 0) {
      throw new EmptyIndexError();
    }
    if (vector.length !== this.dims) {
      throw new ValidationError("Query vector has the wrong dimension", {
        vector: `expected length ${String(this.dims)}, got ${String(vector.length)}`,
      });
    }

    const query = Float32Array.from(vector);
    const matches: VectorMatch[] = [];

    for (let position = 0; position < this.count; position++) {
      const offset = position * this.dims;
      let distance = 0;
      for (let d = 0; d < this.dims; d++) {
        const diff = (this.data[offset + d] ?? 0) - (query[d] ?? 0);
        distance += diff * diff;
      }
      matches.push({ position, distance });
    }

    matches.sort((a, b) => a.distance - b.distance || a.position - b.position);
    return matches.slice(0, k);
  }
}
