import type { EmbeddingPurpose, EmbeddingResult } from "@docsage/types";

export interface IEmbeddingProvider {
  readonly name: string;
  readonly model: string;
  readonly dimensions: number;

  /**
   * One vector per input text, in input order. An empty input resolves to
   * an empty result without contacting the service.
   */
  embed(texts: string[], purpose?: EmbeddingPurpose): Promise<EmbeddingResult>;
}
