import type { ChunkResult, ChunkingConfig } from "@docsage/types";

export interface IChunker {
  readonly strategy: string;
  chunk(content: string, config: ChunkingConfig): ChunkResult[];
}
