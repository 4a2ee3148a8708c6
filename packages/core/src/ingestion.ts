import type { ChunkResult, ChunkingConfig } from "@docsage/types";
import type { IChunker } from "@docsage/chunker";
import { loadFile, normalizeText, type ILoader } from "@docsage/parser";

export interface IngestionDependencies {
  chunker: IChunker;
  chunking: ChunkingConfig;
  loaders?: readonly ILoader[];
}

export interface PreparedDocument {
  path: string;
  sourceName: string;
  pageCount: number;
  chunks: ChunkResult[];
}

/**
 * Load -> normalize -> chunk for one file. Embedding happens once for the
 * whole batch, in the retrieval service.
 */
export async function prepareDocument(
  path: string,
  deps: IngestionDependencies,
): Promise<PreparedDocument> {
  const document = await loadFile(path, deps.loaders);

  const text = normalizeText(document.text);
  const chunks = deps.chunker.chunk(text, deps.chunking);

  return {
    path,
    sourceName: document.sourceName,
    pageCount: document.pageCount,
    chunks,
  };
}
