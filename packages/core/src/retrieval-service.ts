import type {
  Chunk,
  ChunkingConfig,
  LoadFailure,
  LoadOptions,
  LoadReport,
  LoadedSource,
  SearchHit,
} from "@docsage/types";
import { SentenceChunker, type IChunker } from "@docsage/chunker";
import type { IEmbeddingProvider } from "@docsage/embeddings";
import { FlatL2Index, type IVectorIndex } from "@docsage/vector-store";
import { partitionSupported, type ILoader } from "@docsage/parser";
import {
  AppError,
  EmptyIndexError,
  ServiceUnavailableError,
  ValidationError,
} from "@docsage/errors";
import { createSilentLogger, type Logger } from "@docsage/logger";
import { prepareDocument, type PreparedDocument } from "./ingestion.js";
import { excerpt, formatSearchResults } from "./result-formatter.js";

export const NO_DOCUMENTS_MESSAGE = "No documents loaded. Please upload documents first.";

const DEFAULT_TOP_K = 3;
const DEFAULT_EXCERPT_CHARS = 300;

export interface RetrievalServiceDependencies {
  embeddingProvider: IEmbeddingProvider;
  chunking: ChunkingConfig;
  chunker?: IChunker;
  loaders?: readonly ILoader[];
  createIndex?: () => IVectorIndex;
  logger?: Logger;
  excerptChars?: number;
}

interface Corpus {
  chunks: Chunk[];
  index: IVectorIndex;
}

/**
 * Owns the load -> chunk -> embed -> index pipeline for one corpus and
 * answers nearest-chunk queries against it.
 *
 * Not safe for overlapping calls: callers serialise `loadDocuments` and
 * `search` themselves.
 */
export class DocumentRetrievalService {
  private readonly embeddingProvider: IEmbeddingProvider;
  private readonly chunking: ChunkingConfig;
  private readonly chunker: IChunker;
  private readonly loaders?: readonly ILoader[];
  private readonly createIndex: () => IVectorIndex;
  private readonly logger: Logger;
  private readonly excerptChars: number;
  private corpus: Corpus | null = null;

  constructor(deps: RetrievalServiceDependencies) {
    this.embeddingProvider = deps.embeddingProvider;
    this.chunking = deps.chunking;
    this.chunker = deps.chunker ?? new SentenceChunker();
    this.loaders = deps.loaders;
    this.createIndex = deps.createIndex ?? (() => new FlatL2Index());
    this.logger = deps.logger ?? createSilentLogger();
    this.excerptChars = deps.excerptChars ?? DEFAULT_EXCERPT_CHARS;
  }

  get chunkCount(): number {
    return this.corpus?.chunks.length ?? 0;
  }

  /** Distinct source names in load order. */
  get sources(): string[] {
    return [...new Set(this.corpus?.chunks.map((c) => c.sourceName) ?? [])];
  }

  /**
   * Replace the corpus with the given files. The previous corpus stays live
   * until the new index is fully built; a load that yields no chunks leaves
   * the service empty.
   */
  async loadDocuments(paths: readonly string[], options?: LoadOptions): Promise<LoadReport> {
    const onError = options?.onError ?? "abort";
    const failures: LoadFailure[] = [];

    // Extension check for the whole batch before any file is read.
    const { supported, rejected } = partitionSupported(paths, this.loaders);
    for (const { path, error } of rejected) {
      failures.push(this.reportFailure(path, error));
      if (onError === "abort") throw error;
    }

    const chunks: Chunk[] = [];
    const documents: LoadedSource[] = [];

    for (const path of supported) {
      let prepared: PreparedDocument;
      try {
        prepared = await prepareDocument(path, {
          chunker: this.chunker,
          chunking: this.chunking,
          loaders: this.loaders,
        });
      } catch (error: unknown) {
        failures.push(this.reportFailure(path, error));
        if (onError === "abort") throw error;
        continue;
      }

      for (const chunk of prepared.chunks) {
        chunks.push({ text: chunk.content, sourceName: prepared.sourceName, position: chunks.length });
      }
      documents.push({ sourceName: prepared.sourceName, chunkCount: prepared.chunks.length });
      this.logger.info(
        { source: prepared.sourceName, pages: prepared.pageCount, chunks: prepared.chunks.length },
        "Loaded document",
      );
    }

    const report: LoadReport = { documents, failures, chunkCount: chunks.length };

    if (chunks.length === 0) {
      this.corpus = null;
      this.logger.warn({ files: paths.length }, "No chunks created from documents");
      return report;
    }

    const result = await this.embeddingProvider.embed(
      chunks.map((c) => c.text),
      "document",
    );
    if (result.embeddings.length !== chunks.length) {
      throw new ServiceUnavailableError(
        `Expected ${String(chunks.length)} embeddings, received ${String(result.embeddings.length)}`,
        this.embeddingProvider.name,
      );
    }

    const index = this.createIndex();
    index.build(result.embeddings);
    this.corpus = { chunks, index };

    this.logger.info(
      { vectors: index.size, dimensions: index.dimensions, tokensUsed: result.tokensUsed },
      "Vector index ready",
    );

    return report;
  }

  /**
   * Formatted best-first listing for `query`, or {@link NO_DOCUMENTS_MESSAGE}
   * when nothing is loaded.
   */
  async search(query: string, k = DEFAULT_TOP_K): Promise<string> {
    try {
      return formatSearchResults(await this.searchChunks(query, k));
    } catch (error: unknown) {
      if (error instanceof EmptyIndexError) {
        return NO_DOCUMENTS_MESSAGE;
      }
      throw error;
    }
  }

  async searchChunks(query: string, k = DEFAULT_TOP_K): Promise<SearchHit[]> {
    if (!Number.isInteger(k) || k <= 0) {
      throw new ValidationError("k must be a positive integer", { k: String(k) });
    }

    const corpus = this.corpus;
    if (!corpus || corpus.index.size === 0) {
      throw new EmptyIndexError("No documents loaded");
    }

    const { embeddings } = await this.embeddingProvider.embed([query], "query");
    const vector = embeddings[0];
    if (!vector) {
      throw new ServiceUnavailableError(
        "No embedding returned for the query",
        this.embeddingProvider.name,
      );
    }

    return corpus.index.query(vector, k).map((match, i) => {
      const chunk = corpus.chunks[match.position];
      if (!chunk) {
        throw new Error(`Index position ${String(match.position)} has no chunk`);
      }
      return {
        rank: i + 1,
        distance: match.distance,
        sourceName: chunk.sourceName,
        excerpt: excerpt(chunk.text, this.excerptChars),
        position: match.position,
      };
    });
  }

  private reportFailure(path: string, error: unknown): LoadFailure {
    const failure: LoadFailure = {
      path,
      code: AppError.isAppError(error) ? error.code : errorCode(error),
      message: error instanceof Error ? error.message : String(error),
    };
    this.logger.error({ ...failure, err: error }, "Failed to load document");
    return failure;
  }
}

function errorCode(error: unknown): string {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return "LOAD_FAILED";
}
