import { CohereClient } from "cohere-ai";
import { AuthenticationError, ServiceUnavailableError } from "@docsage/errors";
import type { EmbeddingPurpose, EmbeddingResult, IUsageRecorder } from "@docsage/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { toProviderError } from "./provider-errors.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1024;
const BATCH_SIZE = 96; // Cohere limit

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
}

/**
 * The slice of the Cohere v2 client this provider calls.
 */
export interface CohereEmbedApi {
  embed(request: {
    texts: string[];
    model: string;
    inputType: "search_document" | "search_query";
    embeddingTypes: Array<"float">;
  }): Promise<{
    embeddings: { float?: number[][] };
    meta?: { billedUnits?: { inputTokens?: number } };
  }>;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly model: string;
  readonly dimensions: number;
  private readonly apiKey: string;
  private readonly recorder: IUsageRecorder;
  private api: CohereEmbedApi | undefined;

  constructor(config: CohereProviderConfig, recorder: IUsageRecorder, api?: CohereEmbedApi) {
    this.apiKey = config.apiKey;
    this.recorder = recorder;
    this.api = api;
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(texts: string[], purpose: EmbeddingPurpose = "document"): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    if (texts.length === 0) {
      return { embeddings: [], model: this.model, tokensUsed: 0, dimensions: this.dimensions };
    }

    const api = this.getApi();

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      let response: Awaited<ReturnType<CohereEmbedApi["embed"]>>;
      try {
        response = await api.embed({
          texts: batch,
          model: this.model,
          inputType: purpose === "query" ? "search_query" : "search_document",
          embeddingTypes: ["float"],
        });
      } catch (error: unknown) {
        throw toProviderError(error, this.name);
      }

      // Use billed input tokens from the response for cost accuracy
      const tokens = response.meta?.billedUnits?.inputTokens ?? 0;
      await this.recorder.record({
        model: this.model,
        inputTokens: tokens,
        itemCount: batch.length,
        description: `Embed ${String(batch.length)} ${purpose === "query" ? "query" : "chunks"} for document search`,
      });
      totalTokens += tokens;

      const vectors = response.embeddings.float ?? [];
      if (vectors.length !== batch.length) {
        throw new ServiceUnavailableError(
          `cohere returned ${String(vectors.length)} embeddings for ${String(batch.length)} inputs`,
          this.name,
        );
      }
      allEmbeddings.push(...vectors);
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }

  private getApi(): CohereEmbedApi {
    if (this.api) return this.api;

    if (!this.apiKey) {
      throw new AuthenticationError("COHERE_API_KEY is not set", this.name);
    }

    this.api = new CohereClient({ token: this.apiKey }).v2;
    return this.api;
  }
}
