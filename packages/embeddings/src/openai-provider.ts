import OpenAI from "openai";
import { AuthenticationError, ServiceUnavailableError } from "@docsage/errors";
import type { EmbeddingPurpose, EmbeddingResult, IUsageRecorder } from "@docsage/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { toProviderError } from "./provider-errors.js";

const DEFAULT_MODEL = "text-embedding-3-small";
const DEFAULT_DIMENSIONS = 1536;
const BATCH_SIZE = 2048; // OpenAI per-request input limit

export interface OpenAIProviderConfig {
  apiKey: string;
  model?: string;
  /** Requested output size; omitted from the request when not set. */
  dimensions?: number;
  baseURL?: string;
  /** SDK-level retries. Default 0: retry policy belongs to the caller. */
  maxRetries?: number;
  timeoutMs?: number;
}

/**
 * The slice of the OpenAI SDK this provider calls.
 */
export interface OpenAIEmbeddingsApi {
  create(body: { model: string; input: string[]; dimensions?: number }): Promise<{
    data: Array<{ embedding: number[]; index: number }>;
    usage: { prompt_tokens: number; total_tokens: number };
  }>;
}

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "openai";
  readonly model: string;
  readonly dimensions: number;
  private readonly config: OpenAIProviderConfig;
  private readonly recorder: IUsageRecorder;
  private api: OpenAIEmbeddingsApi | undefined;

  constructor(config: OpenAIProviderConfig, recorder: IUsageRecorder, api?: OpenAIEmbeddingsApi) {
    this.config = config;
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

      let response: Awaited<ReturnType<OpenAIEmbeddingsApi["create"]>>;
      try {
        response = await api.create({
          model: this.model,
          input: batch,
          ...(this.config.dimensions !== undefined ? { dimensions: this.config.dimensions } : {}),
        });
      } catch (error: unknown) {
        throw toProviderError(error, this.name);
      }

      // Credit the batch before anything else can fail.
      await this.recorder.record({
        model: this.model,
        inputTokens: response.usage.total_tokens,
        itemCount: batch.length,
        description: `Embed ${String(batch.length)} ${purpose === "query" ? "query" : "chunks"} for document search`,
      });
      totalTokens += response.usage.total_tokens;

      if (response.data.length !== batch.length) {
        throw new ServiceUnavailableError(
          `openai returned ${String(response.data.length)} embeddings for ${String(batch.length)} inputs`,
          this.name,
        );
      }

      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      allEmbeddings.push(...ordered.map((d) => d.embedding));
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }

  private getApi(): OpenAIEmbeddingsApi {
    if (this.api) return this.api;

    if (!this.config.apiKey) {
      throw new AuthenticationError("OPENAI_API_KEY is not set", this.name);
    }

    this.api = new OpenAI({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseURL,
      maxRetries: this.config.maxRetries ?? 0,
      timeout: this.config.timeoutMs,
    }).embeddings;
    return this.api;
  }
}
