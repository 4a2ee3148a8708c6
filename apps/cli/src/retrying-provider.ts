import type { EmbeddingPurpose, EmbeddingResult } from "@docsage/types";
import type { IEmbeddingProvider } from "@docsage/embeddings";
import { withRetry, type RetryOptions } from "@docsage/errors";

/** Only the provider's transient-failure error is worth paying for again. */
const RETRYABLE_CODES = ["SERVICE_UNAVAILABLE"];

/**
 * Wraps a provider so transient failures (`ServiceUnavailableError`) are
 * retried with backoff. Authentication errors, client errors and anything
 * outside the error hierarchy fail on the first try.
 */
export class RetryingEmbeddingProvider implements IEmbeddingProvider {
  private readonly inner: IEmbeddingProvider;
  private readonly retry: RetryOptions;

  constructor(inner: IEmbeddingProvider, retry: RetryOptions = {}) {
    this.inner = inner;
    this.retry = { retryableErrors: RETRYABLE_CODES, ...retry };
  }

  get name(): string {
    return this.inner.name;
  }

  get model(): string {
    return this.inner.model;
  }

  get dimensions(): number {
    return this.inner.dimensions;
  }

  embed(texts: string[], purpose?: EmbeddingPurpose): Promise<EmbeddingResult> {
    return withRetry(() => this.inner.embed(texts, purpose), this.retry);
  }
}
