import { describe, it, expect, vi } from "vitest";
import type { EmbeddingPurpose } from "@docsage/types";
import { OpenAIEmbeddingProvider, type IEmbeddingProvider } from "@docsage/embeddings";
import { CostTracker, type IUsageLog } from "@docsage/usage";
import { AuthenticationError, ServiceUnavailableError } from "@docsage/errors";
import { RetryingEmbeddingProvider } from "./retrying-provider.js";

function innerProvider() {
  const embed = vi.fn(async (texts: string[], _purpose?: EmbeddingPurpose) => ({
    embeddings: texts.map(() => [1, 0]),
    model: "fake-embed",
    tokensUsed: texts.length,
    dimensions: 2,
  }));
  const provider: IEmbeddingProvider = { name: "fake", model: "fake-embed", dimensions: 2, embed };
  return { provider, embed };
}

describe("RetryingEmbeddingProvider", () => {
  it("exposes the wrapped provider's identity", () => {
    const wrapped = new RetryingEmbeddingProvider(innerProvider().provider);

    expect([wrapped.name, wrapped.model, wrapped.dimensions]).toEqual(["fake", "fake-embed", 2]);
  });

  it("retries transient failures and reports each retry", async () => {
    const { provider, embed } = innerProvider();
    embed.mockRejectedValueOnce(new ServiceUnavailableError("busy", "fake"));
    const onRetry = vi.fn();
    const wrapped = new RetryingEmbeddingProvider(provider, { baseDelayMs: 1, onRetry });

    const result = await wrapped.embed(["a"], "query");

    expect(result.embeddings).toEqual([[1, 0]]);
    expect(embed).toHaveBeenCalledTimes(2);
    expect(embed).toHaveBeenLastCalledWith(["a"], "query");
    expect(onRetry).toHaveBeenCalledTimes(1);
  });

  it("does not retry authentication failures", async () => {
    const { provider, embed } = innerProvider();
    embed.mockRejectedValue(new AuthenticationError("No API key", "fake"));
    const wrapped = new RetryingEmbeddingProvider(provider, { baseDelayMs: 1 });

    await expect(wrapped.embed(["a"])).rejects.toBeInstanceOf(AuthenticationError);
    expect(embed).toHaveBeenCalledTimes(1);
  });

  it("does not retry errors from outside the error hierarchy", async () => {
    const { provider, embed } = innerProvider();
    embed.mockRejectedValue(new SyntaxError("Unexpected token"));
    const wrapped = new RetryingEmbeddingProvider(provider, { baseDelayMs: 1 });

    await expect(wrapped.embed(["a"])).rejects.toBeInstanceOf(SyntaxError);
    expect(embed).toHaveBeenCalledTimes(1);
  });

  it("returns vectors from a single paid call when the usage log cannot be written", async () => {
    const api = {
      create: vi.fn(async (body: { input: string[] }) => ({
        data: body.input.map((_, index) => ({ embedding: [1, 0], index })),
        usage: { prompt_tokens: 2, total_tokens: 2 },
      })),
    };
    const brokenLog: IUsageLog = {
      readAll: async () => [],
      append: async () => {
        throw new SyntaxError("Expected property name in JSON");
      },
    };
    const tracker = new CostTracker({ log: brokenLog });
    const wrapped = new RetryingEmbeddingProvider(
      new OpenAIEmbeddingProvider({ apiKey: "test-key" }, tracker, api),
      { baseDelayMs: 1 },
    );

    const result = await wrapped.embed(["hello"], "query");

    expect(result.embeddings).toEqual([[1, 0]]);
    expect(api.create).toHaveBeenCalledTimes(1);
    expect(tracker.records.map((r) => r.inputTokens)).toEqual([2]);
  });
});
