import { describe, it, expect } from "vitest";
import { parseEnv } from "./env.js";

function makeValidEnv(overrides: Record<string, string> = {}): Record<string, string> {
  return {
    NODE_ENV: "test",
    LOG_LEVEL: "warn",
    EMBEDDING_PROVIDER: "openai",
    OPENAI_API_KEY: "test-openai-key",
    OPENAI_EMBED_MODEL: "text-embedding-3-small",
    COHERE_API_KEY: "test-cohere-key",
    COHERE_EMBED_MODEL: "embed-v4.0",
    CHUNK_MAX_CHARS: "800",
    CHUNK_OVERLAP_CHARS: "100",
    SEARCH_TOP_K: "5",
    SEARCH_EXCERPT_CHARS: "200",
    USAGE_LOG_FILE: "/tmp/usage.json",
    USAGE_BUDGET_USD: "10",
    ...overrides,
  };
}

describe("parseEnv", () => {
  it("parses valid env and returns AppConfig", () => {
    const config = parseEnv(makeValidEnv());

    expect(config).toEqual({
      nodeEnv: "test",
      logLevel: "warn",
      embedding: {
        provider: "openai",
        openai: { apiKey: "test-openai-key", model: "text-embedding-3-small" },
        cohere: { apiKey: "test-cohere-key", model: "embed-v4.0" },
      },
      chunking: { maxChars: 800, overlapChars: 100 },
      search: { topK: 5, excerptChars: 200 },
      usage: { logFile: "/tmp/usage.json", budgetUsd: 10 },
    });
  });

  it("uses defaults for an empty environment", () => {
    const config = parseEnv({});

    expect(config.nodeEnv).toBe("development");
    expect(config.logLevel).toBe("info");
    expect(config.embedding.provider).toBe("openai");
    expect(config.embedding.openai.apiKey).toBe("");
    expect(config.embedding.cohere.model).toBe("embed-v4.0");
    expect(config.chunking).toEqual({ maxChars: 1000, overlapChars: 200 });
    expect(config.search).toEqual({ topK: 3, excerptChars: 300 });
    expect(config.usage).toEqual({ logFile: "docsage-usage.json", budgetUsd: 25 });
  });

  it("selects the cohere provider", () => {
    expect(parseEnv(makeValidEnv({ EMBEDDING_PROVIDER: "cohere" })).embedding.provider).toBe(
      "cohere",
    );
  });

  it("rejects an unknown provider", () => {
    expect(() => parseEnv(makeValidEnv({ EMBEDDING_PROVIDER: "local" }))).toThrow();
  });

  it("rejects non-numeric chunk sizes", () => {
    expect(() => parseEnv(makeValidEnv({ CHUNK_MAX_CHARS: "large" }))).toThrow();
  });

  it("rejects zero top-k", () => {
    expect(() => parseEnv(makeValidEnv({ SEARCH_TOP_K: "0" }))).toThrow();
  });

  it("accepts zero overlap", () => {
    expect(parseEnv(makeValidEnv({ CHUNK_OVERLAP_CHARS: "0" })).chunking.overlapChars).toBe(0);
  });

  it("rejects overlap not smaller than max size", () => {
    expect(() =>
      parseEnv(makeValidEnv({ CHUNK_MAX_CHARS: "200", CHUNK_OVERLAP_CHARS: "200" })),
    ).toThrow(/CHUNK_OVERLAP_CHARS must be smaller/);
  });

  it("rejects invalid NODE_ENV", () => {
    expect(() => parseEnv(makeValidEnv({ NODE_ENV: "staging" }))).toThrow();
  });
});
