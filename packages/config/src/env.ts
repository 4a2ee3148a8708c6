import { z } from "zod";
import type { AppConfig } from "@docsage/types";

const positiveInt = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

/**
 * Zod schema for every environment variable the toolkit reads.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["openai", "cohere"]).default("openai"),
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_EMBED_MODEL: z.string().min(1).default("text-embedding-3-small"),
    COHERE_API_KEY: z.string().optional(),
    COHERE_EMBED_MODEL: z.string().min(1).default("embed-v4.0"),

    // ---------- Chunking ----------
    CHUNK_MAX_CHARS: positiveInt("1000"),
    CHUNK_OVERLAP_CHARS: z
      .string()
      .default("200")
      .transform(Number)
      .pipe(z.number().int().nonnegative()),

    // ---------- Search ----------
    SEARCH_TOP_K: positiveInt("3"),
    SEARCH_EXCERPT_CHARS: positiveInt("300"),

    // ---------- Usage ----------
    USAGE_LOG_FILE: z.string().min(1).default("docsage-usage.json"),
    USAGE_BUDGET_USD: z.string().default("25").transform(Number).pipe(z.number().nonnegative()),
  })
  .refine((env) => env.CHUNK_OVERLAP_CHARS < env.CHUNK_MAX_CHARS, {
    message: "CHUNK_OVERLAP_CHARS must be smaller than CHUNK_MAX_CHARS",
    path: ["CHUNK_OVERLAP_CHARS"],
  });

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 * Missing API keys are not a parse error: they surface as an
 * AuthenticationError on the first embedding call.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      openai: {
        apiKey: parsed.OPENAI_API_KEY ?? "",
        model: parsed.OPENAI_EMBED_MODEL,
      },
      cohere: {
        apiKey: parsed.COHERE_API_KEY ?? "",
        model: parsed.COHERE_EMBED_MODEL,
      },
    },

    chunking: {
      maxChars: parsed.CHUNK_MAX_CHARS,
      overlapChars: parsed.CHUNK_OVERLAP_CHARS,
    },

    search: {
      topK: parsed.SEARCH_TOP_K,
      excerptChars: parsed.SEARCH_EXCERPT_CHARS,
    },

    usage: {
      logFile: parsed.USAGE_LOG_FILE,
      budgetUsd: parsed.USAGE_BUDGET_USD,
    },
  };
}
