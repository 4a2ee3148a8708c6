import type { ChunkingConfig } from "./chunk.js";

export type NodeEnv = "development" | "test" | "production";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type EmbeddingProviderType = "openai" | "cohere";

export interface AppConfig {
  nodeEnv: NodeEnv;
  logLevel: LogLevel;
  embedding: EmbeddingConfig;
  chunking: ChunkingConfig;
  search: SearchConfig;
  usage: UsageConfig;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderType;
  openai: ProviderCredentials;
  cohere: ProviderCredentials;
}

export interface ProviderCredentials {
  apiKey: string;
  model: string;
}

export interface SearchConfig {
  topK: number;
  excerptChars: number;
}

export interface UsageConfig {
  logFile: string;
  budgetUsd: number;
}
