export type { IEmbeddingProvider } from "./embedding-provider.interface.js";
export { OpenAIEmbeddingProvider } from "./openai-provider.js";
export type { OpenAIProviderConfig, OpenAIEmbeddingsApi } from "./openai-provider.js";
export { CohereEmbeddingProvider } from "./cohere-provider.js";
export type { CohereProviderConfig, CohereEmbedApi } from "./cohere-provider.js";
export { createEmbeddingProvider } from "./factory.js";
export { toProviderError, statusOf } from "./provider-errors.js";
