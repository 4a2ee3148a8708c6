import type { EmbeddingConfig, IUsageRecorder } from "@docsage/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { OpenAIEmbeddingProvider } from "./openai-provider.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";

export function createEmbeddingProvider(
  config: EmbeddingConfig,
  recorder: IUsageRecorder,
): IEmbeddingProvider {
  switch (config.provider) {
    case "openai":
      return new OpenAIEmbeddingProvider(
        { apiKey: config.openai.apiKey, model: config.openai.model },
        recorder,
      );
    case "cohere":
      return new CohereEmbeddingProvider(
        { apiKey: config.cohere.apiKey, model: config.cohere.model },
        recorder,
      );
    default:
      throw new Error(`Unknown embedding provider: ${String(config.provider)}`);
  }
}
