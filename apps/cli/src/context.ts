import type { AppConfig } from "@docsage/types";
import { parseEnv } from "@docsage/config";
import { createChildLogger, createLogger, type Logger } from "@docsage/logger";
import { CostTracker, JsonFileUsageLog, type IUsageLog } from "@docsage/usage";
import { createEmbeddingProvider } from "@docsage/embeddings";
import { DocumentRetrievalService } from "@docsage/core";
import { RetryingEmbeddingProvider } from "./retrying-provider.js";

export interface AppContext {
  config: AppConfig;
  logger: Logger;
  usageLog: IUsageLog;
  tracker: CostTracker;
  service: DocumentRetrievalService;
}

/**
 * Build every collaborator from the environment. Nothing here touches the
 * network; the embedding client is created on first use.
 */
export function createAppContext(env: Record<string, string | undefined> = process.env): AppContext {
  const config = parseEnv(env);
  const logger = createLogger({ level: config.logLevel, nodeEnv: config.nodeEnv, stderr: true });

  const usageLog = new JsonFileUsageLog(config.usage.logFile);
  const tracker = new CostTracker({
    log: usageLog,
    logger: createChildLogger(logger, { component: "usage" }),
  });

  const embeddingProvider = new RetryingEmbeddingProvider(
    createEmbeddingProvider(config.embedding, tracker),
    {
      onRetry: ({ attempt, maxRetries, delayMs, error }) => {
        logger.warn({ attempt, maxRetries, delayMs, err: error }, "Retrying embedding request");
      },
    },
  );

  const service = new DocumentRetrievalService({
    embeddingProvider,
    chunking: config.chunking,
    logger: createChildLogger(logger, { component: "retrieval" }),
    excerptChars: config.search.excerptChars,
  });

  return { config, logger, usageLog, tracker, service };
}
