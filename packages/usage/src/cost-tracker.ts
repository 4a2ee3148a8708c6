import type {
  IUsageRecorder,
  ModelUsageSummary,
  UsageInput,
  UsageRecord,
  UsageSummary,
} from "@docsage/types";
import { createSilentLogger, type Logger } from "@docsage/logger";
import { priceFor } from "./pricing.js";
import type { IUsageLog } from "./usage-log.js";

const TOKENS_PER_PRICE_UNIT = 1_000_000;

export interface CostTrackerOptions {
  log?: IUsageLog;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Append-only ledger of remote model calls and what they cost.
 *
 * A record enters the session ledger before it is written to the log. A
 * failing log write is logged and does not fail `record`, so the charge stays
 * in the session and the caller's result is kept.
 */
export class CostTracker implements IUsageRecorder {
  private readonly session: UsageRecord[] = [];
  private readonly log?: IUsageLog;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: CostTrackerOptions = {}) {
    this.log = options.log;
    this.logger = options.logger ?? createSilentLogger();
    this.now = options.now ?? (() => new Date());
  }

  async record(input: UsageInput): Promise<UsageRecord> {
    const outputTokens = input.outputTokens ?? 0;
    const price = priceFor(input.model);

    if (!price) {
      this.logger.warn({ model: input.model }, "No pricing for model; recording at zero cost");
    }

    const inputCost = price ? (input.inputTokens / TOKENS_PER_PRICE_UNIT) * price.input : 0;
    const outputCost = price ? (outputTokens / TOKENS_PER_PRICE_UNIT) * price.output : 0;

    const record: UsageRecord = {
      timestamp: this.now().toISOString(),
      model: input.model,
      inputTokens: input.inputTokens,
      outputTokens,
      totalTokens: input.inputTokens + outputTokens,
      itemCount: input.itemCount,
      inputCost,
      outputCost,
      totalCost: inputCost + outputCost,
      priced: price !== undefined,
      description: input.description ?? "",
    };

    this.session.push(record);
    this.logger.debug(
      { model: record.model, totalTokens: record.totalTokens, totalCost: record.totalCost },
      "Usage recorded",
    );

    if (this.log) {
      try {
        await this.log.append(record);
      } catch (error: unknown) {
        // Usage is a side effect: the call it describes already succeeded.
        this.logger.error(
          { err: error, model: record.model, totalCost: record.totalCost },
          "Failed to persist usage record",
        );
      }
    }

    return record;
  }

  get records(): readonly UsageRecord[] {
    return this.session;
  }

  sessionSummary(): UsageSummary {
    return summarize(this.session);
  }

  /**
   * Budget left after everything in the persisted history (or the session,
   * when there is no log).
   */
  async remainingBudget(totalBudget: number): Promise<number> {
    const history = this.log ? await this.log.readAll() : this.session;
    return totalBudget - summarize(history).totalCost;
  }
}

export function summarize(records: readonly UsageRecord[]): UsageSummary {
  const byModel: Record<string, ModelUsageSummary> = {};
  let totalTokens = 0;
  let totalCost = 0;

  for (const record of records) {
    totalTokens += record.totalTokens;
    totalCost += record.totalCost;

    const model = byModel[record.model] ?? { calls: 0, tokens: 0, cost: 0 };
    model.calls += 1;
    model.tokens += record.totalTokens;
    model.cost += record.totalCost;
    byModel[record.model] = model;
  }

  return { calls: records.length, totalTokens, totalCost, byModel };
}
