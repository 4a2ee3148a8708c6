export interface UsageInput {
  model: string;
  inputTokens: number;
  outputTokens?: number;
  /** Number of items sent in the call (texts embedded, messages completed). */
  itemCount: number;
  description?: string;
}

export interface UsageRecord {
  timestamp: string;
  model: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  itemCount: number;
  inputCost: number;
  outputCost: number;
  totalCost: number;
  priced: boolean;
  description: string;
}

/**
 * Cost-accounting collaborator. Implementations append; a record is never
 * rewritten or removed once accepted.
 */
export interface IUsageRecorder {
  record(input: UsageInput): Promise<UsageRecord>;
}

export interface ModelUsageSummary {
  calls: number;
  tokens: number;
  cost: number;
}

export interface UsageSummary {
  calls: number;
  totalTokens: number;
  totalCost: number;
  byModel: Record<string, ModelUsageSummary>;
}
