import { summarize, type IUsageLog } from "@docsage/usage";

export interface UsageCommandContext {
  usageLog: IUsageLog;
  budgetUsd: number;
}

const usd = (amount: number): string => `$${amount.toFixed(6)}`;

export async function runUsage(context: UsageCommandContext): Promise<string> {
  const summary = summarize(await context.usageLog.readAll());

  const lines = [
    "Usage summary",
    `  Calls: ${String(summary.calls)}`,
    `  Tokens: ${String(summary.totalTokens)}`,
    `  Cost: ${usd(summary.totalCost)}`,
    `  Remaining budget: ${usd(context.budgetUsd - summary.totalCost)}`,
  ];

  const models = Object.entries(summary.byModel);
  if (models.length > 0) {
    lines.push("  By model:");
    for (const [model, usage] of models) {
      lines.push(
        `    ${model}: ${String(usage.calls)} calls, ${String(usage.tokens)} tokens, ${usd(usage.cost)}`,
      );
    }
  }

  return lines.join("\n");
}
