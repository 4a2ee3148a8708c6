import { Writable } from "node:stream";
import { describe, it, expect } from "vitest";
import { createLogger } from "@docsage/logger";
import type { UsageRecord } from "@docsage/types";
import { CostTracker, summarize } from "./cost-tracker.js";
import { InMemoryUsageLog } from "./usage-log.js";
import type { IUsageLog } from "./usage-log.js";

const fixedClock = () => new Date("2024-05-01T12:00:00.000Z");

describe("CostTracker", () => {
  it("prices a call per million tokens", async () => {
    const tracker = new CostTracker({ now: fixedClock });

    const record = await tracker.record({
      model: "gpt-4o-mini",
      inputTokens: 2_000_000,
      outputTokens: 500_000,
      itemCount: 1,
      description: "answer",
    });

    expect(record).toEqual({
      timestamp: "2024-05-01T12:00:00.000Z",
      model: "gpt-4o-mini",
      inputTokens: 2_000_000,
      outputTokens: 500_000,
      totalTokens: 2_500_000,
      itemCount: 1,
      inputCost: 0.3,
      outputCost: 0.3,
      totalCost: 0.6,
      priced: true,
      description: "answer",
    });
  });

  it("records embedding calls with zero output", async () => {
    const tracker = new CostTracker();

    const record = await tracker.record({
      model: "text-embedding-3-small",
      inputTokens: 50_000,
      itemCount: 12,
    });

    expect(record.outputTokens).toBe(0);
    expect(record.totalCost).toBeCloseTo(0.001, 10);
    expect(record.description).toBe("");
  });

  it("records unknown models at zero cost and warns", async () => {
    const lines: string[] = [];
    const destination = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        lines.push(chunk.toString());
        callback();
      },
    });
    const tracker = new CostTracker({ logger: createLogger({ level: "warn", destination }) });

    const record = await tracker.record({ model: "mystery-model", inputTokens: 10, itemCount: 1 });

    expect(record.priced).toBe(false);
    expect(record.totalCost).toBe(0);
    expect(tracker.records).toHaveLength(1);
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
      model: "mystery-model",
      msg: "No pricing for model; recording at zero cost",
    });
  });

  it("appends each record to the log", async () => {
    const log = new InMemoryUsageLog();
    const tracker = new CostTracker({ log });

    await tracker.record({ model: "embed-v4.0", inputTokens: 100, itemCount: 2 });
    await tracker.record({ model: "embed-v4.0", inputTokens: 300, itemCount: 1 });

    const history = await log.readAll();
    expect(history.map((r) => r.inputTokens)).toEqual([100, 300]);
  });

  it("keeps the session record and logs when the log write fails", async () => {
    const lines: string[] = [];
    const destination = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        lines.push(chunk.toString());
        callback();
      },
    });
    const log: IUsageLog = {
      readAll: async () => [],
      append: async () => {
        throw new Error("disk full");
      },
    };
    const tracker = new CostTracker({ log, logger: createLogger({ level: "error", destination }) });

    const record = await tracker.record({ model: "embed-v4.0", inputTokens: 100, itemCount: 1 });

    expect(record.inputTokens).toBe(100);
    expect(tracker.records).toHaveLength(1);
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "{}")).toMatchObject({
      model: "embed-v4.0",
      msg: "Failed to persist usage record",
      err: { message: "disk full" },
    });
  });

  it("computes the remaining budget from history", async () => {
    const log = new InMemoryUsageLog();
    const tracker = new CostTracker({ log });
    await tracker.record({ model: "gpt-4o", inputTokens: 1_000_000, itemCount: 1 });

    expect(await tracker.remainingBudget(25)).toBeCloseTo(22.5, 10);
  });

  it("falls back to the session for the budget without a log", async () => {
    const tracker = new CostTracker();
    await tracker.record({ model: "gpt-4o", inputTokens: 2_000_000, itemCount: 1 });

    expect(await tracker.remainingBudget(10)).toBeCloseTo(5, 10);
  });
});

describe("summarize", () => {
  function record(model: string, totalTokens: number, totalCost: number): UsageRecord {
    return {
      timestamp: "2024-05-01T12:00:00.000Z",
      model,
      inputTokens: totalTokens,
      outputTokens: 0,
      totalTokens,
      itemCount: 1,
      inputCost: totalCost,
      outputCost: 0,
      totalCost,
      priced: true,
      description: "",
    };
  }

  it("totals calls, tokens and cost per model", () => {
    const summary = summarize([
      record("embed-v4.0", 100, 0.5),
      record("gpt-4o", 40, 1),
      record("embed-v4.0", 60, 0.25),
    ]);

    expect(summary).toEqual({
      calls: 3,
      totalTokens: 200,
      totalCost: 1.75,
      byModel: {
        "embed-v4.0": { calls: 2, tokens: 160, cost: 0.75 },
        "gpt-4o": { calls: 1, tokens: 40, cost: 1 },
      },
    });
  });

  it("is all zeros for no records", () => {
    expect(summarize([])).toEqual({ calls: 0, totalTokens: 0, totalCost: 0, byModel: {} });
  });
});
