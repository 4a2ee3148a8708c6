import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import type { UsageRecord } from "@docsage/types";

export interface IUsageLog {
  readAll(): Promise<UsageRecord[]>;
  append(record: UsageRecord): Promise<void>;
}

const usageRecordSchema = z.object({
  timestamp: z.string(),
  model: z.string(),
  inputTokens: z.number(),
  outputTokens: z.number(),
  totalTokens: z.number(),
  itemCount: z.number(),
  inputCost: z.number(),
  outputCost: z.number(),
  totalCost: z.number(),
  priced: z.boolean(),
  description: z.string(),
});

const historySchema = z.array(usageRecordSchema);

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Usage history kept as one JSON array on disk. Appends rewrite the file,
 * so writes are serialised through a promise chain.
 */
export class JsonFileUsageLog implements IUsageLog {
  private readonly path: string;
  private pending: Promise<void> = Promise.resolve();

  constructor(path: string) {
    this.path = path;
  }

  async readAll(): Promise<UsageRecord[]> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf-8");
    } catch (error: unknown) {
      if (isMissingFile(error)) return [];
      throw error;
    }
    return historySchema.parse(JSON.parse(raw));
  }

  append(record: UsageRecord): Promise<void> {
    const write = this.pending.then(async () => {
      const history = await this.readAll();
      history.push(record);
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(this.path, JSON.stringify(history, null, 2), "utf-8");
    });
    // keep the chain alive after a failed write; the caller still sees the error
    this.pending = write.catch(() => undefined);
    return write;
  }
}

export class InMemoryUsageLog implements IUsageLog {
  private readonly records: UsageRecord[] = [];

  async readAll(): Promise<UsageRecord[]> {
    return [...this.records];
  }

  async append(record: UsageRecord): Promise<void> {
    this.records.push(record);
  }
}
