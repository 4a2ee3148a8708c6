export interface ModelPrice {
  /** USD per 1M input tokens. */
  input: number;
  /** USD per 1M output tokens. */
  output: number;
}

export const PRICING: Readonly<Record<string, ModelPrice>> = {
  "text-embedding-3-small": { input: 0.02, output: 0 },
  "text-embedding-3-large": { input: 0.13, output: 0 },
  "embed-v4.0": { input: 0.12, output: 0 },
  "gpt-4o-mini": { input: 0.15, output: 0.6 },
  "gpt-4o": { input: 2.5, output: 10 },
};

export function priceFor(model: string): ModelPrice | undefined {
  return Object.hasOwn(PRICING, model) ? PRICING[model] : undefined;
}
