export { CostTracker, summarize } from "./cost-tracker.js";
export type { CostTrackerOptions } from "./cost-tracker.js";
export { PRICING, priceFor } from "./pricing.js";
export type { ModelPrice } from "./pricing.js";
export { JsonFileUsageLog, InMemoryUsageLog } from "./usage-log.js";
export type { IUsageLog } from "./usage-log.js";
