export * from "./core";

export { estimateCost, rawDocumentCost } from "./compiler";
export type { CostContext, LimitEntry } from "./compiler";

export { createTokenBucket, createRateMonitor, createRateRegistry, defaultRateRegistry } from "./ratelimit";
export type {
  TokenBucketInstance,
  TokenBucketOptions,
  RateMonitorInstance,
  RateMonitorOptions,
  RateStatus,
  RateRegistryInstance,
  RateRegistryOptions,
} from "./ratelimit";
