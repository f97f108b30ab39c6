export { createTokenBucket } from "./bucket";
export type { TokenBucketInstance, TokenBucketOptions } from "./bucket";

export { createRateMonitor } from "./monitor";
export type { RateMonitorInstance, RateMonitorOptions, RateStatus, HeaderSource } from "./monitor";

export { createRateRegistry, defaultRateRegistry } from "./registry";
export type { RateRegistryInstance, RateRegistryOptions } from "./registry";
