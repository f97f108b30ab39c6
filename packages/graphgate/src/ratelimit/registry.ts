import { DEFAULT_RATE_BUDGET } from "../core/constants";
import { createTokenBucket, type TokenBucketInstance, type TokenBucketOptions } from "./bucket";
import { createRateMonitor, type RateMonitorInstance, type RateMonitorOptions } from "./monitor";

export type RateRegistryOptions = {
  /** Budget for every bucket this registry creates */
  budget?: TokenBucketOptions;
  monitor?: RateMonitorOptions;
};

export type RateRegistryInstance = ReturnType<typeof createRateRegistry>;

const makeKey = (endpoint: string, identity: string) => `${endpoint}|${identity}`;

/**
 * Shared rate resources keyed by (endpoint, credential identity).
 * Every lookup for the same key returns the same bucket and monitor.
 */
export const createRateRegistry = ({ budget = DEFAULT_RATE_BUDGET, monitor: monitorOptions }: RateRegistryOptions = {}) => {
  const budgets = new Map<string, TokenBucketInstance>();
  const monitors = new Map<string, RateMonitorInstance>();

  const getBudget = (endpoint: string, identity: string): TokenBucketInstance => {
    const key = makeKey(endpoint, identity);
    let bucket = budgets.get(key);

    if (!bucket) {
      bucket = createTokenBucket(budget);
      budgets.set(key, bucket);
    }

    return bucket;
  };

  const getMonitor = (endpoint: string, identity: string): RateMonitorInstance => {
    const key = makeKey(endpoint, identity);
    let monitor = monitors.get(key);

    if (!monitor) {
      monitor = createRateMonitor(monitorOptions);
      monitors.set(key, monitor);
    }

    return monitor;
  };

  return {
    getBudget,
    getMonitor,
  };
};

/**
 * Process-wide registry used when a client is not given one
 */
export const defaultRateRegistry = createRateRegistry();
