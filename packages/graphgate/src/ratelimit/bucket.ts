import { RateBudgetError } from "../core/errors";
import { toCancelledError } from "../core/utils";

/**
 * Configuration for a token bucket
 */
export type TokenBucketOptions = {
  /** Maximum tokens held at once (burst size) */
  capacity: number;
  /** Tokens restored per second; Infinity disables limiting */
  refillPerSecond: number;
  /** Clock in ms (default: Date.now) */
  now?: () => number;
};

type Waiter = {
  cost: number;
  admit: () => void;
};

/**
 * Token bucket instance type
 */
export type TokenBucketInstance = ReturnType<typeof createTokenBucket>;

/**
 * Self-imposed request budget. Waiters are admitted strictly in arrival order,
 * so a large request at the head holds back smaller ones behind it.
 */
export const createTokenBucket = ({ capacity, refillPerSecond, now = () => Date.now() }: TokenBucketOptions) => {
  if (!(capacity > 0)) {
    throw new Error("Rate budget 'capacity' must be a positive number");
  }

  if (!(refillPerSecond > 0)) {
    throw new Error("Rate budget 'refillPerSecond' must be a positive number");
  }

  const unlimited = !Number.isFinite(refillPerSecond);
  const waiters: Waiter[] = [];

  let tokens = capacity;
  let updatedAt = now();
  let timer: ReturnType<typeof setTimeout> | null = null;

  const refill = (): void => {
    const t = now();
    const elapsed = Math.max(0, t - updatedAt);

    tokens = Math.min(capacity, tokens + (elapsed * refillPerSecond) / 1000);
    updatedAt = t;
  };

  const schedule = (): void => {
    if (timer !== null) {
      clearTimeout(timer);
      timer = null;
    }

    if (waiters.length === 0) {
      return;
    }

    const deficit = waiters[0].cost - tokens;
    const delay = Math.max(1, Math.ceil((deficit * 1000) / refillPerSecond));

    timer = setTimeout(() => {
      timer = null;
      drain();
    }, delay);
  };

  const drain = (): void => {
    refill();

    while (waiters.length > 0 && tokens >= waiters[0].cost) {
      const [head] = waiters.splice(0, 1);

      tokens -= head.cost;
      head.admit();
    }

    schedule();
  };

  /**
   * Take `cost` tokens, waiting for them if needed.
   *
   * @throws RateBudgetError when `cost` exceeds the capacity
   * @throws CancelledError when `signal` aborts while waiting
   */
  const acquire = (cost: number, signal?: AbortSignal): Promise<void> => {
    if (cost > capacity) {
      return Promise.reject(new RateBudgetError(cost, capacity));
    }

    if (signal?.aborted) {
      return Promise.reject(toCancelledError(signal));
    }

    if (unlimited) {
      return Promise.resolve();
    }

    refill();

    if (waiters.length === 0 && tokens >= cost) {
      tokens -= cost;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = waiters.indexOf(waiter);

        if (index !== -1) {
          waiters.splice(index, 1);
          // Whoever is now at the head may already fit
          drain();
        }

        if (signal) {
          reject(toCancelledError(signal));
        }
      };

      const waiter: Waiter = {
        cost,
        admit: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        },
      };

      waiters.push(waiter);
      signal?.addEventListener("abort", onAbort, { once: true });

      if (waiters.length === 1) {
        schedule();
      }
    });
  };

  /**
   * Tokens available right now
   */
  const available = (): number => {
    if (unlimited) {
      return capacity;
    }

    refill();
    return tokens;
  };

  const pending = (): number => waiters.length;

  return {
    capacity,
    acquire,
    available,
    pending,
  };
};
