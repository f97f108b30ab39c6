import { RATE_LIMIT_HEADER_PREFIX } from "../core/constants";

const HOUR = 60 * 60 * 1000;

// Extra slack past the reported reset
const RESET_GRACE = 3 * 60 * 1000;

// Share of the remaining budget background work leaves for interactive callers
const INTERACTIVE_RESERVE = 0.2;

/**
 * Snapshot of the server-reported rate limit
 */
export interface RateStatus {
  /** Whether a response has reported usable rate limit headers yet */
  known: boolean;
  limit: number;
  remaining: number;
  /** Epoch ms when the window resets */
  resetAt: number;
  /** Retry-After in ms, when the server sent one */
  retryAfter: number | null;
}

export type RateMonitorOptions = {
  /** Prefix for RateLimit-* headers (default: "X-") */
  headerPrefix?: string;
  /** Clock in ms (default: Date.now) */
  now?: () => number;
};

export type HeaderSource = Pick<Headers, "get">;

export type RateMonitorInstance = ReturnType<typeof createRateMonitor>;

const readInt = (headers: HeaderSource, name: string): number | null => {
  const raw = headers.get(name);

  if (raw === null || raw.trim() === "") {
    return null;
  }

  const value = Number(raw);

  return Number.isInteger(value) ? value : null;
};

/**
 * Tracks the rate limit the server reports after each exchange and derives
 * how long background work should pause to leave room for everyone else.
 */
export const createRateMonitor = ({ headerPrefix = RATE_LIMIT_HEADER_PREFIX, now = () => Date.now() }: RateMonitorOptions = {}) => {
  let status: RateStatus = {
    known: false,
    limit: 0,
    remaining: 0,
    resetAt: 0,
    retryAfter: null,
  };

  /**
   * Update from response headers. Missing or malformed headers mark the status unknown.
   */
  const update = (headers: HeaderSource): void => {
    const retryAfter = readInt(headers, "Retry-After");
    const limit = readInt(headers, `${headerPrefix}RateLimit-Limit`);
    const remaining = readInt(headers, `${headerPrefix}RateLimit-Remaining`);
    const reset = readInt(headers, `${headerPrefix}RateLimit-Reset`);

    if (limit === null || remaining === null || reset === null) {
      status = { ...status, known: false, retryAfter: retryAfter === null ? null : retryAfter * 1000 };
      return;
    }

    status = {
      known: true,
      limit,
      remaining,
      resetAt: reset * 1000,
      retryAfter: retryAfter === null ? null : retryAfter * 1000,
    };
  };

  const get = (): RateStatus => ({ ...status });

  /**
   * Recommended pause in ms before a non-interactive operation of `cost`.
   * Spreads the usable remaining budget across the time left in the window.
   */
  const recommendedWaitForBackgroundOp = (cost: number): number => {
    if (!status.known) {
      return 0;
    }

    const t = now();
    let remaining = status.remaining;
    let resetAt = status.resetAt;

    // Stale snapshot: the window has rolled over since
    if (t > resetAt) {
      remaining = status.limit;
      resetAt = t + HOUR;
    }

    const usable = remaining * (1 - INTERACTIVE_RESERVE);
    const timeRemaining = resetAt - t + RESET_GRACE;
    const runs = usable / Math.max(1, cost);

    if (runs < 1) {
      return timeRemaining;
    }

    if (runs > 500) {
      return 0;
    }

    if (runs > 250) {
      return 200;
    }

    return Math.round(timeRemaining / runs);
  };

  return {
    update,
    get,
    recommendedWaitForBackgroundOp,
  };
};
