import { CancelledError } from "./errors";

const noop = () => {};

export const isObject = (value: unknown): value is Record<string, unknown> => {
  return value !== null && typeof value === "object" && !Array.isArray(value);
};

/**
 * Build the CancelledError for an aborted signal
 */
export const toCancelledError = (signal: AbortSignal): CancelledError => {
  const reason: unknown = signal.reason;

  if (reason instanceof CancelledError) {
    return reason;
  }

  const timedOut = typeof reason === "object" && reason !== null && "name" in reason && reason.name === "TimeoutError";

  return new CancelledError(timedOut ? "Operation timed out" : "Operation cancelled", { timedOut, cause: reason });
};

export const throwIfAborted = (signal?: AbortSignal): void => {
  if (signal?.aborted) {
    throw toCancelledError(signal);
  }
};

/**
 * Settle with `promise`, or reject with a CancelledError as soon as `signal`
 * aborts, whether or not the work behind `promise` stops.
 */
export const raceAbort = async <T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> => {
  if (!signal) {
    return promise;
  }

  const aborted = signal;
  let onAbort: () => void = noop;

  const cancelled = new Promise<never>((_, reject) => {
    onAbort = () => reject(toCancelledError(aborted));

    if (aborted.aborted) {
      onAbort();
    } else {
      aborted.addEventListener("abort", onAbort, { once: true });
    }
  });

  try {
    return await Promise.race([promise, cancelled]);
  } finally {
    aborted.removeEventListener("abort", onAbort);
  }
};

/**
 * Abortable sleep. Resolves immediately for non-positive delays.
 */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> => {
  if (signal?.aborted) {
    return Promise.reject(toCancelledError(signal));
  }

  if (ms <= 0) {
    return Promise.resolve();
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);

      if (signal) {
        reject(toCancelledError(signal));
      }
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
};

/**
 * Promise-chain mutex: tasks run one after another in call order
 */
export const createMutex = () => {
  let tail: Promise<void> = Promise.resolve();

  const runExclusive = <T>(task: () => Promise<T>): Promise<T> => {
    const run = tail.then(task);

    tail = run.then(noop, noop);

    return run;
  };

  return { runExclusive };
};

export const toBytes = (payload: string | Uint8Array): Buffer => {
  if (typeof payload === "string") {
    return Buffer.from(payload, "utf8");
  }

  return Buffer.isBuffer(payload) ? payload : Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength);
};
