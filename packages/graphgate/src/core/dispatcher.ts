import { print, type DocumentNode } from "graphql";
import { estimateCost } from "../compiler";
import { decode, decodeEnvelope, isUsableEnvelope, type Shape } from "./decoder";
import { DecodeError, OperationError, TransportError } from "./errors";
import type { Logger } from "./instrumentation";
import type { Requester } from "./request";
import { isSuccessStatus, type HttpResponse } from "./transport";
import { sleep, throwIfAborted, toBytes } from "./utils";
import type { TokenBucketInstance } from "../ratelimit/bucket";
import type { RateMonitorInstance } from "../ratelimit/monitor";

/**
 * GraphQL query variables
 *
 * @public
 * @example
 * ```typescript
 * const variables: QueryVariables = { query: "org:acme", first: 50 };
 * ```
 */
export type QueryVariables = Record<string, unknown>;

/**
 * One GraphQL exchange
 *
 * @public
 * @template TData - Decoded type of `data`
 * @example
 * ```typescript
 * const operation: DispatchOperation<{ viewer: { login: string } }> = {
 *   query: "query { viewer { login } }",
 *   schema: z.object({ viewer: z.object({ login: z.string() }) }),
 *   signal: AbortSignal.timeout(10_000),
 * };
 * ```
 */
export interface DispatchOperation<TData> {
  /** GraphQL query document */
  query: string | DocumentNode;
  /** Query variables (default: {}) */
  variables?: QueryVariables;
  /** Shape `data` is decoded into; pass z.unknown() to keep it raw */
  schema: Shape<TData>;
  /** Non-interactive work that yields to the server-recommended pacing */
  background?: boolean;
  /** Aborts the budget wait, the pacing pause and the exchange */
  signal?: AbortSignal;
}

/**
 * Result of a dispatched operation. `data` and `error` may both be set.
 *
 * @public
 * @template TData - Type of data returned
 */
export interface DispatchResult<TData> {
  /** Decoded data, null when the response carried none */
  data: TData | null;
  /** Server-reported errors, null when there were none */
  error: OperationError | null;
  meta: {
    /** Estimated cost spent from the local budget */
    cost: number;
  };
}

export interface DispatcherOptions {
  /** Absolute GraphQL endpoint */
  endpoint: URL;
  acceptHeader: string;
  logger: Logger;
}

export interface DispatcherDependencies {
  budget: TokenBucketInstance;
  monitor: RateMonitorInstance;
  send: Requester;
}

export type DispatcherInstance = ReturnType<typeof createDispatcher>;

const readText = (body: HttpResponse["body"]): string => toBytes(body).toString("utf8");

const decodeResult = <TData>(body: HttpResponse["body"], schema: Shape<TData>, cost: number): DispatchResult<TData> => {
  const envelope = decodeEnvelope(body);
  const error = envelope.errors.length > 0 ? new OperationError(envelope.errors) : null;

  if (envelope.data === null) {
    return { data: null, error, meta: { cost } };
  }

  try {
    return { data: decode(envelope.data, schema), error, meta: { cost } };
  } catch (decodeError) {
    if (decodeError instanceof DecodeError && error) {
      decodeError.operationError = error;
    }

    throw decodeError;
  }
};

export const createDispatcher = (
  { endpoint, acceptHeader, logger }: DispatcherOptions,
  { budget, monitor, send }: DispatcherDependencies,
) => {
  /**
   * Estimate, pay, pace, send and decode one operation.
   *
   * @throws ParseError before any network activity when the query is malformed
   * @throws RateBudgetError when the cost can never fit the local budget
   * @throws CancelledError when `signal` aborts a wait or the exchange
   * @throws TransportError on connection failure or an unusable non-2xx response
   * @throws DecodeError when the envelope or data does not match its shape
   */
  const execute = async <TData>({
    query,
    variables = {},
    schema,
    background = false,
    signal,
  }: DispatchOperation<TData>): Promise<DispatchResult<TData>> => {
    throwIfAborted(signal);

    const source = typeof query === "string" ? query : print(query);
    const body = JSON.stringify({ query: source, variables });
    const cost = estimateCost(query);

    await budget.acquire(cost, signal);

    if (background) {
      const wait = monitor.recommendedWaitForBackgroundOp(cost);

      if (wait > 0) {
        logger.debug("Pausing background operation", { cost, wait });
        await sleep(wait, signal);
      }
    }

    logger.debug("Dispatching operation", { cost, endpoint: endpoint.href });

    const response = await send(
      {
        method: "POST",
        url: endpoint.href,
        headers: {
          "Content-Type": "application/json",
          Accept: acceptHeader,
        },
        body,
      },
      signal,
    );

    if (!isSuccessStatus(response.status) && !isUsableEnvelope(response.body)) {
      throw new TransportError({
        message: `Unexpected HTTP status ${response.status} from ${endpoint.href}`,
        status: response.status,
        body: readText(response.body),
      });
    }

    return decodeResult(response.body, schema, cost);
  };

  return {
    execute,
  };
};
