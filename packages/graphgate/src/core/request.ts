import type { Authenticator } from "./auth";
import { CancelledError, TransportError } from "./errors";
import type { HttpRequest, HttpResponse, HttpTransport } from "./transport";
import { raceAbort, throwIfAborted, toCancelledError } from "./utils";
import type { HeaderSource } from "../ratelimit/monitor";

export interface RequesterOptions {
  transport: HttpTransport;
  authenticator?: Authenticator;
  /** Receives the headers of every completed exchange */
  monitor: { update: (headers: HeaderSource) => void };
}

export type Requester = (request: HttpRequest, signal?: AbortSignal) => Promise<HttpResponse>;

/**
 * Authenticated sends through the transport. Every response that arrives
 * updates the monitor, successful or not. An abort rejects at once, even
 * when the transport ignores the signal.
 */
export const createRequester = ({ transport, authenticator, monitor }: RequesterOptions): Requester => {
  return async (request, signal) => {
    throwIfAborted(signal);

    authenticator?.authenticate(request);

    let response: HttpResponse;

    try {
      response = await raceAbort(transport(request, signal), signal);
    } catch (error) {
      if (signal?.aborted) {
        throw toCancelledError(signal);
      }

      if (error instanceof CancelledError) {
        throw error;
      }

      const reason = error instanceof Error ? error.message : String(error);

      throw new TransportError({ message: `${request.method} ${request.url}: ${reason}`, cause: error });
    }

    monitor.update(response.headers);
    throwIfAborted(signal);

    return response;
  };
};
