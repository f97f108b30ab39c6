/**
 * Outgoing HTTP request handed to the transport
 */
export interface HttpRequest {
  method: "GET" | "POST";
  url: string;
  headers: Record<string, string>;
  body?: string;
}

/**
 * Completed HTTP exchange, whatever its status
 */
export interface HttpResponse {
  status: number;
  headers: Headers;
  body: Uint8Array | string;
}

/**
 * Pluggable request executor. Must reject (not resolve) on connection failure,
 * and should honour `signal`.
 *
 * @public
 * @example
 * ```typescript
 * const transport: HttpTransport = async (request, signal) => {
 *   const res = await fetch(request.url, { ...request, signal });
 *   return { status: res.status, headers: res.headers, body: await res.text() };
 * };
 * ```
 */
export interface HttpTransport {
  (request: HttpRequest, signal?: AbortSignal): Promise<HttpResponse>;
}

export const isSuccessStatus = (status: number): boolean => status >= 200 && status < 300;

/**
 * Transport over the global `fetch`
 */
export const createFetchTransport = (fetchImpl: typeof fetch = fetch): HttpTransport => {
  return async (request, signal) => {
    const response = await fetchImpl(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal,
    });

    return {
      status: response.status,
      headers: response.headers,
      body: new Uint8Array(await response.arrayBuffer()),
    };
  };
};
