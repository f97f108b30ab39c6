import { satisfies, type SemVer } from "semver";
import { z } from "zod";
import { ANONYMOUS_IDENTITY, isAuthenticator, type Authenticator } from "./auth";
import { PREVIEW_ACCEPT_HEADER } from "./constants";
import { decode } from "./decoder";
import { createDispatcher } from "./dispatcher";
import { canonicalizeApiUrl, endpointKey, graphqlEndpoint, metaEndpoint } from "./endpoints";
import { TransportError } from "./errors";
import { consoleLogger } from "./instrumentation";
import { createRequester } from "./request";
import { createFetchTransport, isSuccessStatus } from "./transport";
import { createVersionCache } from "./versions";
import { defaultRateRegistry } from "../ratelimit/registry";
import type { RateStatus } from "../ratelimit/monitor";
import type { GraphgateOptions } from "./types";

const metaSchema = z.object({
  installed_version: z.string(),
});

/**
 * Main graphgate instance type
 *
 * @public
 * @example
 * ```typescript
 * import { createGraphgate, createBearerAuthenticator } from 'graphgate';
 *
 * const client = createGraphgate({
 *   apiUrl: 'https://ghe.example.com/api/v3',
 *   authenticator: createBearerAuthenticator(process.env.TOKEN ?? ''),
 * });
 *
 * const { data, error } = await client.execute({
 *   query: 'query { viewer { login } }',
 *   schema: z.object({ viewer: z.object({ login: z.string() }) }),
 * });
 * ```
 */
export type GraphgateInstance = {
  /** Canonical API base URL */
  apiUrl: URL;

  /** Dispatch one operation through both rate budgets */
  execute: ReturnType<typeof createDispatcher>["execute"];

  /**
   * Server version of this deployment (cached)
   * @param signal - Aborts the metadata request
   */
  getVersion: (signal?: AbortSignal) => Promise<SemVer>;

  /**
   * Whether the deployment's version satisfies a semver range
   * @param range - e.g. ">= 3.0"
   */
  supports: (range: string, signal?: AbortSignal) => Promise<boolean>;

  /** Snapshot of the server-reported rate limit for this endpoint and credential */
  rateStatus: () => RateStatus;

  /** Tokens currently available in the local budget */
  availableBudget: () => number;

  /**
   * Same configuration, different credential
   * @param authenticator - Credential for the new client
   */
  withAuthenticator: (authenticator: Authenticator) => GraphgateInstance;
};

const validateOptions = (options: GraphgateOptions): void => {
  if (!options || (typeof options.apiUrl !== "string" && !(options.apiUrl instanceof URL))) {
    throw new Error("Missing required 'apiUrl'. Example: { apiUrl: 'https://api.github.com' }");
  }

  if (!URL.canParse(String(options.apiUrl))) {
    throw new Error(`'apiUrl' must be an absolute URL, got '${String(options.apiUrl)}'`);
  }

  if (options.transport !== undefined && typeof options.transport !== "function") {
    throw new Error("'transport' must be a function");
  }

  if (options.authenticator !== undefined && !isAuthenticator(options.authenticator)) {
    throw new Error("'authenticator' must provide 'authenticate' and 'hash' functions");
  }
};

/**
 * Create a client bound to one endpoint and one credential
 */
export function createGraphgate(options: GraphgateOptions): GraphgateInstance {
  validateOptions(options);

  const {
    authenticator,
    transport = createFetchTransport(),
    rateRegistry = defaultRateRegistry,
    logger = consoleLogger,
    acceptHeader = PREVIEW_ACCEPT_HEADER,
  } = options;

  const versionCache = options.versionCache ?? createVersionCache({ logger });
  const apiUrl = canonicalizeApiUrl(options.apiUrl);
  const key = endpointKey(apiUrl);
  const identity = authenticator ? authenticator.hash() : ANONYMOUS_IDENTITY;

  const budget = rateRegistry.getBudget(key, identity);
  const monitor = rateRegistry.getMonitor(key, identity);
  const send = createRequester({ transport, authenticator, monitor });

  const dispatcher = createDispatcher(
    { endpoint: graphqlEndpoint(apiUrl), acceptHeader, logger },
    { budget, monitor, send },
  );

  const fetchInstalledVersion = async (signal?: AbortSignal): Promise<string> => {
    const url = metaEndpoint(apiUrl).href;
    const response = await send({ method: "GET", url, headers: { Accept: "application/json" } }, signal);

    if (!isSuccessStatus(response.status)) {
      throw new TransportError({ message: `Unexpected HTTP status ${response.status} from ${url}`, status: response.status });
    }

    return decode(response.body, metaSchema).installed_version;
  };

  const getVersion = (signal?: AbortSignal): Promise<SemVer> => {
    return versionCache.getVersion(apiUrl, () => fetchInstalledVersion(signal));
  };

  const supports = async (range: string, signal?: AbortSignal): Promise<boolean> => {
    return satisfies(await getVersion(signal), range);
  };

  return {
    apiUrl,
    execute: dispatcher.execute,
    getVersion,
    supports,
    rateStatus: monitor.get,
    availableBudget: budget.available,
    withAuthenticator: (next) => createGraphgate({ ...options, authenticator: next, versionCache }),
  };
}
