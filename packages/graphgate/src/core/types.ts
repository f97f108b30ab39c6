import type { Authenticator } from "./auth";
import type { Logger } from "./instrumentation";
import type { HttpTransport } from "./transport";
import type { VersionCacheInstance } from "./versions";
import type { RateRegistryInstance } from "../ratelimit/registry";

/**
 * Configuration options for a graphgate client
 */
export type GraphgateOptions = {
  /** API base URL, e.g. https://api.github.com or https://ghe.example.com/api/v3 - REQUIRED */
  apiUrl: string | URL;
  /** Credentials; requests are anonymous without one */
  authenticator?: Authenticator;
  /** Request executor (default: global fetch) */
  transport?: HttpTransport;
  /** Shared budgets and monitors (default: process-wide registry) */
  rateRegistry?: RateRegistryInstance;
  /** Server version cache; share one across clients to share lookups (default: a new cache) */
  versionCache?: VersionCacheInstance;
  /** Accept header selecting the preview dataset */
  acceptHeader?: string;
  logger?: Logger;
};
