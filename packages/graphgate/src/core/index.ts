// Main client
export { createGraphgate } from "./client";
export type { GraphgateInstance } from "./client";

// Types
export type { GraphgateOptions } from "./types";

// Dispatch
export { createDispatcher } from "./dispatcher";
export type {
  DispatchOperation,
  DispatchResult,
  DispatcherInstance,
  DispatcherOptions,
  DispatcherDependencies,
  QueryVariables,
} from "./dispatcher";

// Transport & auth
export { createFetchTransport, isSuccessStatus } from "./transport";
export type { HttpRequest, HttpResponse, HttpTransport } from "./transport";
export { createBearerAuthenticator, isAuthenticator } from "./auth";
export type { Authenticator } from "./auth";
export { createRequester } from "./request";
export type { Requester } from "./request";

// Decoding
export { decode, decodeEnvelope, describeOffset } from "./decoder";
export type { Shape, DecodedEnvelope } from "./decoder";

// Versions
export { createVersionCache, parseInstalledVersion } from "./versions";
export type { VersionCacheInstance, VersionCacheOptions, InstalledVersionFetcher } from "./versions";

// Endpoints
export { canonicalizeApiUrl, endpointKey, graphqlEndpoint, metaEndpoint, isPublicEndpoint } from "./endpoints";

// Constants
export {
  ALL_MATCHING_VERSION,
  NOT_FOUND_ERROR_TYPE,
  PREVIEW_ACCEPT_HEADER,
  VERSION_CACHE_RESET_INTERVAL,
  DEFAULT_RATE_BUDGET,
} from "./constants";

// Logging
export { consoleLogger } from "./instrumentation";
export type { Logger, LogContext } from "./instrumentation";

// Errors
export {
  ParseError,
  TransportError,
  OperationError,
  DecodeError,
  CancelledError,
  RateBudgetError,
} from "./errors";
export type { GraphQLErrorEntry, GraphQLErrorLocation } from "./errors";
