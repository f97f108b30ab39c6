/**
 * Core constants used throughout the dispatcher
 */

export const PUBLIC_API_HOST = "api.github.com";

export const PUBLIC_WEB_HOSTS = new Set(["github.com", "www.github.com"]);

export const PUBLIC_GRAPHQL_PATH = "/graphql";

// Self-hosted REST lives under /api/v3, GraphQL under /api/graphql
export const SELF_HOSTED_GRAPHQL_PATH = "../graphql";

export const META_PATH = "/meta";

export const PREVIEW_ACCEPT_HEADER = "application/vnd.github.antiope-preview+json";

export const NOT_FOUND_ERROR_TYPE = "NOT_FOUND" as const;

export const ALL_MATCHING_VERSION = "99.99.99";

export const VERSION_CACHE_RESET_INTERVAL = 6 * 60 * 60 * 1000;

export const DECODE_WINDOW = 100;

export const RATE_LIMIT_HEADER_PREFIX = "X-";

export const DEFAULT_RATE_BUDGET = {
  capacity: 500,
  refillPerSecond: 5000 / 3600,
} as const;
