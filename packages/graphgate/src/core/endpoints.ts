import { posix } from "node:path";
import {
  META_PATH,
  PUBLIC_API_HOST,
  PUBLIC_GRAPHQL_PATH,
  PUBLIC_WEB_HOSTS,
  SELF_HOSTED_GRAPHQL_PATH,
} from "./constants";

/**
 * Canonical API base URL: web hosts of the public deployment map to its API
 * host, and the trailing slash is dropped.
 */
export const canonicalizeApiUrl = (input: string | URL): URL => {
  const url = new URL(String(input));

  if (PUBLIC_WEB_HOSTS.has(url.hostname.toLowerCase())) {
    return new URL(`https://${PUBLIC_API_HOST}`);
  }

  url.pathname = url.pathname.replace(/\/+$/, "");
  url.search = "";
  url.hash = "";

  return url;
};

export const isPublicEndpoint = (apiUrl: URL): boolean => apiUrl.hostname.toLowerCase() === PUBLIC_API_HOST;

/**
 * Cache and registry key for an API base URL
 */
export const endpointKey = (apiUrl: URL): string => {
  const url = canonicalizeApiUrl(apiUrl);
  return `${url.protocol}//${url.host.toLowerCase()}${url.pathname}`;
};

/**
 * Join a relative API path onto the base path, e.g. /api/v3 + ../graphql = /api/graphql
 */
export const resolveEndpoint = (apiUrl: URL, relativePath: string): URL => {
  const url = new URL(apiUrl.href);
  url.pathname = posix.join(apiUrl.pathname || "/", relativePath);
  return url;
};

export const graphqlEndpoint = (apiUrl: URL): URL => {
  return resolveEndpoint(apiUrl, isPublicEndpoint(apiUrl) ? PUBLIC_GRAPHQL_PATH : SELF_HOSTED_GRAPHQL_PATH);
};

export const metaEndpoint = (apiUrl: URL): URL => resolveEndpoint(apiUrl, META_PATH);
