import { createHash } from "node:crypto";
import type { HttpRequest } from "./transport";

/**
 * Supplies request credentials and a stable identity used to partition
 * shared rate resources per credential.
 */
export interface Authenticator {
  /** Add credentials to the outgoing request */
  authenticate: (request: HttpRequest) => void;
  /** Stable, non-secret identity of the credential */
  hash: () => string;
}

export const ANONYMOUS_IDENTITY = "";

/**
 * OAuth bearer token authenticator
 */
export const createBearerAuthenticator = (token: string): Authenticator => {
  const digest = createHash("sha256").update(token).digest("hex");

  return {
    authenticate: (request) => {
      request.headers.Authorization = `Bearer ${token}`;
    },
    hash: () => digest,
  };
};

export const isAuthenticator = (value: unknown): value is Authenticator => {
  if (value === null || typeof value !== "object") {
    return false;
  }

  return "authenticate" in value && typeof value.authenticate === "function" && "hash" in value && typeof value.hash === "function";
};
