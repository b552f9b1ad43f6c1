/**
 * Authentication middleware.
 *
 * Resolves the address a request acts as:
 * 1. Secured mode: X-Api-Key header → looked up in the configured key registry
 * 2. Unsecured mode (no keys configured): X-Caller header, taken as given
 *
 * On success, sets `c.set("auth", authContext)`.
 */

import type { MiddlewareHandler } from "hono";
import { isAddress, normalizeAddress } from "@amoca/types";
import type { Address } from "@amoca/types";
import type { AppEnv } from "../types/api-contract.js";
import type { AuthContext, ApiKeyRecord } from "../types/auth.js";
import { createErrorEnvelope, HttpError } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const CALLER_HEADER = "X-Caller";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

/**
 * Create API-key authentication middleware.
 *
 * Returns 401 if the key is missing or unknown.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Authentication required"),
        401,
      );
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Invalid API key"),
        401,
      );
    }

    c.set("auth", { type: "api-key", address: record.address });
    return next();
  };
}

/**
 * Unsecured mode: the caller names itself in X-Caller. Requests
 * without the header stay anonymous and can only read.
 */
export function callerHeaderMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const caller = c.req.header(CALLER_HEADER);
    if (caller === undefined) {
      c.set("auth", undefined);
      return next();
    }
    if (!isAddress(caller)) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", `Invalid ${CALLER_HEADER} address`),
        401,
      );
    }

    c.set("auth", { type: "header", address: normalizeAddress(caller) });
    return next();
  };
}

// =============================================================================
// Caller Guard
// =============================================================================

/**
 * The address a transition runs as. Throws 401 for anonymous requests.
 */
export function requireCaller(auth: AuthContext | undefined): Address {
  if (auth === undefined) {
    throw new HttpError(
      401,
      "UNAUTHORIZED",
      `Caller identity required (${API_KEY_HEADER} or ${CALLER_HEADER})`,
    );
  }
  return auth.address;
}
