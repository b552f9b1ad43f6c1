/**
 * Request logging middleware.
 *
 * Emits one entry per request once the response is known, tagged with
 * the request ID and, for API calls, the caller address the auth layer
 * resolved.
 */

import type { MiddlewareHandler } from "hono";
import type { Address } from "@amoca/types";
import type { AppEnv } from "../types/api-contract.js";

export type RequestLogLevel = "info" | "warn" | "error";

export interface RequestLogEntry {
  readonly level: RequestLogLevel;
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  readonly caller: Address | undefined;
}

/** 5xx is an error, 4xx a warning. */
export function levelForStatus(status: number): RequestLogLevel {
  if (status >= 500) return "error";
  if (status >= 400) return "warn";
  return "info";
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();

    await next();

    const status = c.res.status;
    log({
      level: levelForStatus(status),
      method: c.req.method,
      path: c.req.path,
      status,
      durationMs: Math.round(performance.now() - start),
      requestId: c.get("requestId"),
      caller: c.get("auth")?.address,
    });
  };
}
