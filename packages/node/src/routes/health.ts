/**
 * Health check routes.
 *
 * GET /health - Liveness probe (always 200 if server is running)
 * GET /ready  - Readiness probe (event store hash chain intact)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { Protocol } from "../services/protocol.js";
import { toIsoTimestamp } from "@amoca/types";

export function createHealthRoutes(protocol: Protocol): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = protocol.verifyIntegrity();
    const body = {
      status: integrity.valid ? "ready" : "not_ready",
      ledgerTime: toIsoTimestamp(protocol.now()),
      events: integrity.lastVerifiedPosition,
      errors: integrity.errors.length,
      timestamp: new Date().toISOString(),
    };

    return integrity.valid ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
