/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests can create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { Protocol } from "./services/protocol.js";
import type { ProtocolConfig, ProtocolDeps } from "./services/protocol.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware, callerHeaderMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createAccountRoutes, createCoinRoutes, createTokenRoutes } from "./routes/tokens.js";
import { createStakingRoutes } from "./routes/staking.js";
import { createGovernanceRoutes } from "./routes/governance.js";
import { createAccessRoutes } from "./routes/access.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly protocolConfig: ProtocolConfig;
  /** Clock, logger and stores handed to the protocol */
  readonly protocolDeps?: ProtocolDeps;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Called with every error answered as 500 */
  readonly onInternalError?: (err: Error) => void;
  /** Auth configuration. When provided, API-key auth is enabled. */
  readonly auth?: AuthConfig | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly protocol: Protocol;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const protocol = new Protocol(options.protocolConfig, options.protocolDeps);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.onInternalError));

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(protocol));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    // Secured mode: every API request carries a known key
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    // Unsecured mode (tests, dev): X-Caller header
    app.use("/api/*", callerHeaderMiddleware());
  }

  app.use("/api/*", async (c, next) => {
    c.set("protocol", protocol);
    await next();
  });

  // Mount v1 API routes
  app.route("/api/v1/tokens", createTokenRoutes());
  app.route("/api/v1/coins", createCoinRoutes());
  app.route("/api/v1/accounts", createAccountRoutes());
  app.route("/api/v1/staking", createStakingRoutes());
  app.route("/api/v1/governance", createGovernanceRoutes());
  app.route("/api/v1/access", createAccessRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, protocol };
}
