/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Protocol } from "../services/protocol.js";
import type { AuthContext } from "./auth.js";

/**
 * Hono environment type for the AMOCA node.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The protocol instance every route drives */
    protocol: Protocol;

    /** Caller identity; undefined when an unsecured request names none */
    auth: AuthContext | undefined;
  };
}
