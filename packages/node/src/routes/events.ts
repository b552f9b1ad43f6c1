/**
 * Event query routes.
 *
 * GET /api/v1/events            - List all events (cursor pagination)
 * GET /api/v1/events/integrity  - Verify the hash chain
 * GET /api/v1/events/:streamId  - List events for a stream
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { EventQuerySchema, StreamEventQuerySchema } from "../types/dto.js";
import type { EventQueryDto, StreamEventQueryDto } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/events - All events
  routes.get("/", (c) => {
    const protocol = c.get("protocol");

    const queryResult = EventQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const query: EventQueryDto = queryResult.data;
    const events = protocol.readEvents({
      ...(query.afterPosition !== undefined ? { fromPosition: query.afterPosition + 1 } : {}),
      ...(query.type !== undefined ? { type: query.type } : {}),
    });

    const result = paginate(
      events,
      { cursor: query.cursor, limit: query.limit },
      (e) => e.globalPosition,
      "globalPosition",
    );

    return c.json(result);
  });

  // GET /api/v1/events/integrity
  routes.get("/integrity", (c) => {
    const integrity = c.get("protocol").verifyIntegrity();
    return c.json({ data: integrity });
  });

  // GET /api/v1/events/:streamId
  routes.get("/:streamId", (c) => {
    const protocol = c.get("protocol");
    const streamId = c.req.param("streamId");

    const queryResult = StreamEventQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const query: StreamEventQueryDto = queryResult.data;
    const events = protocol.readStream(
      streamId,
      query.afterVersion !== undefined
        ? { fromVersion: query.afterVersion + 1 }
        : undefined,
    );

    const result = paginate(
      events,
      { cursor: query.cursor, limit: query.limit },
      (e) => e.version,
      "version",
    );

    return c.json(result);
  });

  return routes;
}
