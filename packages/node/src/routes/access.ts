/**
 * Access-right routes.
 *
 * POST /api/v1/access/rights             - Grant a right over a data ID
 * GET  /api/v1/access/rights/:id         - Get a right
 * POST /api/v1/access/rights/:id/verify  - Check the caller's access at a level
 */

import { Hono } from "hono";
import { toIsoTimestamp } from "@amoca/types";
import type { AppEnv } from "../types/api-contract.js";
import { GrantAccessSchema, VerifyAccessSchema } from "../types/dto.js";
import type { GrantAccessDto, VerifyAccessDto } from "../types/dto.js";
import { rightView } from "../types/views.js";
import { validateBody } from "../middleware/validate.js";
import { requireCaller } from "../middleware/auth.js";

export function createAccessRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/access/rights
  routes.post("/rights", validateBody(GrantAccessSchema), (c) => {
    const protocol = c.get("protocol");
    const sender = requireCaller(c.get("auth"));
    const body: GrantAccessDto = c.get("validatedBody");

    const right = protocol.createDataAccessRight(
      sender,
      body.dataId,
      body.recipient,
      body.accessLevel,
      body.expiration,
    );
    return c.json({ data: rightView(right) }, 201);
  });

  // GET /api/v1/access/rights/:id
  routes.get("/rights/:id", (c) => {
    const right = c.get("protocol").access.requireRight(c.req.param("id"));
    return c.json({ data: rightView(right) });
  });

  // POST /api/v1/access/rights/:id/verify
  routes.post("/rights/:id/verify", validateBody(VerifyAccessSchema), (c) => {
    const protocol = c.get("protocol");
    const caller = requireCaller(c.get("auth"));
    const body: VerifyAccessDto = c.get("validatedBody");
    const rightId = c.req.param("id");

    const granted = protocol.verifyDataAccess(caller, rightId, body.requiredLevel);
    return c.json({
      data: {
        rightId,
        caller,
        requiredLevel: body.requiredLevel,
        granted,
        checkedAt: toIsoTimestamp(protocol.now()),
      },
    });
  });

  return routes;
}
