/**
 * Staking routes.
 *
 * GET  /api/v1/staking/pool                 - The staking pool
 * POST /api/v1/staking/stakes               - Lock a coin into a stake
 * GET  /api/v1/staking/stakes/:id           - Get a stake with its pending reward
 * POST /api/v1/staking/stakes/:id/claim     - Claim the reward of a matured stake
 * POST /api/v1/staking/stakes/:id/unstake   - Release a matured stake's principal
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { StakeSchema } from "../types/dto.js";
import type { StakeDto } from "../types/dto.js";
import { amountView, claimView, coinView, poolView, stakeView } from "../types/views.js";
import { validateBody } from "../middleware/validate.js";
import { requireCaller } from "../middleware/auth.js";

export function createStakingRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/staking/pool
  routes.get("/pool", (c) => {
    return c.json({ data: poolView(c.get("protocol").pool) });
  });

  // POST /api/v1/staking/stakes
  routes.post("/stakes", validateBody(StakeSchema), (c) => {
    const protocol = c.get("protocol");
    const sender = requireCaller(c.get("auth"));
    const body: StakeDto = c.get("validatedBody");

    const stake = protocol.stakeTokens(sender, body.coinId, body.duration);
    return c.json({ data: stakeView(stake, protocol.now()) }, 201);
  });

  // GET /api/v1/staking/stakes/:id
  routes.get("/stakes/:id", (c) => {
    const protocol = c.get("protocol");
    const stake = protocol.staking.requireStake(c.req.param("id"));

    return c.json({
      data: {
        ...stakeView(stake, protocol.now()),
        pendingReward: amountView(protocol.staking.previewReward(stake.id)),
      },
    });
  });

  // POST /api/v1/staking/stakes/:id/claim
  routes.post("/stakes/:id/claim", (c) => {
    const protocol = c.get("protocol");
    const sender = requireCaller(c.get("auth"));

    const result = protocol.claimRewards(sender, c.req.param("id"));
    return c.json({ data: claimView(result, protocol.now()) });
  });

  // POST /api/v1/staking/stakes/:id/unstake
  routes.post("/stakes/:id/unstake", (c) => {
    const protocol = c.get("protocol");
    const sender = requireCaller(c.get("auth"));

    const coin = protocol.unstakeTokens(sender, c.req.param("id"));
    return c.json({ data: coinView(coin) });
  });

  return routes;
}
