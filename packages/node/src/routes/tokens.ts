/**
 * Token routes.
 *
 * POST /api/v1/tokens/mint           - Mint with the treasury authority
 * GET  /api/v1/tokens/supply         - Total, circulating and locked supply
 * POST /api/v1/coins/:id/transfer    - Hand a coin to another address
 * POST /api/v1/coins/:id/split       - Split an amount off into a new coin
 * POST /api/v1/coins/:id/merge       - Absorb another coin of the same owner
 * POST /api/v1/coins/:id/burn        - Destroy a coin
 * GET  /api/v1/coins/:id             - Get a coin
 * GET  /api/v1/accounts/:address     - Balance and holdings of an address
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AddressSchema, MergeSchema, MintSchema, SplitSchema, TransferSchema } from "../types/dto.js";
import type { MergeDto, MintDto, SplitDto, TransferDto } from "../types/dto.js";
import { HttpError } from "../types/error.js";
import {
  amountView,
  coinView,
  rightView,
  stakeView,
  supplyView,
} from "../types/views.js";
import { validateBody } from "../middleware/validate.js";
import { requireCaller } from "../middleware/auth.js";

export function createTokenRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // POST /api/v1/tokens/mint
  routes.post("/mint", validateBody(MintSchema), (c) => {
    const protocol = c.get("protocol");
    const sender = requireCaller(c.get("auth"));
    const body: MintDto = c.get("validatedBody");

    const coin = protocol.mintTokens(sender, body.amount, body.recipient);
    return c.json({ data: coinView(coin) }, 201);
  });

  // GET /api/v1/tokens/supply
  routes.get("/supply", (c) => {
    return c.json({ data: supplyView(c.get("protocol").supply()) });
  });

  return routes;
}

export function createCoinRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/coins/:id
  routes.get("/:id", (c) => {
    const coin = c.get("protocol").ledger.requireCoin(c.req.param("id"));
    return c.json({ data: coinView(coin) });
  });

  // POST /api/v1/coins/:id/transfer
  routes.post("/:id/transfer", validateBody(TransferSchema), (c) => {
    const protocol = c.get("protocol");
    const sender = requireCaller(c.get("auth"));
    const body: TransferDto = c.get("validatedBody");

    const coin = protocol.transfer(sender, c.req.param("id"), body.recipient);
    return c.json({ data: coinView(coin) });
  });

  // POST /api/v1/coins/:id/split
  routes.post("/:id/split", validateBody(SplitSchema), (c) => {
    const protocol = c.get("protocol");
    const sender = requireCaller(c.get("auth"));
    const body: SplitDto = c.get("validatedBody");

    const coin = protocol.split(sender, c.req.param("id"), body.amount);
    return c.json({ data: coinView(coin) }, 201);
  });

  // POST /api/v1/coins/:id/merge
  routes.post("/:id/merge", validateBody(MergeSchema), (c) => {
    const protocol = c.get("protocol");
    const sender = requireCaller(c.get("auth"));
    const body: MergeDto = c.get("validatedBody");

    const coin = protocol.merge(sender, c.req.param("id"), body.sourceId);
    return c.json({ data: coinView(coin) });
  });

  // POST /api/v1/coins/:id/burn
  routes.post("/:id/burn", (c) => {
    const protocol = c.get("protocol");
    const sender = requireCaller(c.get("auth"));
    const coinId = c.req.param("id");

    const burned = protocol.burn(sender, coinId);
    return c.json({ data: { coinId, burned: amountView(burned) } });
  });

  return routes;
}

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/accounts/:address
  routes.get("/:address", (c) => {
    const protocol = c.get("protocol");
    const parsed = AddressSchema.safeParse(c.req.param("address"));
    if (!parsed.success) {
      throw new HttpError(400, "VALIDATION_ERROR", "Invalid address");
    }

    const now = protocol.now();
    const account = protocol.account(parsed.data);
    return c.json({
      data: {
        address: account.address,
        balance: amountView(account.balance),
        staked: amountView(account.staked),
        coins: account.coins.map(coinView),
        stakes: account.stakes.map((s) => stakeView(s, now)),
        rights: account.rights.map(rightView),
      },
    });
  });

  return routes;
}
