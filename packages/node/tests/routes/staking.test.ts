/**
 * Tests for staking routes.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ONE_TOKEN, SECONDS_PER_YEAR } from "@amoca/types";
import { ALICE, BOB, START, TREASURY, callAs, createTestApp, readJson } from "../setup.js";
import type { AmountBody, CoinBody, ErrorBody, TestApp } from "../setup.js";

interface StakeBody {
  id: string;
  poolId: string;
  owner: string;
  amount: AmountBody;
  startTime: number;
  endTime: number;
  claimed: boolean;
  matured: boolean;
}

describe("staking routes", () => {
  let t: TestApp;

  beforeEach(() => {
    t = createTestApp();
    t.protocol.mintTokens(TREASURY, ONE_TOKEN, ALICE);
  });

  function stake(duration: number, caller = ALICE): Promise<Response> {
    return Promise.resolve(
      t.app.request(callAs(caller, "/api/v1/staking/stakes", "POST", { coinId: "coin:1", duration })),
    );
  }

  it("locks a coin into a stake", async () => {
    const res = await stake(SECONDS_PER_YEAR);

    expect(res.status).toBe(201);
    expect((await readJson<{ data: StakeBody }>(res)).data).toEqual({
      id: "stake:1",
      poolId: "pool:1",
      owner: ALICE,
      amount: { value: "1000000000", display: "1.000000000 AMOCA" },
      startTime: START,
      endTime: START + SECONDS_PER_YEAR,
      claimed: false,
      matured: false,
    });

    const pool = await t.app.request("/api/v1/staking/pool");
    expect((await readJson<{ data: unknown }>(pool)).data).toEqual({
      id: "pool:1",
      totalStaked: { value: "1000000000", display: "1.000000000 AMOCA" },
      rewardRate: 5,
      minStakeDuration: 86_400,
      createdAt: START,
    });
  });

  it("rejects a stake shorter than the pool minimum", async () => {
    const res = await stake(100);

    expect(res.status).toBe(400);
    expect((await readJson<ErrorBody>(res)).error.code).toBe("INVALID_DURATION");
  });

  it("rejects a negative duration before reaching the engine", async () => {
    const res = await stake(-1);

    expect(res.status).toBe(400);
    expect((await readJson<ErrorBody>(res)).error.code).toBe("VALIDATION_ERROR");
  });

  it("refuses to stake someone else's coin", async () => {
    const res = await stake(SECONDS_PER_YEAR, BOB);

    expect(res.status).toBe(403);
    expect(t.protocol.supply().locked).toBe(0n);
  });

  it("gates claim and unstake on maturity", async () => {
    await stake(SECONDS_PER_YEAR);

    const claim = await t.app.request(callAs(ALICE, "/api/v1/staking/stakes/stake:1/claim"));
    expect(claim.status).toBe(422);
    expect((await readJson<ErrorBody>(claim)).error.code).toBe("STAKE_NOT_MATURED");

    const unstake = await t.app.request(callAs(ALICE, "/api/v1/staking/stakes/stake:1/unstake"));
    expect(unstake.status).toBe(422);
  });

  it("previews, claims and unstakes a matured stake", async () => {
    await stake(SECONDS_PER_YEAR);
    t.clock.advance(SECONDS_PER_YEAR);

    const preview = await t.app.request("/api/v1/staking/stakes/stake:1");
    const previewBody = await readJson<{ data: StakeBody & { pendingReward: AmountBody } }>(preview);
    expect(previewBody.data.matured).toBe(true);
    expect(previewBody.data.pendingReward).toEqual({ value: "50000000", display: "0.050000000 AMOCA" });

    const claim = await t.app.request(callAs(ALICE, "/api/v1/staking/stakes/stake:1/claim"));
    expect(claim.status).toBe(200);
    const claimBody = await readJson<{
      data: { stake: StakeBody; reward: AmountBody; coin: CoinBody | null };
    }>(claim);
    expect(claimBody.data.stake.claimed).toBe(true);
    expect(claimBody.data.reward).toEqual({ value: "50000000", display: "0.050000000 AMOCA" });
    expect(claimBody.data.coin).toEqual({
      id: "coin:2",
      owner: ALICE,
      value: "50000000",
      display: "0.050000000 AMOCA",
    });

    const again = await t.app.request(callAs(ALICE, "/api/v1/staking/stakes/stake:1/claim"));
    expect(again.status).toBe(409);
    expect((await readJson<ErrorBody>(again)).error.code).toBe("ALREADY_CLAIMED");

    const unstake = await t.app.request(callAs(ALICE, "/api/v1/staking/stakes/stake:1/unstake"));
    expect(unstake.status).toBe(200);
    expect((await readJson<{ data: CoinBody }>(unstake)).data).toEqual({
      id: "coin:3",
      owner: ALICE,
      value: "1000000000",
      display: "1.000000000 AMOCA",
    });

    const gone = await t.app.request("/api/v1/staking/stakes/stake:1");
    expect(gone.status).toBe(404);
    expect((await readJson<ErrorBody>(gone)).error).toEqual({
      code: "STAKE_NOT_FOUND",
      message: 'Stake "stake:1" has been unstaked',
    });
  });

  it("only lets the owner claim", async () => {
    await stake(SECONDS_PER_YEAR);
    t.clock.advance(SECONDS_PER_YEAR);

    const res = await t.app.request(callAs(BOB, "/api/v1/staking/stakes/stake:1/claim"));

    expect(res.status).toBe(403);
    expect(t.protocol.supply().total).toBe(ONE_TOKEN);
  });

  it("returns no coin when the reward rounds to zero", async () => {
    t.protocol.mintTokens(TREASURY, 1n, BOB);
    await t.app.request(
      callAs(BOB, "/api/v1/staking/stakes", "POST", { coinId: "coin:2", duration: 86_400 }),
    );
    t.clock.advance(86_400);

    const res = await t.app.request(callAs(BOB, "/api/v1/staking/stakes/stake:1/claim"));
    const body = await readJson<{ data: { reward: AmountBody; coin: CoinBody | null } }>(res);

    expect(res.status).toBe(200);
    expect(body.data.reward.value).toBe("0");
    expect(body.data.coin).toBeNull();
  });
});
