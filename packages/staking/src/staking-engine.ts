/**
 * @amoca/staking: Staking Engine.
 *
 * Time-locked staking with a floor-rounded annual reward.
 *
 * API surface:
 * - createPool() - Genesis; treasury authority required
 * - stake() - Lock a coin for at least the pool's minimum duration
 * - claimRewards() - Once per stake, after maturity; reward is minted
 * - unstake() - After maturity; principal comes back as a new coin
 * - getPool() / getStake() / stakesOf() / previewReward() - Queries
 *
 * Principal sits in the ledger's locked escrow while a stake is live,
 * so `ledger.lockedValue` tracks the sum of every pool's totalStaked.
 * Every operation computes all derived values and emits its events
 * before its first mutation; a thrown error leaves pool, stakes and
 * ledger untouched.
 */

import type { Address, Amount, TxContext } from "@amoca/types";
import { checkedAdd, checkedSub } from "@amoca/ledger";
import type { Coin, ProtocolCapability, TokenLedger, TreasuryAuthority } from "@amoca/ledger";
import { computeReward } from "./reward.js";
import type { ClaimResult, Stake, StakingPool } from "./types.js";
import { StakingError } from "./types.js";

export const STAKING_EVENTS = {
  POOL_CREATED: "staking.pool.created",
  STAKE_CREATED: "staking.stake.created",
  REWARD_CLAIMED: "staking.reward.claimed",
} as const;

/** Upper bound on the annual reward rate, in percent. */
export const MAX_REWARD_RATE = 100;

export class StakingEngine {
  private readonly _pools = new Map<string, StakingPool>();
  private readonly _stakes = new Map<string, Stake>();
  private readonly _unstaked = new Set<string>();
  private readonly _capability: ProtocolCapability;
  private _nextPool = 1;
  private _nextStake = 1;

  constructor(private readonly ledger: TokenLedger) {
    this._capability = ledger.gate.issueProtocolCapability("staking");
  }

  // ─── Genesis ─────────────────────────────────────────────────────────

  /**
   * Create the staking pool. Only one pool exists per engine.
   */
  createPool(
    ctx: TxContext,
    authority: TreasuryAuthority,
    rewardRate: number,
    minStakeDuration: number,
  ): StakingPool {
    this.ledger.gate.assertTreasury(authority, ctx.sender, "create a staking pool");
    if (this._pools.size > 0) {
      throw new StakingError("POOL_EXISTS", "The staking pool has already been created");
    }
    if (!Number.isInteger(rewardRate) || rewardRate < 0 || rewardRate > MAX_REWARD_RATE) {
      throw new StakingError(
        "INVALID_RATE",
        `Reward rate must be an integer between 0 and ${MAX_REWARD_RATE}, got ${rewardRate}`,
      );
    }
    if (!Number.isSafeInteger(minStakeDuration) || minStakeDuration < 0) {
      throw new StakingError(
        "INVALID_DURATION",
        `Minimum stake duration must be a non-negative integer, got ${minStakeDuration}`,
      );
    }

    const pool: StakingPool = {
      id: `pool:${String(this._nextPool)}`,
      totalStaked: 0n,
      rewardRate,
      minStakeDuration,
      createdAt: ctx.now,
    };

    ctx.emit({
      streamId: pool.id,
      type: STAKING_EVENTS.POOL_CREATED,
      source: "staking",
      payload: { poolId: pool.id, rewardRate, minStakeDuration },
    });

    this._nextPool++;
    this._pools.set(pool.id, pool);
    return pool;
  }

  // ─── Transitions ─────────────────────────────────────────────────────

  /**
   * Lock the sender's coin into a new stake maturing `duration` seconds
   * from now.
   */
  stake(ctx: TxContext, poolId: string, coinId: string, duration: number): Stake {
    const pool = this.requirePool(poolId);
    if (!Number.isInteger(duration) || duration < pool.minStakeDuration) {
      throw new StakingError(
        "INVALID_DURATION",
        `Stake duration must be an integer of at least ${pool.minStakeDuration} seconds, got ${duration}`,
      );
    }
    const endTime = ctx.now + duration;
    if (!Number.isSafeInteger(endTime)) {
      throw new StakingError("INVALID_DURATION", `Stake duration ${duration} runs past the clock's range`);
    }

    const coin = this.ledger.requireCoin(coinId);
    const newTotal = checkedAdd(pool.totalStaked, coin.value);

    const stake: Stake = {
      id: `stake:${String(this._nextStake)}`,
      poolId: pool.id,
      owner: ctx.sender,
      amount: coin.value,
      startTime: ctx.now,
      endTime,
      claimed: false,
    };

    ctx.emit({
      streamId: stake.id,
      type: STAKING_EVENTS.STAKE_CREATED,
      source: "staking",
      payload: {
        stakeId: stake.id,
        poolId: pool.id,
        owner: stake.owner,
        amount: stake.amount.toString(),
        startTime: stake.startTime,
        endTime: stake.endTime,
      },
    });

    // Ownership is checked here, before anything changes.
    this.ledger.lock(ctx, this._capability, coinId);
    this._nextStake++;
    this._stakes.set(stake.id, stake);
    this._pools.set(pool.id, { ...pool, totalStaked: newTotal });
    return stake;
  }

  /**
   * Mint the stake's reward to its owner and mark it claimed.
   * Principal stays locked.
   */
  claimRewards(ctx: TxContext, stakeId: string): ClaimResult {
    const stake = this.requireOwnedStake(stakeId, ctx.sender);
    if (stake.claimed) {
      throw new StakingError("ALREADY_CLAIMED", `Rewards for "${stake.id}" have already been claimed`);
    }
    this.assertMatured(stake, ctx.now);

    const reward = this.rewardFor(stake);

    ctx.emit({
      streamId: stake.id,
      type: STAKING_EVENTS.REWARD_CLAIMED,
      source: "staking",
      payload: {
        stakeId: stake.id,
        owner: stake.owner,
        reward: reward.toString(),
        ...(reward > 0n ? { coinId: this.ledger.nextCoinId } : {}),
      },
    });

    // The mint emits its own event before touching the ledger.
    const coin = reward > 0n ? this.ledger.mint(ctx, this._capability, reward, stake.owner) : undefined;
    const claimed: Stake = { ...stake, claimed: true };
    this._stakes.set(stake.id, claimed);

    return coin !== undefined ? { stake: claimed, reward, coin } : { stake: claimed, reward };
  }

  /**
   * Remove a matured stake and return its principal as a new coin.
   * Works whether or not the reward was claimed.
   */
  unstake(ctx: TxContext, stakeId: string): Coin {
    const stake = this.requireOwnedStake(stakeId, ctx.sender);
    this.assertMatured(stake, ctx.now);

    const pool = this.requirePool(stake.poolId);
    const newTotal = checkedSub(pool.totalStaked, stake.amount);
    const coin = this.ledger.release(ctx, this._capability, stake.amount, stake.owner);

    this._stakes.delete(stake.id);
    this._unstaked.add(stake.id);
    this._pools.set(pool.id, { ...pool, totalStaked: newTotal });

    return coin;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  getPool(poolId: string): StakingPool | undefined {
    return this._pools.get(poolId);
  }

  /** The pool created at genesis, if any. */
  get pool(): StakingPool | undefined {
    for (const pool of this._pools.values()) return pool;
    return undefined;
  }

  getStake(stakeId: string): Stake | undefined {
    return this._stakes.get(stakeId);
  }

  /**
   * Get a live stake, throwing STAKE_NOT_FOUND otherwise.
   */
  requireStake(stakeId: string): Stake {
    const stake = this._stakes.get(stakeId);
    if (stake === undefined) {
      const reason = this._unstaked.has(stakeId) ? "has been unstaked" : "does not exist";
      throw new StakingError("STAKE_NOT_FOUND", `Stake "${stakeId}" ${reason}`);
    }
    return stake;
  }

  stakesOf(owner: Address): readonly Stake[] {
    return [...this._stakes.values()].filter((s) => s.owner === owner);
  }

  /** Sum of an owner's live principal across all pools. */
  stakedBy(owner: Address): Amount {
    let total = 0n;
    for (const stake of this._stakes.values()) {
      if (stake.owner === owner) total += stake.amount;
    }
    return total;
  }

  /**
   * The reward a claim would pay out, or 0 once claimed.
   * Ignores maturity: the figure is fixed when the stake is created.
   */
  previewReward(stakeId: string): Amount {
    const stake = this.requireStake(stakeId);
    return stake.claimed ? 0n : this.rewardFor(stake);
  }

  // ─── Private ─────────────────────────────────────────────────────────

  private requirePool(poolId: string): StakingPool {
    const pool = this._pools.get(poolId);
    if (pool === undefined) {
      throw new StakingError("POOL_NOT_FOUND", `Staking pool not found: "${poolId}"`);
    }
    return pool;
  }

  private requireOwnedStake(stakeId: string, caller: Address): Stake {
    const stake = this.requireStake(stakeId);
    if (stake.owner !== caller) {
      throw new StakingError("UNAUTHORIZED", `Stake "${stakeId}" is not owned by ${caller}`);
    }
    return stake;
  }

  private assertMatured(stake: Stake, now: number): void {
    if (now < stake.endTime) {
      throw new StakingError(
        "STAKE_NOT_MATURED",
        `Stake "${stake.id}" matures at ${stake.endTime}, now is ${now}`,
      );
    }
  }

  private rewardFor(stake: Stake): Amount {
    const pool = this.requirePool(stake.poolId);
    return computeReward(stake.amount, pool.rewardRate, stake.endTime - stake.startTime);
  }
}
