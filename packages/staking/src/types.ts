/**
 * @amoca/staking: Types for the staking engine.
 *
 * Rules:
 * - Pool parameters are fixed for the pool's lifetime
 * - `pool.totalStaked` always equals the sum of its live stake amounts
 * - `stake.claimed` only ever goes false → true
 * - An unstaked stake is gone; its ID is never valid again
 */

import type { Address, Amount, EpochSeconds } from "@amoca/types";
import type { Coin } from "@amoca/ledger";

// =============================================================================
// Records
// =============================================================================

export interface StakingPool {
  readonly id: string;

  /** Sum of principal across live stakes in this pool */
  readonly totalStaked: Amount;

  /** Annual yield in whole percent (0..100) */
  readonly rewardRate: number;

  /** Shortest lock a stake may request, in seconds */
  readonly minStakeDuration: number;

  readonly createdAt: EpochSeconds;
}

export interface Stake {
  readonly id: string;
  readonly poolId: string;
  readonly owner: Address;

  /** Locked principal */
  readonly amount: Amount;

  readonly startTime: EpochSeconds;

  /** Claim and unstake are refused before this time */
  readonly endTime: EpochSeconds;

  readonly claimed: boolean;
}

/**
 * Outcome of a successful claim.
 * `coin` is absent when the reward floors to zero.
 */
export interface ClaimResult {
  readonly stake: Stake;
  readonly reward: Amount;
  readonly coin?: Coin;
}

// =============================================================================
// Errors
// =============================================================================

export type StakingErrorCode =
  | "UNAUTHORIZED"
  | "INVALID_DURATION"
  | "INVALID_RATE"
  | "ALREADY_CLAIMED"
  | "STAKE_NOT_MATURED"
  | "STAKE_NOT_FOUND"
  | "POOL_NOT_FOUND"
  | "POOL_EXISTS";

export class StakingError extends Error {
  public readonly code: StakingErrorCode;

  constructor(code: StakingErrorCode, message: string) {
    super(message);
    this.name = "StakingError";
    this.code = code;
  }
}
