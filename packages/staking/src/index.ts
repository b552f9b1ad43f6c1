/**
 * @amoca/staking: Time-locked staking with yield.
 *
 * Enforces staking invariants:
 * - pool.totalStaked = Σ live stake amounts
 * - A stake's reward is claimed at most once
 * - Nothing is claimed or unstaked before the stake matures
 * - An unstaked stake can never be used again
 */

export { StakingEngine, STAKING_EVENTS, MAX_REWARD_RATE } from "./staking-engine.js";
export { computeReward } from "./reward.js";

export type { StakingPool, Stake, ClaimResult, StakingErrorCode } from "./types.js";
export { StakingError } from "./types.js";
