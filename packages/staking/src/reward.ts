/**
 * @amoca/staking: Reward formula.
 *
 *   reward = floor(amount × rate × duration / (100 × SECONDS_PER_YEAR))
 *
 * The intermediate product is unbounded bigint, so it cannot wrap. Only
 * the final result has to fit the amount range.
 */

import { SECONDS_PER_YEAR } from "@amoca/types";
import type { Amount } from "@amoca/types";
import { assertAmount } from "@amoca/ledger";

const DENOMINATOR = 100n * BigInt(SECONDS_PER_YEAR);

/**
 * Simple (non-compounding) yield on `amount` at `rewardRate` percent a
 * year over `duration` seconds, rounded down to whole base units.
 *
 * @example
 * computeReward(1_000_000_000n, 5, 31_536_000) // 50_000_000n
 * computeReward(1_000_000_000n, 5, 1)          // 1n
 */
export function computeReward(amount: Amount, rewardRate: number, duration: number): Amount {
  if (!Number.isInteger(rewardRate) || rewardRate < 0) {
    throw new RangeError(`Reward rate must be a non-negative integer, got ${rewardRate}`);
  }
  if (!Number.isInteger(duration) || duration < 0) {
    throw new RangeError(`Duration must be a non-negative integer, got ${duration}`);
  }

  const numerator = assertAmount(amount) * BigInt(rewardRate) * BigInt(duration);
  return assertAmount(numerator / DENOMINATOR);
}
