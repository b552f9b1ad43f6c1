/**
 * Response views.
 *
 * JSON has no bigint, so amounts leave the API as base-unit decimal
 * strings, each paired with a display string in whole tokens.
 */

import { TOKEN_SYMBOL } from "@amoca/types";
import type { Amount, EpochSeconds } from "@amoca/types";
import { formatAmount } from "@amoca/ledger";
import type { Coin, SupplySummary } from "@amoca/ledger";
import type { ClaimResult, Stake, StakingPool } from "@amoca/staking";
import type { Proposal, ProposalStatus } from "@amoca/governance";
import type { DataAccessRight } from "@amoca/access";

export interface AmountView {
  readonly value: string;
  readonly display: string;
}

export function amountView(amount: Amount): AmountView {
  return { value: amount.toString(), display: `${formatAmount(amount)} ${TOKEN_SYMBOL}` };
}

export function coinView(coin: Coin): { id: string; owner: string } & AmountView {
  return { id: coin.id, owner: coin.owner, ...amountView(coin.value) };
}

export function supplyView(supply: SupplySummary) {
  return {
    total: amountView(supply.total),
    circulating: amountView(supply.circulating),
    locked: amountView(supply.locked),
    coinCount: supply.coinCount,
  };
}

export function poolView(pool: StakingPool) {
  return {
    id: pool.id,
    totalStaked: amountView(pool.totalStaked),
    rewardRate: pool.rewardRate,
    minStakeDuration: pool.minStakeDuration,
    createdAt: pool.createdAt,
  };
}

export function stakeView(stake: Stake, now: EpochSeconds) {
  return {
    id: stake.id,
    poolId: stake.poolId,
    owner: stake.owner,
    amount: amountView(stake.amount),
    startTime: stake.startTime,
    endTime: stake.endTime,
    claimed: stake.claimed,
    matured: now >= stake.endTime,
  };
}

export function claimView(result: ClaimResult, now: EpochSeconds) {
  return {
    stake: stakeView(result.stake, now),
    reward: amountView(result.reward),
    coin: result.coin !== undefined ? coinView(result.coin) : null,
  };
}

export function proposalView(proposal: Proposal, status: ProposalStatus) {
  return {
    id: proposal.id,
    title: proposal.title,
    description: proposal.description,
    proposer: proposal.proposer,
    startTime: proposal.startTime,
    endTime: proposal.endTime,
    yesVotes: amountView(proposal.yesVotes),
    noVotes: amountView(proposal.noVotes),
    totalVotes: amountView(status.totalVotes),
    executed: proposal.executed,
    phase: status.phase,
    leading: status.leading,
  };
}

export function rightView(right: DataAccessRight) {
  return {
    id: right.id,
    dataId: right.dataId,
    owner: right.owner,
    accessLevel: right.accessLevel,
    expiration: right.expiration,
    issuer: right.issuer,
    createdAt: right.createdAt,
  };
}
