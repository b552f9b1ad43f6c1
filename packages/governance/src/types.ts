/**
 * @amoca/governance: Types for proposals and voting.
 *
 * Rules:
 * - Tallies only grow
 * - Votes are accepted only inside [startTime, endTime]
 * - `executed` is part of the record but no transition sets it
 */

import type { Address, Amount, EpochSeconds } from "@amoca/types";

// =============================================================================
// Records
// =============================================================================

export type VoteChoice = "yes" | "no";

export interface Proposal {
  readonly id: string;
  readonly title: string;
  readonly description: string;
  readonly proposer: Address;
  readonly startTime: EpochSeconds;
  readonly endTime: EpochSeconds;
  readonly yesVotes: Amount;
  readonly noVotes: Amount;
  readonly executed: boolean;
}

/** Where a proposal sits relative to its voting window. */
export type ProposalPhase = "pending" | "active" | "closed";

export type ProposalOutcome = "yes" | "no" | "tie";

export interface ProposalStatus {
  readonly proposalId: string;
  readonly phase: ProposalPhase;
  readonly leading: ProposalOutcome;
  readonly yesVotes: Amount;
  readonly noVotes: Amount;
  readonly totalVotes: Amount;
}

// =============================================================================
// Vote Weight Policy
// =============================================================================

/**
 * Decides whether a voter may cast `weight` on a proposal.
 * Without a policy, any positive declared weight is accepted.
 */
export interface VoteWeightPolicy {
  readonly name: string;
  approve(voter: Address, proposal: Proposal, weight: Amount): boolean;
}

export interface GovernanceOptions {
  readonly weightPolicy?: VoteWeightPolicy;
}

// =============================================================================
// Errors
// =============================================================================

export type GovernanceErrorCode =
  | "PROPOSAL_NOT_FOUND"
  | "VOTING_CLOSED"
  | "PROPOSAL_ALREADY_EXECUTED"
  | "INVALID_DURATION"
  | "INVALID_WEIGHT"
  | "WEIGHT_REJECTED"
  | "ARITHMETIC_OVERFLOW";

export class GovernanceError extends Error {
  public readonly code: GovernanceErrorCode;

  constructor(code: GovernanceErrorCode, message: string) {
    super(message);
    this.name = "GovernanceError";
    this.code = code;
  }
}
