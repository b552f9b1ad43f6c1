/**
 * @amoca/governance: Governance Engine.
 *
 * Proposals open a voting window at creation. Votes add weight to the
 * yes or no tally while the window is open.
 *
 * Duplicate voting is allowed and weight is self-declared unless a
 * VoteWeightPolicy is configured.
 */

import { MAX_AMOUNT } from "@amoca/types";
import type { Address, Amount, EpochSeconds, TxContext } from "@amoca/types";
import type {
  GovernanceOptions,
  Proposal,
  ProposalOutcome,
  ProposalPhase,
  ProposalStatus,
  VoteChoice,
  VoteWeightPolicy,
} from "./types.js";
import { GovernanceError } from "./types.js";

export const GOVERNANCE_EVENTS = {
  PROPOSAL_CREATED: "governance.proposal.created",
  VOTE_CAST: "governance.vote.cast",
} as const;

export class GovernanceEngine {
  private readonly _proposals = new Map<string, Proposal>();
  private readonly _weightPolicy: VoteWeightPolicy | undefined;
  private _nextProposal = 1;

  constructor(options: GovernanceOptions = {}) {
    this._weightPolicy = options.weightPolicy;
  }

  /** Name of the configured weight policy, or "declared" when none is set. */
  get weightMode(): string {
    return this._weightPolicy?.name ?? "declared";
  }

  // ─── Transitions ─────────────────────────────────────────────────────

  /**
   * Open a proposal whose voting window is [now, now + duration].
   */
  createProposal(ctx: TxContext, title: string, description: string, duration: number): Proposal {
    if (!Number.isInteger(duration) || duration < 0) {
      throw new GovernanceError(
        "INVALID_DURATION",
        `Voting duration must be a non-negative integer, got ${duration}`,
      );
    }
    const endTime = ctx.now + duration;
    if (!Number.isSafeInteger(endTime)) {
      throw new GovernanceError("INVALID_DURATION", `Voting duration ${duration} runs past the clock's range`);
    }

    const proposal: Proposal = {
      id: `proposal:${String(this._nextProposal)}`,
      title,
      description,
      proposer: ctx.sender,
      startTime: ctx.now,
      endTime,
      yesVotes: 0n,
      noVotes: 0n,
      executed: false,
    };

    ctx.emit({
      streamId: proposal.id,
      type: GOVERNANCE_EVENTS.PROPOSAL_CREATED,
      source: "governance",
      payload: {
        proposalId: proposal.id,
        title,
        proposer: proposal.proposer,
        startTime: proposal.startTime,
        endTime: proposal.endTime,
      },
    });

    this._nextProposal++;
    this._proposals.set(proposal.id, proposal);
    return proposal;
  }

  /**
   * Add `weight` to the chosen tally.
   */
  vote(ctx: TxContext, proposalId: string, choice: VoteChoice, weight: Amount): Proposal {
    const proposal = this.requireProposal(proposalId);

    if (ctx.now < proposal.startTime || ctx.now > proposal.endTime) {
      throw new GovernanceError(
        "VOTING_CLOSED",
        `Voting on "${proposal.id}" is open from ${proposal.startTime} to ${proposal.endTime}, now is ${ctx.now}`,
      );
    }
    if (proposal.executed) {
      throw new GovernanceError("PROPOSAL_ALREADY_EXECUTED", `Proposal "${proposal.id}" has been executed`);
    }
    if (weight <= 0n) {
      throw new GovernanceError("INVALID_WEIGHT", `Vote weight must be positive, got ${weight.toString()}`);
    }
    if (this._weightPolicy !== undefined && !this._weightPolicy.approve(ctx.sender, proposal, weight)) {
      throw new GovernanceError(
        "WEIGHT_REJECTED",
        `${this._weightPolicy.name} policy rejected weight ${weight.toString()} from ${ctx.sender}`,
      );
    }

    const current = choice === "yes" ? proposal.yesVotes : proposal.noVotes;
    const next = current + weight;
    if (next > MAX_AMOUNT) {
      throw new GovernanceError(
        "ARITHMETIC_OVERFLOW",
        `The ${choice} tally on "${proposal.id}" would exceed the maximum amount`,
      );
    }

    const updated: Proposal =
      choice === "yes" ? { ...proposal, yesVotes: next } : { ...proposal, noVotes: next };

    ctx.emit({
      streamId: proposal.id,
      type: GOVERNANCE_EVENTS.VOTE_CAST,
      source: "governance",
      payload: { proposalId: proposal.id, voter: ctx.sender, choice, weight: weight.toString() },
    });

    this._proposals.set(proposal.id, updated);
    return updated;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  getProposal(proposalId: string): Proposal | undefined {
    return this._proposals.get(proposalId);
  }

  requireProposal(proposalId: string): Proposal {
    const proposal = this._proposals.get(proposalId);
    if (proposal === undefined) {
      throw new GovernanceError("PROPOSAL_NOT_FOUND", `Proposal not found: "${proposalId}"`);
    }
    return proposal;
  }

  /** All proposals in creation order. */
  listProposals(): readonly Proposal[] {
    return [...this._proposals.values()];
  }

  status(proposalId: string, now: EpochSeconds): ProposalStatus {
    const proposal = this.requireProposal(proposalId);
    return {
      proposalId: proposal.id,
      phase: phaseOf(proposal, now),
      leading: outcomeOf(proposal),
      yesVotes: proposal.yesVotes,
      noVotes: proposal.noVotes,
      totalVotes: proposal.yesVotes + proposal.noVotes,
    };
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────

export function phaseOf(proposal: Proposal, now: EpochSeconds): ProposalPhase {
  if (now < proposal.startTime) return "pending";
  if (now > proposal.endTime) return "closed";
  return "active";
}

export function outcomeOf(proposal: Proposal): ProposalOutcome {
  if (proposal.yesVotes > proposal.noVotes) return "yes";
  if (proposal.noVotes > proposal.yesVotes) return "no";
  return "tie";
}

/**
 * Policy that caps a vote's weight at a per-voter allowance, such as the
 * voter's live staked principal.
 */
export function cappedWeightPolicy(
  name: string,
  allowance: (voter: Address) => Amount,
): VoteWeightPolicy {
  return {
    name,
    approve: (voter, _proposal, weight) => weight <= allowance(voter),
  };
}
