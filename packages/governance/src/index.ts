/**
 * @amoca/governance: Proposals and weighted voting.
 *
 * Enforces governance invariants:
 * - yesVotes + noVotes never decreases
 * - Votes only land inside the proposal's window
 * - An optional weight policy can cap what a voter declares
 */

export {
  GovernanceEngine,
  GOVERNANCE_EVENTS,
  phaseOf,
  outcomeOf,
  cappedWeightPolicy,
} from "./governance-engine.js";

export type {
  VoteChoice,
  Proposal,
  ProposalPhase,
  ProposalOutcome,
  ProposalStatus,
  VoteWeightPolicy,
  GovernanceOptions,
  GovernanceErrorCode,
} from "./types.js";
export { GovernanceError } from "./types.js";
