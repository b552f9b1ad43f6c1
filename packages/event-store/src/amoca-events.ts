/**
 * @amoca/event-store: Domain Event Definitions.
 *
 * The unified catalog of every event the token core emits.
 *
 * Naming convention: `<subsystem>.<entity>.<action>`
 *
 * Amounts travel as base-unit decimal strings, times as epoch seconds.
 */

import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Ledger Events
// =============================================================================

export interface TokensMintedPayload {
  readonly coinId: string;
  readonly amount: string;
  readonly recipient: string;
  /** Treasury holder address, or "protocol:<module>" */
  readonly minter: string;
}

export interface TokensBurnedPayload {
  readonly coinId: string;
  readonly amount: string;
  readonly owner: string;
}

// =============================================================================
// Staking Events
// =============================================================================

export interface PoolCreatedPayload {
  readonly poolId: string;
  readonly rewardRate: number;
  readonly minStakeDuration: number;
}

export interface StakeCreatedPayload {
  readonly stakeId: string;
  readonly poolId: string;
  readonly owner: string;
  readonly amount: string;
  readonly startTime: number;
  readonly endTime: number;
}

export interface RewardClaimedPayload {
  readonly stakeId: string;
  readonly owner: string;
  readonly reward: string;
  /** Absent when the reward rounds down to zero */
  readonly coinId?: string;
}

// =============================================================================
// Governance Events
// =============================================================================

export interface ProposalCreatedPayload {
  readonly proposalId: string;
  readonly title: string;
  readonly proposer: string;
  readonly startTime: number;
  readonly endTime: number;
}

export interface VoteCastPayload {
  readonly proposalId: string;
  readonly voter: string;
  readonly choice: "yes" | "no";
  readonly weight: string;
}

// =============================================================================
// Access Events
// =============================================================================

export interface AccessRightCreatedPayload {
  readonly rightId: string;
  readonly dataId: string;
  readonly owner: string;
  readonly accessLevel: number;
  readonly expiration: number;
  readonly issuer: string;
}

// =============================================================================
// Event Type Constants
// =============================================================================

export const AMOCA_EVENTS = {
  // Ledger
  TOKENS_MINTED: "ledger.tokens.minted",
  TOKENS_BURNED: "ledger.tokens.burned",

  // Staking
  POOL_CREATED: "staking.pool.created",
  STAKE_CREATED: "staking.stake.created",
  REWARD_CLAIMED: "staking.reward.claimed",

  // Governance
  PROPOSAL_CREATED: "governance.proposal.created",
  VOTE_CAST: "governance.vote.cast",

  // Access
  ACCESS_RIGHT_CREATED: "access.right.created",
} as const;

export type AmocaEventType = (typeof AMOCA_EVENTS)[keyof typeof AMOCA_EVENTS];

// =============================================================================
// Schema Definitions
// =============================================================================

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function hasString(obj: Record<string, unknown>, key: string): boolean {
  return typeof obj[key] === "string";
}

function hasInteger(obj: Record<string, unknown>, key: string): boolean {
  return Number.isInteger(obj[key]);
}

/** Base-unit amount string: digits only, no sign or decimal point. */
function hasAmount(obj: Record<string, unknown>, key: string): boolean {
  const value = obj[key];
  return typeof value === "string" && /^\d+$/.test(value);
}

const LEDGER_SCHEMAS: readonly EventSchema[] = [
  {
    type: AMOCA_EVENTS.TOKENS_MINTED,
    version: 1,
    description: "New tokens were minted to a recipient",
    source: "ledger",
    validate: (p): p is TokensMintedPayload =>
      isObject(p) &&
      hasString(p, "coinId") &&
      hasAmount(p, "amount") &&
      hasString(p, "recipient") &&
      hasString(p, "minter"),
  },
  {
    type: AMOCA_EVENTS.TOKENS_BURNED,
    version: 1,
    description: "A coin was burned and its value removed from supply",
    source: "ledger",
    validate: (p): p is TokensBurnedPayload =>
      isObject(p) && hasString(p, "coinId") && hasAmount(p, "amount") && hasString(p, "owner"),
  },
];

const STAKING_SCHEMAS: readonly EventSchema[] = [
  {
    type: AMOCA_EVENTS.POOL_CREATED,
    version: 1,
    description: "The staking pool was created at genesis",
    source: "staking",
    validate: (p): p is PoolCreatedPayload =>
      isObject(p) &&
      hasString(p, "poolId") &&
      hasInteger(p, "rewardRate") &&
      hasInteger(p, "minStakeDuration"),
  },
  {
    type: AMOCA_EVENTS.STAKE_CREATED,
    version: 1,
    description: "A coin was locked into a time-bound stake",
    source: "staking",
    validate: (p): p is StakeCreatedPayload =>
      isObject(p) &&
      hasString(p, "stakeId") &&
      hasString(p, "poolId") &&
      hasString(p, "owner") &&
      hasAmount(p, "amount") &&
      hasInteger(p, "startTime") &&
      hasInteger(p, "endTime"),
  },
  {
    type: AMOCA_EVENTS.REWARD_CLAIMED,
    version: 1,
    description: "A matured stake's reward was claimed",
    source: "staking",
    validate: (p): p is RewardClaimedPayload =>
      isObject(p) &&
      hasString(p, "stakeId") &&
      hasString(p, "owner") &&
      hasAmount(p, "reward") &&
      (p["coinId"] === undefined || hasString(p, "coinId")),
  },
];

const GOVERNANCE_SCHEMAS: readonly EventSchema[] = [
  {
    type: AMOCA_EVENTS.PROPOSAL_CREATED,
    version: 1,
    description: "A governance proposal was opened for voting",
    source: "governance",
    validate: (p): p is ProposalCreatedPayload =>
      isObject(p) &&
      hasString(p, "proposalId") &&
      hasString(p, "title") &&
      hasString(p, "proposer") &&
      hasInteger(p, "startTime") &&
      hasInteger(p, "endTime"),
  },
  {
    type: AMOCA_EVENTS.VOTE_CAST,
    version: 1,
    description: "A weighted vote was added to a proposal's tally",
    source: "governance",
    validate: (p): p is VoteCastPayload =>
      isObject(p) &&
      hasString(p, "proposalId") &&
      hasString(p, "voter") &&
      (p["choice"] === "yes" || p["choice"] === "no") &&
      hasAmount(p, "weight"),
  },
];

const ACCESS_SCHEMAS: readonly EventSchema[] = [
  {
    type: AMOCA_EVENTS.ACCESS_RIGHT_CREATED,
    version: 1,
    description: "A leveled, expiring data-access right was granted",
    source: "access",
    validate: (p): p is AccessRightCreatedPayload =>
      isObject(p) &&
      hasString(p, "rightId") &&
      hasString(p, "dataId") &&
      hasString(p, "owner") &&
      hasInteger(p, "accessLevel") &&
      hasInteger(p, "expiration") &&
      hasString(p, "issuer"),
  },
];

/**
 * All event schemas, grouped by subsystem.
 */
export const ALL_SCHEMAS: readonly EventSchema[] = [
  ...LEDGER_SCHEMAS,
  ...STAKING_SCHEMAS,
  ...GOVERNANCE_SCHEMAS,
  ...ACCESS_SCHEMAS,
];

/**
 * Create a catalog pre-populated with every domain event.
 */
export function createAmocaCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of ALL_SCHEMAS) {
    catalog.register(schema);
  }
  return catalog;
}
