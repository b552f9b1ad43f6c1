/**
 * Protocol: Composition root and transaction executor.
 *
 * Route handlers delegate to this class; they never drive the engines
 * directly. Every state transition goes through `execute`, which hands
 * the engine a TxContext, and appends the buffered events to the event
 * store only when the transition returns normally. The context checks
 * each event against the catalog as it is emitted, and engines emit
 * before they mutate, so a thrown error (a rejected event included)
 * leaves both the state and the event log as they were.
 */

import pino from "pino";
import type { Logger } from "pino";
import { SystemClock, toIsoTimestamp } from "@amoca/types";
import type { Address, Amount, Clock, EpochSeconds, PendingEvent, TxContext } from "@amoca/types";
import { TokenLedger } from "@amoca/ledger";
import type { Coin, SupplySummary, TreasuryAuthority } from "@amoca/ledger";
import { StakingEngine } from "@amoca/staking";
import type { ClaimResult, Stake, StakingPool } from "@amoca/staking";
import { GovernanceEngine, cappedWeightPolicy } from "@amoca/governance";
import type { Proposal, ProposalStatus, VoteChoice } from "@amoca/governance";
import { AccessRightsEngine } from "@amoca/access";
import type { DataAccessRight } from "@amoca/access";
import { InMemoryEventStore, createAmocaCatalog } from "@amoca/event-store";
import type {
  CommitRecord,
  EventCatalog,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "@amoca/event-store";

// =============================================================================
// Configuration
// =============================================================================

export interface ProtocolConfig {
  /** Address holding the treasury authority */
  readonly treasury: Address;

  /** Annual reward rate of the genesis pool, in percent */
  readonly rewardRate: number;

  /** Shortest stake the pool accepts, in seconds */
  readonly minStakeDuration: number;

  /**
   * "declared" accepts any positive weight; "staked" caps it at the
   * voter's live staked principal.
   */
  readonly voteWeightMode: "declared" | "staked";

  /** Addresses allowed to grant access rights; empty means anyone */
  readonly accessIssuers: readonly Address[];
}

export interface ProtocolDeps {
  readonly clock?: Clock;
  readonly eventStore?: InMemoryEventStore;
  readonly catalog?: EventCatalog;
  readonly logger?: Logger;
}

/** Balances and holdings of one address. */
export interface AccountSummary {
  readonly address: Address;
  readonly balance: Amount;
  readonly staked: Amount;
  readonly coins: readonly Coin[];
  readonly stakes: readonly Stake[];
  readonly rights: readonly DataAccessRight[];
}

// =============================================================================
// Protocol
// =============================================================================

export class Protocol {
  readonly ledger: TokenLedger;
  readonly staking: StakingEngine;
  readonly governance: GovernanceEngine;
  readonly access: AccessRightsEngine;
  readonly eventStore: InMemoryEventStore;
  readonly catalog: EventCatalog;

  private readonly _clock: Clock;
  private readonly _log: Logger;
  private readonly _authority: TreasuryAuthority;
  private readonly _pool: StakingPool;
  private _nextTx = 1;

  constructor(config: ProtocolConfig, deps: ProtocolDeps = {}) {
    this._clock = deps.clock ?? new SystemClock();
    this._log = deps.logger ?? pino({ level: "silent" });
    this.eventStore = deps.eventStore ?? new InMemoryEventStore();
    this.catalog = deps.catalog ?? createAmocaCatalog();
    this.eventStore.onDeliveryError((failure) => {
      this._log.error(
        { err: failure.error, streamId: failure.streamId, globalPosition: failure.globalPosition },
        "Event subscriber failed",
      );
    });

    this.ledger = new TokenLedger();
    this.staking = new StakingEngine(this.ledger);
    this.governance = new GovernanceEngine(
      config.voteWeightMode === "staked"
        ? { weightPolicy: cappedWeightPolicy("staked", (voter) => this.staking.stakedBy(voter)) }
        : {},
    );
    this.access = new AccessRightsEngine({ issuers: config.accessIssuers });

    this._authority = this.ledger.gate.createTreasuryAuthority(config.treasury);
    this._pool = this.execute(config.treasury, "genesis", (ctx) =>
      this.staking.createPool(ctx, this._authority, config.rewardRate, config.minStakeDuration),
    );

    this._log.info(
      {
        treasury: config.treasury,
        poolId: this._pool.id,
        rewardRate: config.rewardRate,
        voteWeightMode: this.governance.weightMode,
        accessRestricted: this.access.restricted,
      },
      "Protocol initialized",
    );
  }

  /** Current ledger time. */
  now(): EpochSeconds {
    return this._clock.now();
  }

  // ─── Executor ────────────────────────────────────────────────────────

  /**
   * Run one state transition as `sender`.
   *
   * Events are checked against the catalog as the transition emits
   * them, then stamped with metadata and committed together. If the
   * transition throws, nothing is committed and the error propagates.
   */
  execute<T>(sender: Address, operation: string, transition: (ctx: TxContext) => T): T {
    const txId = `tx:${String(this._nextTx++)}`;
    const now = this._clock.now();
    const pending: PendingEvent[] = [];
    const ctx: TxContext = {
      txId,
      sender,
      now,
      emit: (event) => {
        this.catalog.assertValid(event.type, event.source, event.payload);
        pending.push(event);
      },
    };

    let result: T;
    try {
      result = transition(ctx);
    } catch (err) {
      this._log.warn(
        {
          txId,
          operation,
          sender,
          code: err instanceof Error && "code" in err ? err.code : undefined,
          err: err instanceof Error ? err.message : String(err),
        },
        "Transition aborted",
      );
      throw err;
    }

    if (pending.length > 0) {
      const committed = this.eventStore.commit(this.stamp(pending, txId, sender, now), toIsoTimestamp(now));
      this._log.debug(
        { txId, operation, sender, events: committed.count, toPosition: committed.toPosition },
        "Transition committed",
      );
    } else {
      this._log.debug({ txId, operation, sender, events: 0 }, "Transition committed");
    }

    return result;
  }

  private stamp(
    pending: readonly PendingEvent[],
    txId: string,
    sender: Address,
    now: EpochSeconds,
  ): CommitRecord[] {
    const timestamp = toIsoTimestamp(now);
    return pending.map((event, i) => ({
      streamId: event.streamId,
      event: {
        type: event.type,
        metadata: {
          eventId: `${txId}:${String(i + 1)}`,
          timestamp,
          actor: sender,
          correlationId: txId,
          ...(i > 0 ? { causationId: `${txId}:${String(i)}` } : {}),
          source: event.source,
        },
        payload: event.payload,
      },
    }));
  }

  // ─── Tokens ──────────────────────────────────────────────────────────

  /** Mint with the treasury authority; `sender` must be its holder. */
  mintTokens(sender: Address, amount: Amount, recipient: Address): Coin {
    return this.execute(sender, "mint", (ctx) =>
      this.ledger.mint(ctx, this._authority, amount, recipient),
    );
  }

  transfer(sender: Address, coinId: string, recipient: Address): Coin {
    return this.execute(sender, "transfer", (ctx) => this.ledger.transfer(ctx, coinId, recipient));
  }

  split(sender: Address, coinId: string, amount: Amount): Coin {
    return this.execute(sender, "split", (ctx) => this.ledger.split(ctx, coinId, amount));
  }

  merge(sender: Address, targetId: string, sourceId: string): Coin {
    return this.execute(sender, "merge", (ctx) => this.ledger.merge(ctx, targetId, sourceId));
  }

  burn(sender: Address, coinId: string): Amount {
    return this.execute(sender, "burn", (ctx) => this.ledger.burn(ctx, coinId));
  }

  // ─── Staking ─────────────────────────────────────────────────────────

  stakeTokens(sender: Address, coinId: string, duration: number): Stake {
    return this.execute(sender, "stake", (ctx) =>
      this.staking.stake(ctx, this._pool.id, coinId, duration),
    );
  }

  claimRewards(sender: Address, stakeId: string): ClaimResult {
    return this.execute(sender, "claim", (ctx) => this.staking.claimRewards(ctx, stakeId));
  }

  unstakeTokens(sender: Address, stakeId: string): Coin {
    return this.execute(sender, "unstake", (ctx) => this.staking.unstake(ctx, stakeId));
  }

  // ─── Governance ──────────────────────────────────────────────────────

  createProposal(sender: Address, title: string, description: string, duration: number): Proposal {
    return this.execute(sender, "propose", (ctx) =>
      this.governance.createProposal(ctx, title, description, duration),
    );
  }

  voteOnProposal(sender: Address, proposalId: string, choice: VoteChoice, weight: Amount): Proposal {
    return this.execute(sender, "vote", (ctx) =>
      this.governance.vote(ctx, proposalId, choice, weight),
    );
  }

  // ─── Access ──────────────────────────────────────────────────────────

  createDataAccessRight(
    sender: Address,
    dataId: string,
    recipient: Address,
    accessLevel: number,
    expiration: EpochSeconds,
  ): DataAccessRight {
    return this.execute(sender, "grant", (ctx) =>
      this.access.grant(ctx, dataId, recipient, accessLevel, expiration),
    );
  }

  /** Read-only; nothing is committed. */
  verifyDataAccess(sender: Address, rightId: string, requiredLevel: number): boolean {
    return this.access.verify(rightId, requiredLevel, sender, this._clock.now());
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  get pool(): StakingPool {
    return this.staking.getPool(this._pool.id) ?? this._pool;
  }

  supply(): SupplySummary {
    return this.ledger.supply();
  }

  account(address: Address): AccountSummary {
    return {
      address,
      balance: this.ledger.balanceOf(address),
      staked: this.staking.stakedBy(address),
      coins: this.ledger.coinsOf(address),
      stakes: this.staking.stakesOf(address),
      rights: this.access.rightsOf(address),
    };
  }

  proposalStatus(proposalId: string): ProposalStatus {
    return this.governance.status(proposalId, this._clock.now());
  }

  readEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  readStream(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    return this.eventStore.read(streamId, options);
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }
}
