/**
 * Event Types
 *
 * Append-only event architecture.
 * Every committed state transition is captured as one or more DomainEvents.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which transaction)
 * - Events are only recorded for committed transitions
 */

/** Which subsystem emitted an event. */
export type EventSource = "ledger" | "staking" | "governance" | "access";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp derived from the transaction's epoch */
  readonly timestamp: string;

  /** Address that submitted the transaction */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** Transaction ID; all events of one transition share it */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: EventSource;
}

/**
 * A domain event, discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "staking.stake.created") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload; amounts are base-unit decimal strings */
  readonly payload: Readonly<Record<string, unknown>>;
}
