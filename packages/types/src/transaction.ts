/**
 * Transaction Context
 *
 * What an engine sees while executing one state transition: who sent it,
 * the ledger time it runs at, and a buffer for the events it produces.
 * The executor commits the buffer only if the transition returns normally.
 */

import type { Address } from "./financial.js";
import type { EpochSeconds } from "./time.js";
import type { EventSource } from "./event.js";

/**
 * An event produced during a transition, before the executor stamps
 * it with metadata.
 */
export interface PendingEvent {
  /** Stream the event belongs to (usually the record ID it touched) */
  readonly streamId: string;
  readonly type: string;
  readonly source: EventSource;
  readonly payload: Readonly<Record<string, unknown>>;
}

export interface TxContext {
  /** Unique transaction identifier */
  readonly txId: string;

  /** Authenticated sender of the transaction */
  readonly sender: Address;

  /** Ledger time, read once per transaction */
  readonly now: EpochSeconds;

  /**
   * Buffer an event for commit. Throws if the event is rejected, so
   * engines emit before they mutate.
   */
  emit(event: PendingEvent): void;
}

/**
 * A context that just collects emitted events.
 * Handy for driving an engine directly, outside the executor. An
 * optional `check` runs on each event first and may throw to reject it.
 */
export class RecordingContext implements TxContext {
  readonly events: PendingEvent[] = [];

  constructor(
    readonly sender: Address,
    readonly now: EpochSeconds,
    readonly txId: string = `tx:${sender}:${now}`,
    private readonly check?: (event: PendingEvent) => void,
  ) {}

  emit(event: PendingEvent): void {
    this.check?.(event);
    this.events.push(event);
  }
}
