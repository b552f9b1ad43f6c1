/**
 * @amoca/event-store: In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Suitable for:
 * - Unit and integration tests
 * - A single-process node whose state is rebuilt on start
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events returned)
 * - Synchronous subscription dispatch, after the commit is complete
 * - Subscriber errors are reported to delivery-error handlers, never
 *   thrown out of append or commit
 * - No durability guarantees
 */

import type { DomainEvent } from "@amoca/types";
import type {
  AppendOptions,
  AppendResult,
  CommitRecord,
  CommitResult,
  DeliveryErrorHandler,
  DeliveryFailure,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
  UnhashedEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

/**
 * In-memory event store.
 *
 * All events are stored in two data structures:
 * - Per-stream arrays (indexed by streamId) for stream reads
 * - Global array for readAll and global subscriptions
 */
export class InMemoryEventStore implements EventStore {
  /** Per-stream event storage */
  private readonly _streams = new Map<string, StoredEvent[]>();

  /** Global event log (all streams, in append order) */
  private readonly _globalLog: StoredEvent[] = [];

  /** Per-stream subscribers */
  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();

  /** Global subscribers (all streams) */
  private readonly _globalSubscribers = new Set<EventHandler>();

  /** Told about subscribers that throw */
  private readonly _deliveryErrorHandlers = new Set<DeliveryErrorHandler>();

  /** Hash of the last appended event (for chain linking) */
  private _lastHash: string = GENESIS_HASH;

  private _deliveryFailures = 0;

  constructor(options: InMemoryEventStoreOptions = {}) {
    if (options.onDeliveryError !== undefined) {
      this._deliveryErrorHandlers.add(options.onDeliveryError);
    }
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const currentVersion = this.streamVersion(streamId);
    const expectedVersion = options?.expectedVersion;

    if (expectedVersion === "no_stream" && currentVersion !== 0) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" already exists (version ${currentVersion}), expected no_stream`,
        streamId,
      );
    }
    if (typeof expectedVersion === "number" && currentVersion !== expectedVersion) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${currentVersion}, expected ${expectedVersion}`,
        streamId,
      );
    }

    const appendedAt = options?.appendedAt ?? events[0]?.metadata.timestamp ?? new Date().toISOString();
    const stored = events.map((event) => this._store(streamId, event, appendedAt));
    this._dispatch(stored);

    return {
      streamId,
      fromVersion: currentVersion + 1,
      toVersion: currentVersion + events.length,
      count: events.length,
    };
  }

  commit(records: readonly CommitRecord[], appendedAt?: string): CommitResult {
    if (records.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot commit zero events");
    }
    for (const record of records) {
      this._validateStreamId(record.streamId);
    }

    const fromPosition = this.globalPosition() + 1;
    const at = appendedAt ?? records[0]?.event.metadata.timestamp ?? new Date().toISOString();
    const streams: string[] = [];
    const stored: StoredEvent[] = [];

    for (const record of records) {
      if (!streams.includes(record.streamId)) streams.push(record.streamId);
      stored.push(this._store(record.streamId, record.event, at));
    }

    this._dispatch(stored);

    return {
      fromPosition,
      toPosition: fromPosition + records.length - 1,
      count: records.length,
      streams,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    const direction = options?.direction ?? "forward";
    const fromVersion = options?.fromVersion ?? (direction === "forward" ? 1 : stream.length);

    const result =
      direction === "forward"
        ? stream.filter((e) => e.version >= fromVersion)
        : stream.filter((e) => e.version <= fromVersion).reverse();

    return limit(result, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const direction = options?.direction ?? "forward";
    const fromPosition =
      options?.fromPosition ?? (direction === "forward" ? 1 : this._globalLog.length);
    const type = options?.type;

    let result =
      direction === "forward"
        ? this._globalLog.filter((e) => e.globalPosition >= fromPosition)
        : this._globalLog.filter((e) => e.globalPosition <= fromPosition).reverse();

    if (type !== undefined) {
      result = result.filter((e) => e.event.type === type);
    }

    return limit(result, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._validateStreamId(streamId);

    let subscribers = this._streamSubscribers.get(streamId);
    if (subscribers === undefined) {
      subscribers = new Set();
      this._streamSubscribers.set(streamId, subscribers);
    }
    const set = subscribers;
    set.add(handler);

    return {
      unsubscribe: () => {
        set.delete(handler);
        if (set.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);

    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  onDeliveryError(handler: DeliveryErrorHandler): Subscription {
    this._deliveryErrorHandlers.add(handler);

    return {
      unsubscribe: () => {
        this._deliveryErrorHandlers.delete(handler);
      },
    };
  }

  /** Number of subscriber calls that have thrown. */
  get deliveryFailures(): number {
    return this._deliveryFailures;
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _store(streamId: string, event: DomainEvent, appendedAt: string): StoredEvent {
    let stream = this._streams.get(streamId);
    if (stream === undefined) {
      stream = [];
      this._streams.set(streamId, stream);
    }

    const base: UnhashedEvent = {
      event: {
        type: event.type,
        metadata: event.metadata,
        payload: event.payload,
      },
      streamId,
      version: stream.length + 1,
      globalPosition: this._globalLog.length + 1,
      appendedAt,
    };

    const previousHash = this._lastHash;
    const stored: StoredEvent = {
      ...base,
      hash: computeEventHash(base, previousHash),
      previousHash,
    };
    this._lastHash = stored.hash;

    stream.push(stored);
    this._globalLog.push(stored);
    return stored;
  }

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _dispatch(events: readonly StoredEvent[]): void {
    for (const event of events) {
      const streamSubs = this._streamSubscribers.get(event.streamId);
      if (streamSubs !== undefined) {
        for (const handler of streamSubs) this._deliver(handler, event);
      }
      for (const handler of this._globalSubscribers) this._deliver(handler, event);
    }
  }

  private _deliver(handler: EventHandler, event: StoredEvent): void {
    try {
      handler(event);
    } catch (error) {
      this._deliveryFailures++;
      const failure: DeliveryFailure = {
        streamId: event.streamId,
        globalPosition: event.globalPosition,
        error,
      };
      for (const onError of this._deliveryErrorHandlers) onError(failure);
    }
  }
}

export interface InMemoryEventStoreOptions {
  readonly onDeliveryError?: DeliveryErrorHandler;
}

function limit(events: StoredEvent[], maxCount: number | undefined): StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
