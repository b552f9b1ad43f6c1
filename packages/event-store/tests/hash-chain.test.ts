/**
 * Tests for event store hash chain: tamper-evident event log.
 */

import { describe, it, expect } from "vitest";
import type { DomainEvent } from "@amoca/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { computeEventHash, verifyHashChain, GENESIS_HASH } from "../src/hash-chain.js";
import type { StoredEvent, UnhashedEvent } from "../src/types.js";

function makeEvent(type: string, payload: Record<string, unknown> = {}): DomainEvent {
  return {
    type,
    metadata: {
      eventId: `evt-${type}`,
      timestamp: "2026-01-01T00:00:00.000Z",
      actor: "0xad",
      correlationId: "tx:1",
      source: "ledger",
    },
    payload,
  };
}

const BASE: UnhashedEvent = {
  event: makeEvent("test"),
  streamId: "s",
  version: 1,
  globalPosition: 1,
  appendedAt: "2026-01-01T00:00:00.000Z",
};

// =============================================================================
// computeEventHash
// =============================================================================

describe("computeEventHash", () => {
  it("produces a 64-char hex string", () => {
    expect(computeEventHash(BASE, GENESIS_HASH)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("is deterministic for the same input", () => {
    expect(computeEventHash(BASE, GENESIS_HASH)).toBe(computeEventHash({ ...BASE }, GENESIS_HASH));
  });

  it("ignores payload key order", () => {
    const a: UnhashedEvent = { ...BASE, event: makeEvent("test", { x: "1", y: "2" }) };
    const b: UnhashedEvent = { ...BASE, event: makeEvent("test", { y: "2", x: "1" }) };
    expect(computeEventHash(a, GENESIS_HASH)).toBe(computeEventHash(b, GENESIS_HASH));
  });

  it("changes when event content changes", () => {
    const modified: UnhashedEvent = { ...BASE, event: makeEvent("test", { tampered: true }) };
    expect(computeEventHash(BASE, GENESIS_HASH)).not.toBe(computeEventHash(modified, GENESIS_HASH));
  });

  it("changes when previousHash changes", () => {
    expect(computeEventHash(BASE, GENESIS_HASH)).not.toBe(computeEventHash(BASE, "other"));
  });
});

// =============================================================================
// Store chain
// =============================================================================

describe("InMemoryEventStore hash chain", () => {
  it("links the first event to genesis and each event to its predecessor", () => {
    const store = new InMemoryEventStore();
    store.append("a", [makeEvent("one")]);
    store.commit([
      { streamId: "b", event: makeEvent("two") },
      { streamId: "a", event: makeEvent("three") },
    ]);

    const events = store.readAll();
    expect(events[0]?.previousHash).toBe(GENESIS_HASH);
    expect(events[1]?.previousHash).toBe(events[0]?.hash);
    expect(events[2]?.previousHash).toBe(events[1]?.hash);
  });

  it("verifies an untouched log", () => {
    const store = new InMemoryEventStore();
    store.append("a", [makeEvent("one"), makeEvent("two")]);

    expect(store.verifyIntegrity()).toEqual({ valid: true, lastVerifiedPosition: 2, errors: [] });
  });

  it("verifies an empty log", () => {
    expect(new InMemoryEventStore().verifyIntegrity()).toEqual({
      valid: true,
      lastVerifiedPosition: 0,
      errors: [],
    });
  });
});

// =============================================================================
// verifyHashChain
// =============================================================================

describe("verifyHashChain", () => {
  function chain(count: number): StoredEvent[] {
    const store = new InMemoryEventStore();
    for (let i = 1; i <= count; i++) {
      store.append("s", [makeEvent(`e${String(i)}`, { n: i })]);
    }
    return [...store.readAll()];
  }

  it("detects a modified payload and stops advancing", () => {
    const events = chain(3);
    const second = events[1];
    if (second === undefined) throw new Error("missing event");
    events[1] = { ...second, event: { ...second.event, payload: { n: 99 } } };

    const result = verifyHashChain(events);

    expect(result.valid).toBe(false);
    expect(result.lastVerifiedPosition).toBe(1);
    expect(result.errors.map((e) => e.position)).toEqual([2]);
    expect(result.errors[0]?.reason).toMatch(/^Hash mismatch at position 2/);
  });

  it("detects a removed event", () => {
    const events = chain(3);
    const result = verifyHashChain([events[0], events[2]].filter((e): e is StoredEvent => e !== undefined));

    expect(result.valid).toBe(false);
    expect(result.errors[0]?.reason).toMatch(/^previousHash mismatch at position 3/);
  });
});
