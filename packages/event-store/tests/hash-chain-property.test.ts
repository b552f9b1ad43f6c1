/**
 * Property-based tests for hash chain integrity.
 *
 * Uses fast-check to verify invariants:
 * 1. Any sequence of commits → valid chain
 * 2. Modifying any event's payload → breaks the chain at that event
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { DomainEvent } from "@amoca/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { verifyHashChain } from "../src/hash-chain.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbDomainEvent: fc.Arbitrary<DomainEvent> = fc.record({
  type: fc.constantFrom("ledger.tokens.minted", "staking.stake.created", "governance.vote.cast"),
  metadata: fc.record({
    eventId: fc.uuid(),
    timestamp: fc.constant("2026-01-01T00:00:00.000Z"),
    actor: fc.constantFrom("0xa1", "0xb2"),
    correlationId: fc.string({ minLength: 1, maxLength: 8 }),
    source: fc.constantFrom("ledger" as const, "staking" as const, "governance" as const),
  }),
  payload: fc.dictionary(fc.string({ maxLength: 6 }), fc.string({ maxLength: 6 })),
});

const arbBatch = fc.array(
  fc.record({ streamId: fc.constantFrom("coin:1", "stake:1", "proposal:1"), event: arbDomainEvent }),
  { minLength: 1, maxLength: 4 },
);

// =============================================================================
// Tests
// =============================================================================

describe("hash chain property tests", () => {
  it("any sequence of commits produces a valid chain", () => {
    fc.assert(
      fc.property(fc.array(arbBatch, { minLength: 1, maxLength: 6 }), (batches) => {
        const store = new InMemoryEventStore();
        for (const batch of batches) store.commit(batch);

        const result = store.verifyIntegrity();
        expect(result.valid).toBe(true);
        expect(result.lastVerifiedPosition).toBe(store.globalPosition());
      }),
      { numRuns: 50 },
    );
  });

  it("tampering with any event is detected at that position", () => {
    fc.assert(
      fc.property(
        fc.array(arbDomainEvent, { minLength: 1, maxLength: 12 }),
        fc.nat(),
        (events, pick) => {
          const store = new InMemoryEventStore();
          store.append("stream", events);

          const stored = [...store.readAll()];
          const index = pick % stored.length;
          const target = stored[index];
          if (target === undefined) return;
          stored[index] = {
            ...target,
            event: { ...target.event, payload: { ...target.event.payload, tampered: "yes" } },
          };

          const result = verifyHashChain(stored);
          expect(result.valid).toBe(false);
          expect(result.errors[0]?.position).toBe(index + 1);
          expect(result.lastVerifiedPosition).toBe(index);
        },
      ),
      { numRuns: 50 },
    );
  });
});
