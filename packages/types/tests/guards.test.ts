/**
 * Runtime type guard tests for @amoca/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isAddress,
  isAmount,
  isEpochSeconds,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "../src/guards.js";
import { MAX_AMOUNT } from "../src/financial.js";

// =============================================================================
// Financial guards
// =============================================================================

describe("isAddress", () => {
  it("accepts 0x-prefixed hex", () => {
    expect(isAddress("0xa11ce")).toBe(true);
    expect(isAddress("0xB0B")).toBe(true);
  });

  it("rejects missing prefix", () => {
    expect(isAddress("a11ce")).toBe(false);
  });

  it("rejects non-hex characters", () => {
    expect(isAddress("0xalice")).toBe(false);
  });

  it("rejects a bare prefix", () => {
    expect(isAddress("0x")).toBe(false);
  });

  it("rejects more than 64 hex digits", () => {
    expect(isAddress(`0x${"f".repeat(65)}`)).toBe(false);
  });

  it("rejects non-strings", () => {
    expect(isAddress(42)).toBe(false);
    expect(isAddress(null)).toBe(false);
  });
});

describe("isAmount", () => {
  it("accepts zero and the maximum", () => {
    expect(isAmount(0n)).toBe(true);
    expect(isAmount(MAX_AMOUNT)).toBe(true);
  });

  it("rejects negatives and overflow", () => {
    expect(isAmount(-1n)).toBe(false);
    expect(isAmount(MAX_AMOUNT + 1n)).toBe(false);
  });

  it("rejects numbers", () => {
    expect(isAmount(100)).toBe(false);
  });
});

// =============================================================================
// Time guards
// =============================================================================

describe("isEpochSeconds", () => {
  it("accepts non-negative integers", () => {
    expect(isEpochSeconds(0)).toBe(true);
    expect(isEpochSeconds(1_700_000_000)).toBe(true);
  });

  it("rejects fractions and negatives", () => {
    expect(isEpochSeconds(1.5)).toBe(false);
    expect(isEpochSeconds(-1)).toBe(false);
  });

  it("rejects unsafe integers", () => {
    expect(isEpochSeconds(Number.MAX_SAFE_INTEGER + 1)).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

const METADATA = {
  eventId: "evt-1",
  timestamp: "2024-01-01T00:00:00.000Z",
  actor: "0xa11ce",
  correlationId: "tx-1",
  source: "staking",
};

describe("isEventSource", () => {
  it("accepts known subsystems", () => {
    expect(isEventSource("ledger")).toBe(true);
    expect(isEventSource("access")).toBe(true);
  });

  it("rejects unknown subsystems", () => {
    expect(isEventSource("vault")).toBe(false);
  });
});

describe("isEventMetadata", () => {
  it("accepts valid metadata", () => {
    expect(isEventMetadata(METADATA)).toBe(true);
  });

  it("rejects an unknown source", () => {
    expect(isEventMetadata({ ...METADATA, source: "observer" })).toBe(false);
  });

  it("rejects a missing correlationId", () => {
    expect(isEventMetadata({ ...METADATA, correlationId: undefined })).toBe(false);
  });
});

describe("isDomainEvent", () => {
  it("accepts a valid event", () => {
    expect(
      isDomainEvent({ type: "staking.stake.created", metadata: METADATA, payload: {} }),
    ).toBe(true);
  });

  it("rejects a null payload", () => {
    expect(
      isDomainEvent({ type: "staking.stake.created", metadata: METADATA, payload: null }),
    ).toBe(false);
  });

  it("rejects primitives", () => {
    expect(isDomainEvent("event")).toBe(false);
  });
});
