/**
 * Runtime Type Guards
 *
 * Narrowing functions for AMOCA domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized data, engine arguments).
 */

import { MAX_AMOUNT } from "./financial.js";
import type { Address, Amount } from "./financial.js";
import type { EpochSeconds } from "./time.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// =============================================================================
// Financial guards
// =============================================================================

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{1,64}$/;

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

/**
 * Canonical spelling of an address. Hex digits are case-insensitive, and
 * records compare addresses as strings, so inputs are lower-cased once
 * at the edge.
 */
export function normalizeAddress(address: Address): Address {
  return address.toLowerCase();
}

/** A bigint within the representable amount range. */
export function isAmount(value: unknown): value is Amount {
  return typeof value === "bigint" && value >= 0n && value <= MAX_AMOUNT;
}

// =============================================================================
// Time guards
// =============================================================================

export function isEpochSeconds(value: unknown): value is EpochSeconds {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["ledger", "staking", "governance", "access"]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.actor === "string" &&
    typeof value.correlationId === "string" &&
    isEventSource(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return typeof value.type === "string" && isEventMetadata(value.metadata) && isRecord(value.payload);
}
