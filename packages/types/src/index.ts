/**
 * @amoca/types: Shared domain types for the AMOCA token core.
 *
 * These types are used across all AMOCA packages:
 * - Token primitives (Address, Amount, precision constants)
 * - Epoch time and the injectable Clock
 * - Event architecture
 * - Transaction context handed to every engine
 *
 * Design rules:
 * - All record types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types; meaning lives in consuming code
 */

// Financial types
export type { Address, Amount } from "./financial.js";
export { TOKEN_SYMBOL, TOKEN_DECIMALS, ONE_TOKEN, MAX_AMOUNT } from "./financial.js";

// Time
export type { EpochSeconds, Clock } from "./time.js";
export { SECONDS_PER_YEAR, SystemClock, ManualClock, toIsoTimestamp } from "./time.js";

// Event types
export type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// Transaction context
export type { TxContext, PendingEvent } from "./transaction.js";
export { RecordingContext } from "./transaction.js";

// Runtime type guards
export {
  isAddress,
  normalizeAddress,
  isAmount,
  isEpochSeconds,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
