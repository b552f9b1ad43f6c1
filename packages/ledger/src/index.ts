/**
 * @amoca/ledger: Token ledger and capability gate.
 *
 * Enforces token invariants:
 * - Supply only changes through mint (authorized) and burn (owner)
 * - total supply = circulating coins + locked escrow
 * - All arithmetic uses bigint and fails instead of wrapping
 * - Only capabilities issued by the gate authorize privileged calls
 */

// Core engine
export { TokenLedger, LEDGER_EVENTS } from "./token-ledger.js";

// Capability gate
export { CapabilityGate } from "./capability.js";
export type {
  Capability,
  TreasuryAuthority,
  ProtocolCapability,
} from "./capability.js";

// Token arithmetic
export {
  parseAmount,
  parseBaseUnits,
  formatAmount,
  assertAmount,
  checkedAdd,
  checkedSub,
  checkedMul,
  sumAmounts,
} from "./money-math.js";

// Types
export type { Coin, SupplySummary, LedgerErrorCode } from "./types.js";
export { LedgerError } from "./types.js";
