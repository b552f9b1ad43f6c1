/**
 * @amoca/ledger: Internal types for the token ledger.
 *
 * Rules:
 * - All records are readonly; a change replaces the record
 * - Consumed coins are removed and their IDs are never reused
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { Address, Amount } from "@amoca/types";

// ─── Coin ────────────────────────────────────────────────────────────────

/**
 * A transferable balance owned by exactly one address.
 */
export interface Coin {
  readonly id: string;
  readonly owner: Address;
  readonly value: Amount;
}

// ─── Supply ──────────────────────────────────────────────────────────────

/**
 * Aggregate supply figures.
 * `total === circulating + locked` at every committed state.
 */
export interface SupplySummary {
  readonly total: Amount;
  readonly circulating: Amount;
  readonly locked: Amount;
  readonly coinCount: number;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "UNAUTHORIZED"
  | "AUTHORITY_EXISTS"
  | "INVALID_AMOUNT"
  | "INVALID_ADDRESS"
  | "ARITHMETIC_OVERFLOW"
  | "ARITHMETIC_UNDERFLOW"
  | "COIN_NOT_FOUND"
  | "INSUFFICIENT_BALANCE";

/**
 * Structured error from the token ledger.
 * Always thrown - never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}
