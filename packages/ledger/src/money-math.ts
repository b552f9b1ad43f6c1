/**
 * @amoca/ledger: Deterministic token arithmetic.
 *
 * All arithmetic uses bigint base units (9 decimals).
 * Decimal strings are converted to/from bigint via fixed scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Results must stay within [0, MAX_AMOUNT]; leaving the range throws
 * - Amounts must be valid unsigned decimal strings
 */

import { MAX_AMOUNT, TOKEN_DECIMALS } from "@amoca/types";
import type { Amount } from "@amoca/types";
import { LedgerError } from "./types.js";

// ─── Parsing & Formatting ────────────────────────────────────────────────

/**
 * Parse a whole-token decimal string into base units.
 *
 * "1.5"  → 1500000000n
 * "100"  → 100000000000n
 * "0.000000001" → 1n
 */
export function parseAmount(amount: string): Amount {
  const trimmed = amount.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > TOKEN_DECIMALS) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the token allows ${String(TOKEN_DECIMALS)}`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(TOKEN_DECIMALS, "0"));
  return assertAmount(value);
}

/**
 * Parse a base-unit integer string ("1000000000") into an Amount.
 */
export function parseBaseUnits(raw: string): Amount {
  if (!/^\d+$/.test(raw)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid base-unit amount: "${raw}"`);
  }
  return assertAmount(BigInt(raw));
}

/**
 * Render base units as a whole-token decimal string.
 *
 * 1500000000n → "1.500000000"
 * 1n          → "0.000000001"
 */
export function formatAmount(scaled: Amount): string {
  const str = scaled.toString().padStart(TOKEN_DECIMALS + 1, "0");
  const intPart = str.slice(0, str.length - TOKEN_DECIMALS);
  const fracPart = str.slice(str.length - TOKEN_DECIMALS);
  return `${intPart}.${fracPart}`;
}

// ─── Range Checks ────────────────────────────────────────────────────────

/**
 * Assert a value lies inside the representable amount range.
 */
export function assertAmount(value: bigint): Amount {
  if (value < 0n) {
    throw new LedgerError("ARITHMETIC_UNDERFLOW", `Amount ${value.toString()} is negative`);
  }
  if (value > MAX_AMOUNT) {
    throw new LedgerError(
      "ARITHMETIC_OVERFLOW",
      `Amount ${value.toString()} exceeds the maximum of ${MAX_AMOUNT.toString()}`,
    );
  }
  return value;
}

// ─── Checked Arithmetic ──────────────────────────────────────────────────

export function checkedAdd(a: Amount, b: Amount): Amount {
  const sum = a + b;
  if (sum > MAX_AMOUNT) {
    throw new LedgerError(
      "ARITHMETIC_OVERFLOW",
      `${a.toString()} + ${b.toString()} exceeds the maximum amount`,
    );
  }
  return sum;
}

export function checkedSub(a: Amount, b: Amount): Amount {
  if (b > a) {
    throw new LedgerError(
      "ARITHMETIC_UNDERFLOW",
      `${a.toString()} - ${b.toString()} would be negative`,
    );
  }
  return a - b;
}

export function checkedMul(a: Amount, b: Amount): Amount {
  const product = a * b;
  if (product > MAX_AMOUNT) {
    throw new LedgerError(
      "ARITHMETIC_OVERFLOW",
      `${a.toString()} * ${b.toString()} exceeds the maximum amount`,
    );
  }
  return product;
}

/**
 * Sum a list of amounts with overflow checking.
 */
export function sumAmounts(values: Iterable<Amount>): Amount {
  let total = 0n;
  for (const v of values) {
    total = checkedAdd(total, v);
  }
  return total;
}
