/**
 * Financial Types
 *
 * Core token primitives for deterministic accounting.
 *
 * Rules:
 * - All amounts are bigint base units (no floating point)
 * - One token is 10^9 base units
 * - Amounts never leave [0, MAX_AMOUNT]; arithmetic that would is an error
 */

/**
 * An authenticated account identifier (the transaction sender or a recipient).
 * Hex string with a `0x` prefix, e.g. "0xa11ce".
 */
export type Address = string;

/**
 * A token quantity in base units.
 * 1_000_000_000n === 1 token.
 */
export type Amount = bigint;

/** Ticker used in formatted output and event payloads. */
export const TOKEN_SYMBOL = "AMOCA";

/** Fixed precision of the token. */
export const TOKEN_DECIMALS = 9;

/** Base units in one whole token. */
export const ONE_TOKEN: Amount = 10n ** BigInt(TOKEN_DECIMALS);

/** Largest representable amount (unsigned 64-bit range). */
export const MAX_AMOUNT: Amount = 2n ** 64n - 1n;
