/**
 * Tests for the deterministic token math.
 *
 * Covers:
 * - parseAmount / parseBaseUnits / formatAmount
 * - Checked arithmetic (overflow, underflow)
 * - Range assertions
 */

import { describe, it, expect } from "vitest";
import { MAX_AMOUNT } from "@amoca/types";
import {
  parseAmount,
  parseBaseUnits,
  formatAmount,
  assertAmount,
  checkedAdd,
  checkedSub,
  checkedMul,
  sumAmounts,
} from "../src/money-math.js";
import { LedgerError } from "../src/types.js";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof LedgerError) return err.code;
    throw err;
  }
  return undefined;
}

// ─── parseAmount ─────────────────────────────────────────────────────────

describe("parseAmount", () => {
  it("parses a whole number of tokens", () => {
    expect(parseAmount("100")).toBe(100_000_000_000n);
  });

  it("pads a short fractional part", () => {
    expect(parseAmount("1.5")).toBe(1_500_000_000n);
  });

  it("parses the smallest unit", () => {
    expect(parseAmount("0.000000001")).toBe(1n);
  });

  it("trims surrounding whitespace", () => {
    expect(parseAmount("  2  ")).toBe(2_000_000_000n);
  });

  it("rejects more than 9 decimal places", () => {
    expect(() => parseAmount("0.0000000001")).toThrow(/10 decimal places/);
  });

  it("rejects negative amounts", () => {
    expect(codeOf(() => parseAmount("-1"))).toBe("INVALID_AMOUNT");
  });

  it("rejects garbage", () => {
    expect(codeOf(() => parseAmount("abc"))).toBe("INVALID_AMOUNT");
    expect(codeOf(() => parseAmount("1."))).toBe("INVALID_AMOUNT");
  });

  it("rejects amounts past the maximum", () => {
    expect(codeOf(() => parseAmount("18446744074"))).toBe("ARITHMETIC_OVERFLOW");
  });
});

describe("parseBaseUnits", () => {
  it("parses integer strings", () => {
    expect(parseBaseUnits("1000000000")).toBe(1_000_000_000n);
    expect(parseBaseUnits("0")).toBe(0n);
  });

  it("accepts the maximum", () => {
    expect(parseBaseUnits("18446744073709551615")).toBe(MAX_AMOUNT);
  });

  it("rejects one past the maximum", () => {
    expect(codeOf(() => parseBaseUnits("18446744073709551616"))).toBe("ARITHMETIC_OVERFLOW");
  });

  it("rejects decimals and signs", () => {
    expect(codeOf(() => parseBaseUnits("1.5"))).toBe("INVALID_AMOUNT");
    expect(codeOf(() => parseBaseUnits("-5"))).toBe("INVALID_AMOUNT");
  });
});

// ─── formatAmount ────────────────────────────────────────────────────────

describe("formatAmount", () => {
  it("formats whole tokens", () => {
    expect(formatAmount(1_000_000_000n)).toBe("1.000000000");
  });

  it("formats fractions", () => {
    expect(formatAmount(1_500_000_000n)).toBe("1.500000000");
  });

  it("formats the smallest unit", () => {
    expect(formatAmount(1n)).toBe("0.000000001");
  });

  it("formats zero", () => {
    expect(formatAmount(0n)).toBe("0.000000000");
  });

  it("formats the maximum", () => {
    expect(formatAmount(MAX_AMOUNT)).toBe("18446744073.709551615");
  });
});

// ─── Checked arithmetic ──────────────────────────────────────────────────

describe("checked arithmetic", () => {
  it("adds within range", () => {
    expect(checkedAdd(2n, 3n)).toBe(5n);
    expect(checkedAdd(MAX_AMOUNT - 1n, 1n)).toBe(MAX_AMOUNT);
  });

  it("fails on overflow instead of wrapping", () => {
    expect(codeOf(() => checkedAdd(MAX_AMOUNT, 1n))).toBe("ARITHMETIC_OVERFLOW");
  });

  it("subtracts within range", () => {
    expect(checkedSub(5n, 5n)).toBe(0n);
  });

  it("fails on underflow", () => {
    expect(codeOf(() => checkedSub(1n, 2n))).toBe("ARITHMETIC_UNDERFLOW");
  });

  it("multiplies within range", () => {
    expect(checkedMul(4_294_967_296n, 4_294_967_295n)).toBe(MAX_AMOUNT - 4_294_967_295n);
  });

  it("fails on multiplication overflow", () => {
    expect(codeOf(() => checkedMul(4_294_967_296n, 4_294_967_296n))).toBe("ARITHMETIC_OVERFLOW");
  });

  it("sums a list", () => {
    expect(sumAmounts([1n, 2n, 3n])).toBe(6n);
    expect(sumAmounts([])).toBe(0n);
  });

  it("fails when a sum overflows", () => {
    expect(codeOf(() => sumAmounts([MAX_AMOUNT, 1n]))).toBe("ARITHMETIC_OVERFLOW");
  });
});

describe("assertAmount", () => {
  it("returns values in range", () => {
    expect(assertAmount(42n)).toBe(42n);
  });

  it("distinguishes underflow from overflow", () => {
    expect(codeOf(() => assertAmount(-1n))).toBe("ARITHMETIC_UNDERFLOW");
    expect(codeOf(() => assertAmount(MAX_AMOUNT + 1n))).toBe("ARITHMETIC_OVERFLOW");
  });
});
