/**
 * Tests for the fixed-point money math.
 *
 * Covers:
 * - parseAmount / formatAmount
 * - Number scaling and rounding
 * - Exact summation
 * - Validation and error cases
 */

import { describe, it, expect } from "vitest";
import {
  parseAmount,
  formatAmount,
  toScaled,
  fromScaled,
  sumAmounts,
  assertDecimals,
} from "../src/money-math.js";
import { LedgerError } from "../src/types.js";

// ─── parseAmount ─────────────────────────────────────────────────────────

describe("parseAmount", () => {
  it("parses a whole number", () => {
    expect(parseAmount("100", 6)).toBe(100_000_000n);
  });

  it("parses a decimal number", () => {
    expect(parseAmount("100.50", 2)).toBe(10050n);
  });

  it("parses a negative number", () => {
    expect(parseAmount("-50.25", 2)).toBe(-5025n);
  });

  it("pads fractional part when shorter than decimals", () => {
    expect(parseAmount("1.5", 6)).toBe(1_500_000n);
  });

  it("handles zero decimals", () => {
    expect(parseAmount("42", 0)).toBe(42n);
  });

  it("rejects empty and non-numeric text", () => {
    expect(() => parseAmount("", 6)).toThrow(LedgerError);
    expect(() => parseAmount("abc", 6)).toThrow(LedgerError);
    expect(() => parseAmount("1e5", 6)).toThrow(LedgerError);
  });

  it("rejects more fractional digits than the scale", () => {
    expect(() => parseAmount("1.234", 2)).toThrow("has 3 decimal places");
  });
});

// ─── formatAmount ────────────────────────────────────────────────────────

describe("formatAmount", () => {
  it("formats with the fractional part", () => {
    expect(formatAmount(10050n, 2)).toBe("100.50");
  });

  it("pads small values", () => {
    expect(formatAmount(5n, 6)).toBe("0.000005");
  });

  it("formats negatives", () => {
    expect(formatAmount(-5025n, 2)).toBe("-50.25");
  });

  it("formats zero decimals", () => {
    expect(formatAmount(42n, 0)).toBe("42");
  });
});

// ─── toScaled / fromScaled ───────────────────────────────────────────────

describe("toScaled", () => {
  it("scales a binary-inexact decimal exactly", () => {
    expect(toScaled(0.1, 2)).toBe(10n);
    expect(toScaled(-12.345, 6)).toBe(-12_345_000n);
  });

  it("rounds to the scale", () => {
    expect(toScaled(1.006, 2)).toBe(101n);
  });

  it("treats tiny negatives that round to zero as zero", () => {
    expect(toScaled(-0.001, 2)).toBe(0n);
  });

  it("handles magnitudes beyond fixed notation", () => {
    expect(toScaled(1e21, 2)).toBe(10n ** 23n);
  });

  it("rejects non-finite values", () => {
    expect(() => toScaled(Number.NaN, 2)).toThrow(LedgerError);
    expect(() => toScaled(Number.POSITIVE_INFINITY, 2)).toThrow(LedgerError);
  });
});

describe("fromScaled", () => {
  it("converts back to a number", () => {
    expect(fromScaled(10050n, 2)).toBe(100.5);
    expect(fromScaled(-1n, 6)).toBe(-0.000001);
  });
});

// ─── sumAmounts ──────────────────────────────────────────────────────────

describe("sumAmounts", () => {
  it("has no floating-point drift", () => {
    expect(0.1 + 0.2).not.toBe(0.3);
    expect(fromScaled(sumAmounts([0.1, 0.2], 6), 6)).toBe(0.3);
  });

  it("sums mixed signs", () => {
    expect(sumAmounts([500, -200, 0.5], 2)).toBe(30050n);
  });

  it("is zero for no values", () => {
    expect(sumAmounts([], 6)).toBe(0n);
  });
});

// ─── assertDecimals ──────────────────────────────────────────────────────

describe("assertDecimals", () => {
  it("accepts 0 through 18", () => {
    expect(() => assertDecimals(0)).not.toThrow();
    expect(() => assertDecimals(18)).not.toThrow();
  });

  it("rejects out-of-range or fractional scales", () => {
    expect(() => assertDecimals(-1)).toThrow(LedgerError);
    expect(() => assertDecimals(19)).toThrow(LedgerError);
    expect(() => assertDecimals(2.5)).toThrow(LedgerError);
  });
});
