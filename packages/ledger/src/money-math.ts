/**
 * @pocket-ledger/ledger — Deterministic monetary arithmetic.
 *
 * Amounts are stored as JavaScript numbers, but every sum is computed on
 * bigints scaled by a fixed number of decimals, so repeated runs never
 * accumulate binary floating-point drift.
 *
 * Rules:
 * - No floating-point addition
 * - Amounts are rounded to the scale once, on the way in
 * - Non-finite amounts are rejected
 */

import { LedgerError } from "./types.js";

// ─── Decimal Text ────────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the scale allows ${String(decimals)}`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const result = `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;

  return negative ? `-${result}` : result;
}

// ─── Numbers ─────────────────────────────────────────────────────────────

/**
 * Validate a fractional-digit scale.
 */
export function assertDecimals(decimals: number): void {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > 18) {
    throw new LedgerError("INVALID_INPUT", `Decimals must be an integer between 0 and 18, got ${String(decimals)}`);
  }
}

/**
 * Scale a number to a bigint, rounding to `decimals` fractional digits.
 *
 * 0.1 with decimals=2 → 10n
 * -12.345 with decimals=6 → -12345000n
 */
export function toScaled(value: number, decimals: number): bigint {
  if (!Number.isFinite(value)) {
    throw new LedgerError("INVALID_AMOUNT", `Amount must be a finite number, got ${String(value)}`);
  }

  // toFixed switches to exponent notation from 1e21; such doubles are integers
  if (Math.abs(value) >= 1e21) {
    return BigInt(value) * 10n ** BigInt(decimals);
  }

  return parseAmount(value.toFixed(decimals), decimals);
}

/**
 * Convert a scaled bigint back to a number.
 */
export function fromScaled(scaled: bigint, decimals: number): number {
  return Number(formatAmount(scaled, decimals));
}

/**
 * Sum numbers exactly at the given scale.
 */
export function sumAmounts(values: Iterable<number>, decimals: number): bigint {
  let total = 0n;
  for (const value of values) {
    total += toScaled(value, decimals);
  }
  return total;
}
