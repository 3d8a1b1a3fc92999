/**
 * @mintline/ledger — Checked token arithmetic.
 *
 * All amounts are unsigned bigint base units bounded by MAX_AMOUNT.
 * Every operation that could leave the domain throws before any
 * state is touched; nothing wraps around.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts are never negative
 * - Overflow is a hard failure
 */

import { LedgerError } from "./types.js";

/** Largest representable amount: 2^128 − 1 (unsigned 128-bit). */
export const MAX_AMOUNT: bigint = (1n << 128n) - 1n;

/** Largest supported number of decimal places. */
export const MAX_DECIMALS = 18;

// ─── Validation ──────────────────────────────────────────────────────────

/**
 * Assert that `amount` is a positive bigint. Zero is rejected.
 */
export function assertPositiveAmount(amount: bigint): void {
  if (typeof amount !== "bigint") {
    throw new LedgerError("INVALID_AMOUNT", `Amount must be a bigint, got ${typeof amount}`);
  }
  if (amount <= 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Amount must be greater than zero, got ${amount.toString()}`);
  }
}

/**
 * Assert that `decimals` is an integer in [0, MAX_DECIMALS].
 */
export function assertValidDecimals(decimals: number): void {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > MAX_DECIMALS) {
    throw new LedgerError(
      "INVALID_CONFIG",
      `Decimals must be an integer between 0 and ${MAX_DECIMALS}, got ${String(decimals)}`,
    );
  }
}

// ─── Checked Operations ──────────────────────────────────────────────────

/**
 * a + b, failing with OVERFLOW when the sum exceeds `max`.
 */
export function checkedAdd(a: bigint, b: bigint, max: bigint = MAX_AMOUNT): bigint {
  const sum = a + b;
  if (sum > max) {
    throw new LedgerError(
      "OVERFLOW",
      `${a.toString()} + ${b.toString()} exceeds the maximum of ${max.toString()}`,
    );
  }
  return sum;
}

/**
 * a − b, failing with OVERFLOW when the result would be negative.
 */
export function checkedSub(a: bigint, b: bigint): bigint {
  if (b > a) {
    throw new LedgerError(
      "OVERFLOW",
      `${a.toString()} - ${b.toString()} underflows below zero`,
    );
  }
  return a - b;
}

/**
 * Scale a whole-token amount to base units: whole × 10^decimals.
 *
 * toBaseUnits(1n, 8) → 100000000n
 */
export function toBaseUnits(whole: bigint, decimals: number, max: bigint = MAX_AMOUNT): bigint {
  assertValidDecimals(decimals);
  if (whole < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Amount must not be negative, got ${whole.toString()}`);
  }
  const scaled = whole * 10n ** BigInt(decimals);
  if (scaled > max) {
    throw new LedgerError(
      "OVERFLOW",
      `${whole.toString()} tokens at ${decimals} decimals exceeds the maximum of ${max.toString()}`,
    );
  }
  return scaled;
}

// ─── String Conversion ───────────────────────────────────────────────────

/**
 * Parse an unsigned integer string of base units.
 *
 * "1500" → 1500n
 */
export function parseBaseUnits(value: string): bigint {
  if (typeof value !== "string" || !/^\d+$/.test(value)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid base-unit amount: "${String(value)}"`);
  }
  const parsed = BigInt(value);
  if (parsed > MAX_AMOUNT) {
    throw new LedgerError("OVERFLOW", `Amount "${value}" exceeds the maximum of ${MAX_AMOUNT.toString()}`);
  }
  return parsed;
}

/**
 * Parse a decimal token amount into base units.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  assertValidDecimals(decimals);
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();
  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");
  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${fracPart.length} decimal places, but the token allows ${decimals}`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  if (value > MAX_AMOUNT) {
    throw new LedgerError("OVERFLOW", `Amount "${trimmed}" exceeds the maximum of ${MAX_AMOUNT.toString()}`);
  }
  return value;
}

/**
 * Convert base units back to a decimal token string.
 *
 * 10050n with decimals=2 → "100.50"
 * 5n with decimals=3 → "0.005"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  assertValidDecimals(decimals);
  if (scaled < 0n) {
    throw new LedgerError("INVALID_AMOUNT", `Amount must not be negative, got ${scaled.toString()}`);
  }
  if (decimals === 0) {
    return scaled.toString();
  }

  const str = scaled.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  return `${intPart}.${fracPart}`;
}
