/**
 * Fixed-point helpers (1e18 scale)
 *
 * Division helpers take an explicit rounding direction so that every caller
 * states which side of a rounding error the protocol ends up on.
 *
 * This module is pure (no I/O, no throw).
 */

import { err, ok, type Result } from "neverthrow";

import type { X18 } from "./types";

export const WAD = 10n ** 18n;
export const BPS_DENOMINATOR = 10_000n;
export const SECONDS_PER_HOUR = 3_600n;
export const SECONDS_PER_DAY = 86_400n;

export function abs(x: bigint): bigint {
  return x < 0n ? -x : x;
}

export function minOf(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function maxOf(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

/** -1n, 0n or 1n */
export function signOf(x: bigint): bigint {
  if (x === 0n) return 0n;
  return x < 0n ? -1n : 1n;
}

/**
 * Floor division (toward negative infinity). `d` must be positive.
 */
export function divFloor(n: bigint, d: bigint): bigint {
  const q = n / d;
  return n % d !== 0n && n < 0n ? q - 1n : q;
}

/**
 * Ceiling division (toward positive infinity). `d` must be positive.
 */
export function divCeil(n: bigint, d: bigint): bigint {
  const q = n / d;
  return n % d !== 0n && n > 0n ? q + 1n : q;
}

/** floor(a * b / d) */
export function mulDiv(a: bigint, b: bigint, d: bigint): bigint {
  return divFloor(a * b, d);
}

/** ceil(a * b / d) */
export function mulDivUp(a: bigint, b: bigint, d: bigint): bigint {
  return divCeil(a * b, d);
}

/** a * b / 1e18, floored */
export function mulWad(a: X18, b: X18): X18 {
  return mulDiv(a, b, WAD);
}

/** a * b / 1e18, rounded up */
export function mulWadUp(a: X18, b: X18): X18 {
  return mulDivUp(a, b, WAD);
}

/** Apply basis points to a non-negative amount, floored */
export function applyBps(amount: X18, bps: number): X18 {
  return mulDiv(amount, BigInt(bps), BPS_DENOMINATOR);
}

/** Apply basis points to a non-negative amount, rounded up */
export function applyBpsUp(amount: X18, bps: number): X18 {
  return mulDivUp(amount, BigInt(bps), BPS_DENOMINATOR);
}

// ─────────────────────────────────────────────────────────────────────────────
// Token unit conversion
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Convert a 1e18 amount to native token units.
 *
 * Use "up" when collecting from an account and "down" when paying out.
 */
export function toTokenUnits(amount: X18, baseUnit: bigint, rounding: "up" | "down"): bigint {
  return rounding === "up" ? mulDivUp(amount, baseUnit, WAD) : mulDiv(amount, baseUnit, WAD);
}

/** Convert native token units to a 1e18 amount (exact for baseUnit <= 1e18) */
export function fromTokenUnits(units: bigint, baseUnit: bigint): X18 {
  return mulDiv(units, WAD, baseUnit);
}

// ─────────────────────────────────────────────────────────────────────────────
// Decimal strings
// ─────────────────────────────────────────────────────────────────────────────

export interface ParseDecimalError {
  type: "INVALID_DECIMAL";
  message: string;
}

const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d+))?$/;

/**
 * Parse a decimal string ("2000", "0.05", "-1.5") into a fixed-point bigint.
 * Digits beyond `decimals` are rejected rather than rounded.
 */
export function parseDecimal(value: string, decimals = 18): Result<bigint, ParseDecimalError> {
  const match = DECIMAL_PATTERN.exec(value.trim());
  if (!match) {
    return err({ type: "INVALID_DECIMAL", message: `not a decimal number: "${value}"` });
  }

  const [, negative, whole, fraction = ""] = match;
  if (fraction.length > decimals) {
    return err({
      type: "INVALID_DECIMAL",
      message: `"${value}" has more than ${String(decimals)} fractional digits`,
    });
  }

  const scaled = BigInt(whole) * 10n ** BigInt(decimals) + BigInt(fraction.padEnd(decimals, "0") || "0");
  return ok(negative ? -scaled : scaled);
}

/**
 * Render a fixed-point bigint as a decimal string without trailing zeros.
 */
export function formatDecimal(value: bigint, decimals = 18): string {
  const negative = value < 0n;
  const magnitude = abs(value);
  const unit = 10n ** BigInt(decimals);
  const whole = magnitude / unit;
  const fraction = (magnitude % unit).toString().padStart(decimals, "0").replace(/0+$/, "");
  const body = fraction.length > 0 ? `${whole.toString()}.${fraction}` : whole.toString();
  return negative ? `-${body}` : body;
}
