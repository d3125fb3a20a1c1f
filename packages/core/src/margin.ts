/**
 * Margin and Liquidation Math
 *
 * Requirements round up, PnL and funding round against the account, payouts
 * round down. Every figure is a 1e18 quote amount.
 *
 * This module is pure (no I/O, no throw).
 */

import { err, ok, type Result } from "neverthrow";

import { BPS_DENOMINATOR, WAD, abs, applyBps, applyBpsUp, minOf, mulDiv, mulWadUp } from "./fixed-point";
import type { CoreError, MarketRiskParams, Position, X18 } from "./types";

/**
 * |size| × price, rounded up
 */
export function notional(sizeX18: X18, priceX18: X18): X18 {
  return mulWadUp(abs(sizeX18), priceX18);
}

/**
 * Margin required for a position of `sizeX18` at `priceX18`
 */
export function requiredMargin(sizeX18: X18, priceX18: X18, bps: number): X18 {
  return applyBpsUp(notional(sizeX18, priceX18), bps);
}

/**
 * (price - entry) × size, floored; negative size makes it a short's PnL
 */
export function unrealizedPnl(position: Position, priceX18: X18): X18 {
  if (position.size === 0n) return 0n;
  return mulDiv(priceX18 - position.entryPriceX18, position.size, WAD);
}

/**
 * Funding owed to (positive) or by (negative) the position since its last
 * settlement: -(current - last) × size
 */
export function pendingFunding(position: Position, cumulativeFundingX18: X18): X18 {
  if (position.size === 0n) return 0n;
  return mulDiv(-(cumulativeFundingX18 - position.lastFundingIndexX18), position.size, WAD);
}

/**
 * margin + pending funding + unrealized PnL
 */
export function effectiveMargin(position: Position, priceX18: X18, cumulativeFundingX18: X18): X18 {
  return position.margin + pendingFunding(position, cumulativeFundingX18) + unrealizedPnl(position, priceX18);
}

/**
 * A position is liquidatable when its effective margin at the index price
 * sits below maintenance margin.
 */
export function isBelowMaintenance(
  position: Position,
  indexPriceX18: X18,
  cumulativeFundingX18: X18,
  mmrBps: number,
): boolean {
  if (position.size === 0n) return false;
  return (
    effectiveMargin(position, indexPriceX18, cumulativeFundingX18) <
    requiredMargin(position.size, indexPriceX18, mmrBps)
  );
}

/**
 * Effective margin / notional (1e18 = 100%); null without a position
 */
export function marginRatio(position: Position, priceX18: X18, cumulativeFundingX18: X18): X18 | null {
  const value = notional(position.size, priceX18);
  if (value === 0n) return null;
  return mulDiv(effectiveMargin(position, priceX18, cumulativeFundingX18), WAD, value);
}

// ─────────────────────────────────────────────────────────────────────────────
// Liquidation penalty
// ─────────────────────────────────────────────────────────────────────────────

/**
 * min(notional × penaltyBps, cap); a cap of 0 leaves the penalty uncapped
 */
export function liquidationPenalty(sizeX18: X18, priceX18: X18, params: MarketRiskParams): X18 {
  const raw = applyBps(mulDiv(abs(sizeX18), priceX18, WAD), params.liquidationPenaltyBps);
  return params.penaltyCap > 0n ? minOf(raw, params.penaltyCap) : raw;
}

export interface PenaltySplit {
  liquidatorX18: X18;
  protocolX18: X18;
}

export function splitPenalty(penaltyX18: X18, liquidatorShareBps: number): PenaltySplit {
  const liquidatorX18 = mulDiv(penaltyX18, BigInt(liquidatorShareBps), BPS_DENOMINATOR);
  return { liquidatorX18, protocolX18: penaltyX18 - liquidatorX18 };
}

// ─────────────────────────────────────────────────────────────────────────────
// Risk parameter validation
// ─────────────────────────────────────────────────────────────────────────────

function isBps(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 10_000;
}

export function validateRiskParams(params: MarketRiskParams): Result<MarketRiskParams, CoreError> {
  const invalid = (message: string): Result<MarketRiskParams, CoreError> =>
    err({ type: "INVALID_RISK_PARAMS", message });

  if (!isBps(params.imrBps) || !isBps(params.mmrBps)) return invalid("imrBps and mmrBps must be within [0, 10000]");
  if (params.mmrBps <= 0) return invalid("mmrBps must be positive");
  if (params.imrBps < params.mmrBps) return invalid("imrBps must be at least mmrBps");
  if (!isBps(params.liquidationPenaltyBps)) return invalid("liquidationPenaltyBps must be within [0, 10000]");
  if (!isBps(params.liquidatorShareBps)) return invalid("liquidatorShareBps must be within [0, 10000]");
  if (params.penaltyCap < 0n || params.maxPositionSize < 0n || params.minPositionSize < 0n) {
    return invalid("penaltyCap and position size bounds must not be negative");
  }
  if (params.maxPositionSize > 0n && params.minPositionSize > params.maxPositionSize) {
    return invalid("minPositionSize must not exceed maxPositionSize");
  }
  return ok(params);
}

/**
 * Check a resulting absolute size against the market bounds.
 * Zero is always allowed (a full close).
 */
export function checkPositionBounds(
  sizeX18: X18,
  params: MarketRiskParams,
): Result<void, CoreError> {
  const size = abs(sizeX18);
  if (size === 0n) return ok(undefined);
  if (params.minPositionSize > 0n && size < params.minPositionSize) {
    return err({ type: "SIZE_BELOW_MINIMUM", message: `position size ${String(size)} below minimum` });
  }
  if (params.maxPositionSize > 0n && size > params.maxPositionSize) {
    return err({ type: "SIZE_ABOVE_MAXIMUM", message: `position size ${String(size)} above maximum` });
  }
  return ok(undefined);
}
