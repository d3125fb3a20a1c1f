/**
 * Virtual AMM - constant-product pricing over virtual reserves
 *
 * - Input-side fee, capped at MAX_FEE_BPS
 * - Execution price rounds against the trader
 * - Reserve floors keep both sides of the market closeable
 * - Every price move writes a TWAP observation
 *
 * This module is pure (no I/O, no throw). Each operation returns the next
 * state instead of mutating the one it was given.
 */

import { err, ok, type Result } from "neverthrow";

import { BPS_DENOMINATOR, WAD, abs, divCeil, mulDiv, mulDivUp } from "./fixed-point";
import { createTwapState, writeObservation } from "./twap";
import type { Bps, CoreError, SwapFill, UnixSec, VammConfig, VammState, X18 } from "./types";

/** 3% */
export const MAX_FEE_BPS = 300;

/** Largest mark-price move a single reserve reset may cause */
export const MAX_RESET_DEVIATION_BPS = 1_000n;

export const MIN_OBSERVATION_CARDINALITY = 2;

export interface SwapOutcome {
  state: VammState;
  fill: SwapFill;
}

function invalidConfig(message: string): CoreError {
  return { type: "INVALID_MARKET_CONFIG", message };
}

export function validateFeeBps(feeBps: Bps): Result<Bps, CoreError> {
  if (!Number.isInteger(feeBps) || feeBps < 0 || feeBps > MAX_FEE_BPS) {
    return err(invalidConfig(`feeBps must be an integer in [0, ${String(MAX_FEE_BPS)}], got ${String(feeBps)}`));
  }
  return ok(feeBps);
}

/**
 * Mark price = reserveQuote / reserveBase
 */
export function getMarkPrice(state: VammState): Result<X18, CoreError> {
  if (state.reserveBaseX18 === 0n) {
    return err({ type: "PRICE_UNAVAILABLE", message: "base reserve is zero" });
  }
  return ok(mulDiv(state.reserveQuoteX18, WAD, state.reserveBaseX18));
}

function markOf(reserveBaseX18: X18, reserveQuoteX18: X18): X18 {
  return mulDiv(reserveQuoteX18, WAD, reserveBaseX18);
}

/**
 * Build the initial pricing state for a market
 */
export function initializeVamm(config: VammConfig, nowSec: UnixSec): Result<VammState, CoreError> {
  const fee = validateFeeBps(config.feeBps);
  if (fee.isErr()) return err(fee.error);

  if (config.priceX18 <= 0n) return err(invalidConfig("initial price must be positive"));
  if (config.baseReserveX18 <= 0n) return err(invalidConfig("base reserve must be positive"));
  if (config.minReserveBaseX18 < 0n || config.minReserveQuoteX18 < 0n) {
    return err(invalidConfig("reserve floors must not be negative"));
  }
  if (!Number.isInteger(config.frMaxBpsPerHour) || config.frMaxBpsPerHour < 0) {
    return err(invalidConfig("frMaxBpsPerHour must be a non-negative integer"));
  }
  if (config.kFundingX18 < 0n) return err(invalidConfig("funding sensitivity must not be negative"));
  if (!Number.isInteger(config.observationCardinality) || config.observationCardinality < MIN_OBSERVATION_CARDINALITY) {
    return err(invalidConfig(`observation cardinality must be at least ${String(MIN_OBSERVATION_CARDINALITY)}`));
  }
  if (config.fundingTwapWindowSec < 0) return err(invalidConfig("funding TWAP window must not be negative"));

  const reserveQuoteX18 = mulDiv(config.priceX18, config.baseReserveX18, WAD);
  if (config.baseReserveX18 <= config.minReserveBaseX18 || reserveQuoteX18 <= config.minReserveQuoteX18) {
    return err(invalidConfig("initial reserves must sit above the reserve floors"));
  }

  const mark = markOf(config.baseReserveX18, reserveQuoteX18);

  return ok({
    reserveBaseX18: config.baseReserveX18,
    reserveQuoteX18,
    minReserveBaseX18: config.minReserveBaseX18,
    minReserveQuoteX18: config.minReserveQuoteX18,
    feeBps: config.feeBps,
    feeGrowthGlobalX18: 0n,
    paused: false,
    twap: createTwapState(config.observationCardinality, mark, nowSec),
    funding: {
      cumulativeFundingPerUnitX18: 0n,
      lastFundingTs: nowSec,
      frMaxBpsPerHour: config.frMaxBpsPerHour,
      kFundingX18: config.kFundingX18,
      twapWindowSec: config.fundingTwapWindowSec,
    },
  });
}

function checkSwappable(state: VammState, amountX18: X18): Result<void, CoreError> {
  if (state.paused) {
    return err({ type: "SWAPS_PAUSED", message: "swaps are paused" });
  }
  if (amountX18 <= 0n) {
    return err({ type: "ZERO_AMOUNT", message: "swap amount must be positive" });
  }
  return ok(undefined);
}

/**
 * Buy `amountBaseOutX18` of base; the trader pays gross quote including fee.
 *
 * @param priceLimitX18 - maximum acceptable average price (0 = no limit)
 */
export function buy(
  state: VammState,
  amountBaseOutX18: X18,
  priceLimitX18: X18,
  nowSec: UnixSec,
): Result<SwapOutcome, CoreError> {
  const swappable = checkSwappable(state, amountBaseOutX18);
  if (swappable.isErr()) return err(swappable.error);

  const { reserveBaseX18: rb, reserveQuoteX18: rq } = state;
  if (amountBaseOutX18 >= rb || rb - amountBaseOutX18 < state.minReserveBaseX18) {
    return err({ type: "RESERVE_FLOOR_BREACHED", message: "buy would take base reserve below its floor" });
  }

  const newBase = rb - amountBaseOutX18;
  const newQuoteBeforeFee = divCeil(rb * rq, newBase);
  const quoteInNet = newQuoteBeforeFee - rq;
  const quoteInGross = mulDivUp(quoteInNet, BPS_DENOMINATOR, BPS_DENOMINATOR - BigInt(state.feeBps));
  const fee = quoteInGross - quoteInNet;
  const avgPriceX18 = mulDivUp(quoteInGross, WAD, amountBaseOutX18);

  if (priceLimitX18 > 0n && avgPriceX18 > priceLimitX18) {
    return err({
      type: "SLIPPAGE_EXCEEDED",
      message: `average price ${String(avgPriceX18)} above limit ${String(priceLimitX18)}`,
    });
  }

  const reserveQuoteX18 = rq + quoteInGross;
  const next: VammState = {
    ...state,
    reserveBaseX18: newBase,
    reserveQuoteX18,
    feeGrowthGlobalX18: state.feeGrowthGlobalX18 + fee,
    twap: writeObservation(state.twap, nowSec, markOf(newBase, reserveQuoteX18), state.paused),
  };

  return ok({
    state: next,
    fill: {
      baseDeltaX18: amountBaseOutX18,
      quoteDeltaX18: -quoteInGross,
      avgPriceX18,
      feeQuoteX18: fee,
    },
  });
}

/**
 * Sell `amountBaseInX18` of base; the fee is taken from the base input
 * before the product formula is applied.
 *
 * @param priceLimitX18 - minimum acceptable average price (0 = no limit)
 */
export function sell(
  state: VammState,
  amountBaseInX18: X18,
  priceLimitX18: X18,
  nowSec: UnixSec,
): Result<SwapOutcome, CoreError> {
  const swappable = checkSwappable(state, amountBaseInX18);
  if (swappable.isErr()) return err(swappable.error);

  const { reserveBaseX18: rb, reserveQuoteX18: rq } = state;
  const feeBase = mulDivUp(amountBaseInX18, BigInt(state.feeBps), BPS_DENOMINATOR);
  const netIn = amountBaseInX18 - feeBase;
  const newQuote = divCeil(rb * rq, rb + netIn);
  const quoteOut = rq - newQuote;

  if (newQuote < state.minReserveQuoteX18) {
    return err({ type: "RESERVE_FLOOR_BREACHED", message: "sell would take quote reserve below its floor" });
  }
  if (quoteOut <= 0n) {
    return err({ type: "ZERO_AMOUNT", message: "sell output rounds to zero" });
  }

  // Floored: a seller is credited the lower price
  const avgPriceX18 = mulDiv(quoteOut, WAD, amountBaseInX18);

  if (priceLimitX18 > 0n && avgPriceX18 < priceLimitX18) {
    return err({
      type: "SLIPPAGE_EXCEEDED",
      message: `average price ${String(avgPriceX18)} below limit ${String(priceLimitX18)}`,
    });
  }

  const reserveBaseX18 = rb + amountBaseInX18;
  const feeQuote = mulDiv(feeBase, avgPriceX18, WAD);
  const next: VammState = {
    ...state,
    reserveBaseX18,
    reserveQuoteX18: newQuote,
    feeGrowthGlobalX18: state.feeGrowthGlobalX18 + feeQuote,
    twap: writeObservation(state.twap, nowSec, markOf(reserveBaseX18, newQuote), state.paused),
  };

  return ok({
    state: next,
    fill: {
      baseDeltaX18: -amountBaseInX18,
      quoteDeltaX18: quoteOut,
      avgPriceX18,
      feeQuoteX18: feeQuote,
    },
  });
}

/**
 * Emergency reserve reset to a new (price, baseReserve) pair.
 * The resulting mark may move at most MAX_RESET_DEVIATION_BPS from the current one.
 */
export function resetReserves(
  state: VammState,
  priceX18: X18,
  baseReserveX18: X18,
  nowSec: UnixSec,
): Result<VammState, CoreError> {
  const current = getMarkPrice(state);
  if (current.isErr()) return err(current.error);

  if (priceX18 <= 0n || baseReserveX18 <= 0n) {
    return err(invalidConfig("reset price and base reserve must be positive"));
  }

  const reserveQuoteX18 = mulDiv(priceX18, baseReserveX18, WAD);
  const newMark = markOf(baseReserveX18, reserveQuoteX18);
  if (abs(newMark - current.value) * BPS_DENOMINATOR > current.value * MAX_RESET_DEVIATION_BPS) {
    return err({
      type: "RESET_PRICE_DEVIATION",
      message: `reset would move mark from ${String(current.value)} to ${String(newMark)} (more than 10%)`,
    });
  }

  if (baseReserveX18 < state.minReserveBaseX18 || reserveQuoteX18 < state.minReserveQuoteX18) {
    return err({ type: "RESERVE_FLOOR_BREACHED", message: "reset reserves below their floors" });
  }

  return ok({
    ...state,
    reserveBaseX18: baseReserveX18,
    reserveQuoteX18,
    twap: writeObservation(state.twap, nowSec, newMark, state.paused),
  });
}

/**
 * Pause or unpause swaps, writing a boundary observation so the paused
 * interval drops out of the TWAP.
 */
export function setSwapsPaused(state: VammState, paused: boolean, nowSec: UnixSec): Result<VammState, CoreError> {
  const mark = getMarkPrice(state);
  if (mark.isErr()) return err(mark.error);
  if (state.paused === paused) return ok(state);

  return ok({
    ...state,
    paused,
    twap: writeObservation(state.twap, nowSec, mark.value, paused),
  });
}

export function setFeeBps(state: VammState, feeBps: Bps): Result<VammState, CoreError> {
  return validateFeeBps(feeBps).map(value => ({ ...state, feeBps: value }));
}
