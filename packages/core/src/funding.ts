/**
 * Funding Rate Derivation
 *
 * - premium = TWAP - index
 * - rate = premium × k × elapsed / 24h
 * - |rate| <= index × frMaxBpsPerHour × elapsed / 1h
 * - elapsed is capped at one hour per update
 * - index failure or zero index: advance the timestamp, leave the index alone
 *
 * This module is pure (no I/O, no throw).
 */

import { err, ok, type Result } from "neverthrow";

import { BPS_DENOMINATOR, SECONDS_PER_DAY, SECONDS_PER_HOUR, WAD, maxOf, minOf } from "./fixed-point";
import { consultTwap, latestObservation } from "./twap";
import type { CoreError, UnixSec, VammState, X18 } from "./types";

export const MAX_FUNDING_ELAPSED_SEC = 3_600;

export type FundingUpdate =
  | { type: "NOOP" }
  | { type: "DEFERRED"; reason: string }
  | {
      type: "APPLIED";
      elapsedSec: number;
      twapX18: X18;
      /** true when the TWAP lacked history and the mark price stood in */
      usedMarkFallback: boolean;
      indexPriceX18: X18;
      premiumX18: X18;
      rateX18: X18;
      clamped: boolean;
    };

export interface FundingOutcome {
  state: VammState;
  update: FundingUpdate;
}

/**
 * Advance the cumulative funding index.
 *
 * @param indexPrice - result of the index price source
 */
export function pokeFunding<E>(
  state: VammState,
  nowSec: UnixSec,
  indexPrice: Result<X18, E>,
  describeError: (error: E) => string,
): FundingOutcome {
  const { funding } = state;
  if (nowSec <= funding.lastFundingTs) {
    return { state, update: { type: "NOOP" } };
  }

  const advanced: VammState = { ...state, funding: { ...funding, lastFundingTs: nowSec } };

  if (indexPrice.isErr()) {
    return { state: advanced, update: { type: "DEFERRED", reason: describeError(indexPrice.error) } };
  }
  const index = indexPrice.value;
  if (index <= 0n) {
    return { state: advanced, update: { type: "DEFERRED", reason: "index price is zero" } };
  }

  const elapsedSec = Math.min(nowSec - funding.lastFundingTs, MAX_FUNDING_ELAPSED_SEC);
  const elapsed = BigInt(elapsedSec);

  const twap = consultTwap(state.twap, funding.twapWindowSec, nowSec);
  const twapX18 = twap.isOk() ? twap.value : latestObservation(state.twap).priceX18;

  const premiumX18 = twapX18 - index;
  // Truncates toward zero so neither side is over-charged by rounding
  const rawRate = (premiumX18 * funding.kFundingX18 * elapsed) / (WAD * SECONDS_PER_DAY);
  const maxRate = (index * BigInt(funding.frMaxBpsPerHour) * elapsed) / (BPS_DENOMINATOR * SECONDS_PER_HOUR);
  const rateX18 = maxOf(-maxRate, minOf(rawRate, maxRate));

  return {
    state: {
      ...advanced,
      funding: {
        ...advanced.funding,
        cumulativeFundingPerUnitX18: funding.cumulativeFundingPerUnitX18 + rateX18,
      },
    },
    update: {
      type: "APPLIED",
      elapsedSec,
      twapX18,
      usedMarkFallback: twap.isErr(),
      indexPriceX18: index,
      premiumX18,
      rateX18,
      clamped: rateX18 !== rawRate,
    },
  };
}

export interface FundingParams {
  frMaxBpsPerHour: number;
  kFundingX18: X18;
  twapWindowSec: number;
}

export function setFundingParams(state: VammState, params: FundingParams): Result<VammState, CoreError> {
  if (!Number.isInteger(params.frMaxBpsPerHour) || params.frMaxBpsPerHour < 0) {
    return err({ type: "INVALID_MARKET_CONFIG", message: "frMaxBpsPerHour must be a non-negative integer" });
  }
  if (params.kFundingX18 < 0n || params.twapWindowSec < 0) {
    return err({ type: "INVALID_MARKET_CONFIG", message: "funding sensitivity and TWAP window must not be negative" });
  }
  return ok({ ...state, funding: { ...state.funding, ...params } });
}
