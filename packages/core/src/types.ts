/**
 * Core Domain Types
 *
 * Pure type definitions shared by the pricing engine and the clearing engine.
 * No I/O dependencies, no side effects.
 *
 * All amounts and prices are fixed-point bigints scaled by 1e18 unless the
 * name says otherwise (`Bps` are plain basis points, timestamps are seconds).
 */

// ─────────────────────────────────────────────────────────────────────────────
// Value Objects
// ─────────────────────────────────────────────────────────────────────────────

/** Fixed-point number scaled by 1e18 */
export type X18 = bigint;

/** Basis points (1/10000) */
export type Bps = number;

/** Unix timestamp in seconds */
export type UnixSec = number;

export type AccountId = string;
export type MarketId = string;
export type TokenId = string;

/** Trade direction from the trader's point of view */
export type Direction = "long" | "short";

// ─────────────────────────────────────────────────────────────────────────────
// Position
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Per-account, per-market position.
 *
 * Invariant: `size === 0n` if and only if `entryPriceX18 === 0n`.
 */
export interface Position {
  /** Signed base quantity (positive = long, negative = short) */
  size: X18;
  /** Quote value reserved against this position */
  margin: X18;
  /** Volume-weighted average entry price */
  entryPriceX18: X18;
  /** Snapshot of the cumulative funding index at last settlement */
  lastFundingIndexX18: X18;
  /** Cumulative realized PnL, fees included */
  realizedPnlX18: X18;
}

/**
 * How a trade changed a position
 */
export type TradeKind = "open" | "increase" | "reduce" | "close" | "flip";

// ─────────────────────────────────────────────────────────────────────────────
// Risk Parameters
// ─────────────────────────────────────────────────────────────────────────────

export interface MarketRiskParams {
  /** Initial margin requirement */
  imrBps: Bps;
  /** Maintenance margin requirement (0 < mmr <= imr) */
  mmrBps: Bps;
  liquidationPenaltyBps: Bps;
  /** Absolute cap on a single liquidation penalty (0 = uncapped) */
  penaltyCap: X18;
  /** 0 = unbounded */
  maxPositionSize: X18;
  /** 0 = no floor */
  minPositionSize: X18;
  /** Liquidator's share of the penalty, remainder goes to the protocol */
  liquidatorShareBps: Bps;
}

// ─────────────────────────────────────────────────────────────────────────────
// Pricing Engine State
// ─────────────────────────────────────────────────────────────────────────────

/**
 * TWAP observation.
 *
 * Prices only move at observations, so `priceX18` holds from `timestamp`
 * until the next observation.
 */
export interface Observation {
  timestamp: UnixSec;
  /** Σ price × seconds over unpaused time */
  priceCumulativeX18: bigint;
  /** Σ unpaused seconds */
  activeSeconds: bigint;
  /** Mark price right after this observation */
  priceX18: X18;
  /** Whether swaps were paused right after this observation */
  paused: boolean;
}

export interface TwapState {
  cardinality: number;
  /** Ring buffer (length grows up to `cardinality`) */
  observations: readonly Observation[];
  /** Index of the most recent observation */
  head: number;
  genesisTs: UnixSec;
}

export interface FundingState {
  /** Signed cumulative funding per unit of base */
  cumulativeFundingPerUnitX18: X18;
  lastFundingTs: UnixSec;
  frMaxBpsPerHour: Bps;
  /** Funding sensitivity k */
  kFundingX18: X18;
  /** TWAP window used as the mark side of the premium */
  twapWindowSec: number;
}

export interface VammState {
  reserveBaseX18: X18;
  reserveQuoteX18: X18;
  minReserveBaseX18: X18;
  minReserveQuoteX18: X18;
  feeBps: Bps;
  /** Cumulative swap fees in quote (informational) */
  feeGrowthGlobalX18: X18;
  paused: boolean;
  twap: TwapState;
  funding: FundingState;
}

export interface VammConfig {
  priceX18: X18;
  baseReserveX18: X18;
  feeBps: Bps;
  frMaxBpsPerHour: Bps;
  kFundingX18: X18;
  observationCardinality: number;
  minReserveBaseX18: X18;
  minReserveQuoteX18: X18;
  fundingTwapWindowSec: number;
}

/**
 * Result of a swap, signed from the trader's perspective
 * (base positive = received, quote negative = paid).
 */
export interface SwapFill {
  baseDeltaX18: X18;
  quoteDeltaX18: X18;
  avgPriceX18: X18;
  /** Swap fee valued in quote */
  feeQuoteX18: X18;
}

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export type CoreErrorType =
  | "ZERO_AMOUNT"
  | "SWAPS_PAUSED"
  | "SLIPPAGE_EXCEEDED"
  | "RESERVE_FLOOR_BREACHED"
  | "RESET_PRICE_DEVIATION"
  | "INSUFFICIENT_TWAP_HISTORY"
  | "INVALID_MARKET_CONFIG"
  | "INVALID_RISK_PARAMS"
  | "SIZE_BELOW_MINIMUM"
  | "SIZE_ABOVE_MAXIMUM"
  | "PRICE_UNAVAILABLE";

export interface CoreError {
  type: CoreErrorType;
  message: string;
}
