/**
 * packages/core - Pure Pricing and Clearing Math
 *
 * This package contains the pure logic of the clearing venue.
 * NO I/O dependencies (DB, HTTP, WS, FS).
 * NO exceptions thrown (uses Result types where needed).
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────
export type {
  // Value objects
  X18,
  Bps,
  UnixSec,
  AccountId,
  MarketId,
  TokenId,
  Direction,
  // Positions and risk
  Position,
  TradeKind,
  MarketRiskParams,
  // Pricing engine
  Observation,
  TwapState,
  FundingState,
  VammState,
  VammConfig,
  SwapFill,
  // Errors
  CoreErrorType,
  CoreError,
} from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Fixed Point
// ─────────────────────────────────────────────────────────────────────────────
export type { ParseDecimalError } from "./fixed-point";
export {
  WAD,
  BPS_DENOMINATOR,
  SECONDS_PER_HOUR,
  SECONDS_PER_DAY,
  abs,
  minOf,
  maxOf,
  signOf,
  divFloor,
  divCeil,
  mulDiv,
  mulDivUp,
  mulWad,
  mulWadUp,
  applyBps,
  applyBpsUp,
  toTokenUnits,
  fromTokenUnits,
  parseDecimal,
  formatDecimal,
} from "./fixed-point";

// ─────────────────────────────────────────────────────────────────────────────
// Virtual AMM
// ─────────────────────────────────────────────────────────────────────────────
export type { SwapOutcome } from "./vamm";
export {
  MAX_FEE_BPS,
  MAX_RESET_DEVIATION_BPS,
  MIN_OBSERVATION_CARDINALITY,
  validateFeeBps,
  getMarkPrice,
  initializeVamm,
  buy,
  sell,
  resetReserves,
  setSwapsPaused,
  setFeeBps,
} from "./vamm";

// ─────────────────────────────────────────────────────────────────────────────
// TWAP
// ─────────────────────────────────────────────────────────────────────────────
export { createTwapState, latestObservation, writeObservation, consultTwap } from "./twap";

// ─────────────────────────────────────────────────────────────────────────────
// Funding
// ─────────────────────────────────────────────────────────────────────────────
export type { FundingUpdate, FundingOutcome, FundingParams } from "./funding";
export { MAX_FUNDING_ELAPSED_SEC, pokeFunding, setFundingParams } from "./funding";

// ─────────────────────────────────────────────────────────────────────────────
// Position Accounting
// ─────────────────────────────────────────────────────────────────────────────
export type { TradeApplication } from "./position";
export { emptyPosition, pnlForClose, applyFill, addsRisk } from "./position";

// ─────────────────────────────────────────────────────────────────────────────
// Margin and Liquidation Math
// ─────────────────────────────────────────────────────────────────────────────
export type { PenaltySplit } from "./margin";
export {
  notional,
  requiredMargin,
  unrealizedPnl,
  pendingFunding,
  effectiveMargin,
  isBelowMaintenance,
  marginRatio,
  liquidationPenalty,
  splitPenalty,
  validateRiskParams,
  checkPositionBounds,
} from "./margin";

// ─────────────────────────────────────────────────────────────────────────────
// Price Fallback Chain
// ─────────────────────────────────────────────────────────────────────────────
export type { PriceSourceKind, PriceCandidate, ResolvedPrice } from "./price-chain";
export { resolvePrice } from "./price-chain";
