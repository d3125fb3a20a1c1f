/**
 * Clearing errors
 *
 * Every failure carries a machine code, a category and a message.
 * - validation / permission: rejected before anything is touched
 * - risk: the whole operation is rolled back
 * - price: every source in the fallback chain failed
 * - collaborator: an external port refused an effect
 */

import type { CoreError, CoreErrorType } from "@perp-clearing/core";
import type { FeeDistributorError, InsuranceFundError, LedgerError } from "@perp-clearing/adapters";

export type ClearingErrorCategory = "validation" | "risk" | "price" | "collaborator" | "permission";

export type EngineErrorType =
  | "UNKNOWN_MARKET"
  | "MARKET_NOT_INITIALIZED"
  | "MARKET_ALREADY_INITIALIZED"
  | "MARKET_INACTIVE"
  | "RISK_PARAMS_NOT_SET"
  | "NO_POSITION"
  | "SIZE_EXCEEDS_POSITION"
  | "SELF_LIQUIDATION"
  | "DUST_REMAINDER"
  | "TOO_MANY_ACTIVE_MARKETS"
  | "ACCOUNT_LIQUIDATABLE"
  | "INSUFFICIENT_COLLATERAL"
  | "INSUFFICIENT_MARGIN"
  | "WOULD_BE_LIQUIDATABLE"
  | "NOT_LIQUIDATABLE"
  | "WITHDRAW_BREACHES_MARGIN"
  | "MARGIN_BELOW_MAINTENANCE"
  | "LEDGER_ERROR"
  | "INSURANCE_FUND_ERROR"
  | "FEE_DISTRIBUTOR_ERROR"
  | "PERMISSION_DENIED";

export type ClearingErrorType = CoreErrorType | EngineErrorType;

export interface ClearingError {
  type: ClearingErrorType;
  category: ClearingErrorCategory;
  message: string;
}

const CATEGORY: Record<ClearingErrorType, ClearingErrorCategory> = {
  // Core
  ZERO_AMOUNT: "validation",
  SWAPS_PAUSED: "validation",
  SLIPPAGE_EXCEEDED: "risk",
  RESERVE_FLOOR_BREACHED: "risk",
  RESET_PRICE_DEVIATION: "validation",
  INSUFFICIENT_TWAP_HISTORY: "price",
  INVALID_MARKET_CONFIG: "validation",
  INVALID_RISK_PARAMS: "validation",
  SIZE_BELOW_MINIMUM: "validation",
  SIZE_ABOVE_MAXIMUM: "validation",
  PRICE_UNAVAILABLE: "price",
  // Engine
  UNKNOWN_MARKET: "validation",
  MARKET_NOT_INITIALIZED: "validation",
  MARKET_ALREADY_INITIALIZED: "validation",
  MARKET_INACTIVE: "validation",
  RISK_PARAMS_NOT_SET: "validation",
  NO_POSITION: "validation",
  SIZE_EXCEEDS_POSITION: "validation",
  SELF_LIQUIDATION: "validation",
  DUST_REMAINDER: "validation",
  TOO_MANY_ACTIVE_MARKETS: "validation",
  ACCOUNT_LIQUIDATABLE: "risk",
  INSUFFICIENT_COLLATERAL: "risk",
  INSUFFICIENT_MARGIN: "risk",
  WOULD_BE_LIQUIDATABLE: "risk",
  NOT_LIQUIDATABLE: "risk",
  WITHDRAW_BREACHES_MARGIN: "risk",
  MARGIN_BELOW_MAINTENANCE: "risk",
  LEDGER_ERROR: "collaborator",
  INSURANCE_FUND_ERROR: "collaborator",
  FEE_DISTRIBUTOR_ERROR: "collaborator",
  PERMISSION_DENIED: "permission",
};

export function clearingError(type: ClearingErrorType, message: string): ClearingError {
  return { type, category: CATEGORY[type], message };
}

export function fromCoreError(error: CoreError): ClearingError {
  return clearingError(error.type, error.message);
}

export function fromLedgerError(error: LedgerError): ClearingError {
  return clearingError("LEDGER_ERROR", `${error.type}: ${error.message}`);
}

export function fromInsuranceFundError(error: InsuranceFundError): ClearingError {
  return clearingError("INSURANCE_FUND_ERROR", `${error.type}: ${error.message}`);
}

export function fromFeeDistributorError(error: FeeDistributorError): ClearingError {
  return clearingError("FEE_DISTRIBUTOR_ERROR", `${error.type}: ${error.message}`);
}
