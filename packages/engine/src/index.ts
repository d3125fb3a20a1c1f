/**
 * packages/engine - Margin, Liquidation and Pricing Engine
 *
 * Stateful engine over the pure math in @perp-clearing/core. Every mutation
 * is transactional; collaborators are reached only through the ports in
 * @perp-clearing/adapters.
 */

export type { ClearingEngineDeps, Reserves } from "./margin-engine";
export { ClearingEngine, DEFAULT_MAX_ACTIVE_MARKETS } from "./margin-engine";

export type { Role, RoleGrants } from "./access-control";
export { AccessControl } from "./access-control";

export type { ClearingError, ClearingErrorCategory, ClearingErrorType, EngineErrorType } from "./errors";
export { clearingError } from "./errors";

export type { BadDebtReason, ClearingEvent, ClearingEventType, EventSink } from "./events";

export type { TradeResult } from "./trade";
export type { LiquidationResult } from "./liquidation";
export type { PricedMarket } from "./pricing-engine";
export { PricingEngine } from "./pricing-engine";
