/**
 * Port interfaces for collaborators
 *
 * - Narrow contracts the clearing engine depends on
 * - Implementations live outside the engine
 */

export type { CollateralLedgerPort, LedgerError, TokenConfig } from "./collateral-ledger-port";

export type { IndexPricePort, PriceSourceError } from "./index-price-port";

export type { InsuranceFundError, InsuranceFundPort } from "./insurance-fund-port";

export type { FeeDistributorError, FeeDistributorPort } from "./fee-distributor-port";

export type { MarketConfig, MarketDirectoryPort } from "./market-directory-port";

export type { ClockPort } from "./clock-port";
