/**
 * Market Directory Port - static market configuration
 */

import type { FeeDistributorPort } from "./fee-distributor-port";
import type { IndexPricePort } from "./index-price-port";
import type { InsuranceFundPort } from "./insurance-fund-port";

export interface MarketConfig {
  marketId: string;
  baseToken: string;
  quoteToken: string;
  /** 10^decimals of the base asset */
  baseUnit: bigint;
  /** Clearing fee on trade notional */
  feeBps: number;
  paused: boolean;
  oracle: IndexPricePort;
  insuranceFund: InsuranceFundPort;
  feeDistributor: FeeDistributorPort;
  /** Ledger account that receives trade fees and the protocol's penalty share */
  feeRecipient: string;
}

export interface MarketDirectoryPort {
  getMarket(marketId: string): MarketConfig | undefined;
  isActive(marketId: string): boolean;
}
