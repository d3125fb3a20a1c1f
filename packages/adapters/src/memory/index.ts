export { ManualClock, SystemClock } from "./clock";
export { MemoryCollateralLedger, stableToken } from "./memory-collateral-ledger";
export { MemoryFeeDistributor } from "./memory-fee-distributor";
export { MemoryInsuranceFund } from "./memory-insurance-fund";
export { MemoryMarketDirectory } from "./memory-market-directory";
export { StaticPriceSource } from "./static-price-source";
