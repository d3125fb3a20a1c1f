import type { MarketDirectoryPort } from "@perp-clearing/adapters";
import type { Logger } from "@perp-clearing/utils";

import type { PricingEngine } from "./pricing-engine";

/**
 * Collaborators shared by the engine's operation modules
 */
export interface EngineContext {
  directory: MarketDirectoryPort;
  pricing: PricingEngine;
  log: Logger;
  maxActiveMarkets: number;
}
