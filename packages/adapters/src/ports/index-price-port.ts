/**
 * Index Price Port - external reference price for a market
 */

import type { Result } from "neverthrow";

export type PriceSourceError =
  | { type: "UNAVAILABLE"; message: string }
  | { type: "STALE"; message: string }
  | { type: "INVALID"; message: string };

export interface IndexPricePort {
  /**
   * Index price in 1e18; a zero price is reported as-is and treated as a
   * failure by the caller
   */
  getPrice(): Result<bigint, PriceSourceError>;
}
