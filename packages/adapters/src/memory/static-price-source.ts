/**
 * Settable index price source
 */

import { err, ok, type Result } from "neverthrow";

import type { IndexPricePort, PriceSourceError } from "../ports/index-price-port";

export class StaticPriceSource implements IndexPricePort {
  private failure: PriceSourceError | null = null;

  constructor(private priceX18: bigint) {}

  setPrice(priceX18: bigint): void {
    this.priceX18 = priceX18;
    this.failure = null;
  }

  /**
   * Make every read fail until the next setPrice
   */
  setFailure(failure: PriceSourceError): void {
    this.failure = failure;
  }

  getPrice(): Result<bigint, PriceSourceError> {
    if (this.failure) return err(this.failure);
    return ok(this.priceX18);
  }
}
