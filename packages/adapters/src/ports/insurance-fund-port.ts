/**
 * Insurance Fund Port - backstop for liquidation shortfalls
 *
 * Amounts are in native units of the market's quote token.
 */

import type { Result } from "neverthrow";

export type InsuranceFundError =
  | { type: "INSUFFICIENT_FUNDS"; message: string }
  | { type: "PAYOUT_FAILED"; message: string };

export interface InsuranceFundPort {
  balance(): bigint;

  /**
   * Pay `amount` to `to`, returns the amount paid
   */
  payout(to: string, amount: bigint): Result<bigint, InsuranceFundError>;
}
