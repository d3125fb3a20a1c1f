/**
 * Fee Distributor Port - notified after fees land in the fee recipient account
 *
 * Amounts are in native units of the market's quote token.
 */

import type { Result } from "neverthrow";

export type FeeDistributorError = { type: "DISTRIBUTION_FAILED"; message: string };

export interface FeeDistributorPort {
  onTradeFee(amount: bigint): Result<void, FeeDistributorError>;
  onLiquidationPenalty(amount: bigint): Result<void, FeeDistributorError>;
}
