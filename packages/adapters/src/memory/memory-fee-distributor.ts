/**
 * Fee distributor that tallies notifications
 */

import { ok, type Result } from "neverthrow";

import type { FeeDistributorError, FeeDistributorPort } from "../ports/fee-distributor-port";

export class MemoryFeeDistributor implements FeeDistributorPort {
  tradeFees = 0n;
  liquidationPenalties = 0n;

  onTradeFee(amount: bigint): Result<void, FeeDistributorError> {
    this.tradeFees += amount;
    return ok(undefined);
  }

  onLiquidationPenalty(amount: bigint): Result<void, FeeDistributorError> {
    this.liquidationPenalties += amount;
    return ok(undefined);
  }
}
