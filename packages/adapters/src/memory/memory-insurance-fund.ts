/**
 * Insurance fund backed by a ledger account
 *
 * Payouts move quote tokens from the fund's own ledger account to the
 * recipient, never more than the fund holds.
 */

import { ok, type Result } from "neverthrow";

import type { CollateralLedgerPort } from "../ports/collateral-ledger-port";
import type { InsuranceFundError, InsuranceFundPort } from "../ports/insurance-fund-port";

export class MemoryInsuranceFund implements InsuranceFundPort {
  constructor(
    private readonly ledger: CollateralLedgerPort,
    readonly account: string,
    readonly token: string,
  ) {}

  balance(): bigint {
    return this.ledger.balanceOf(this.account, this.token);
  }

  payout(to: string, amount: bigint): Result<bigint, InsuranceFundError> {
    const paid = amount < this.balance() ? amount : this.balance();
    if (paid <= 0n) return ok(0n);

    return this.ledger
      .seize(this.account, to, this.token, paid)
      .mapErr((e): InsuranceFundError => ({ type: "PAYOUT_FAILED", message: e.message }));
  }
}
