/**
 * Transaction
 *
 * One per engine operation. State writes go to overlays and collaborator
 * effects are buffered; commit applies both, dropping the transaction
 * discards both.
 */

import { err, ok, type Result } from "neverthrow";

import type {
  CollateralLedgerPort,
  FeeDistributorError,
  FeeDistributorPort,
  InsuranceFundPort,
} from "@perp-clearing/adapters";
import type { AccountId, MarketId, Position, UnixSec } from "@perp-clearing/core";

import { fromFeeDistributorError, fromInsuranceFundError, fromLedgerError, type ClearingError } from "./errors";
import type { ClearingEvent } from "./events";
import { BufferedLedger } from "./state/buffered-ledger";
import type { ClearingStore, MarketState } from "./state/clearing-store";
import { OverlayMap } from "./state/overlay-map";

interface InsurancePayout {
  fund: InsuranceFundPort;
  to: AccountId;
  amount: bigint;
}

type FeeNotification = () => Result<void, FeeDistributorError>;

export class Transaction {
  readonly markets: OverlayMap<MarketId, MarketState>;
  readonly positions: OverlayMap<string, Position>;
  readonly activeMarkets: OverlayMap<AccountId, readonly MarketId[]>;
  readonly ledger: BufferedLedger;

  private readonly payouts: InsurancePayout[] = [];
  private readonly notifications: FeeNotification[] = [];
  private readonly events: ClearingEvent[] = [];

  constructor(
    store: ClearingStore,
    ledger: CollateralLedgerPort,
    readonly nowSec: UnixSec,
  ) {
    this.markets = new OverlayMap(store.markets);
    this.positions = new OverlayMap(store.positions);
    this.activeMarkets = new OverlayMap(store.activeMarkets);
    this.ledger = new BufferedLedger(ledger);
  }

  /**
   * Queue an insurance payout; returns what the fund can still pay after
   * earlier payouts queued in this transaction.
   */
  payoutInsurance(fund: InsuranceFundPort, to: AccountId, amount: bigint): bigint {
    if (amount <= 0n) return 0n;
    const queued = this.payouts.filter(p => p.fund === fund).reduce((sum, p) => sum + p.amount, 0n);
    const available = fund.balance() - queued;
    const paid = amount < available ? amount : available;
    if (paid <= 0n) return 0n;
    this.payouts.push({ fund, to, amount: paid });
    return paid;
  }

  notifyTradeFee(distributor: FeeDistributorPort, amount: bigint): void {
    if (amount <= 0n) return;
    this.notifications.push(() => distributor.onTradeFee(amount));
  }

  notifyLiquidationPenalty(distributor: FeeDistributorPort, amount: bigint): void {
    if (amount <= 0n) return;
    this.notifications.push(() => distributor.onLiquidationPenalty(amount));
  }

  emit(event: ClearingEvent): void {
    this.events.push(event);
  }

  /**
   * Apply buffered effects, then state. Returns the events to publish.
   *
   * Payouts are checked against fund balances before anything is written.
   * A collaborator refusal after the ledger commit rolls the ledger back.
   */
  commit(): Result<readonly ClearingEvent[], ClearingError> {
    const covered = this.checkPayouts();
    if (covered.isErr()) return err(covered.error);

    const ledger = this.ledger.commit();
    if (ledger.isErr()) return err(fromLedgerError(ledger.error));

    for (const notify of this.notifications) {
      const notified = notify();
      if (notified.isErr()) return this.abort(fromFeeDistributorError(notified.error));
    }

    for (const payout of this.payouts) {
      const paid = payout.fund.payout(payout.to, payout.amount);
      if (paid.isErr()) return this.abort(fromInsuranceFundError(paid.error));
    }

    this.markets.commit();
    this.positions.commit();
    this.activeMarkets.commit();

    return ok([...this.events]);
  }

  private checkPayouts(): Result<void, ClearingError> {
    const owed = new Map<InsuranceFundPort, bigint>();
    for (const payout of this.payouts) {
      owed.set(payout.fund, (owed.get(payout.fund) ?? 0n) + payout.amount);
    }
    for (const [fund, amount] of owed) {
      const balance = fund.balance();
      if (balance < amount) {
        return err(
          fromInsuranceFundError({
            type: "INSUFFICIENT_FUNDS",
            message: `insurance fund holds ${balance.toString()}, owes ${amount.toString()}`,
          }),
        );
      }
    }
    return ok(undefined);
  }

  private abort(error: ClearingError): Result<never, ClearingError> {
    const undone = this.ledger.rollback();
    if (undone.isErr()) return err(fromLedgerError(undone.error));
    return err(error);
  }
}
