/**
 * Funding settlement
 *
 * Pokes the market's funding index, then moves the position's pending
 * payment: credits to margin and collateral, debits from margin, then free
 * collateral, then bad debt. Settling twice at the same timestamp is a no-op.
 */

import { err, ok, type Result } from "neverthrow";

import { pendingFunding, type AccountId, type MarketId, type X18 } from "@perp-clearing/core";

import {
  activeMarketsOf,
  chargeAccount,
  credit,
  quoteAccount,
  recordBadDebt,
  savePosition,
} from "./accounts";
import type { EngineContext } from "./context";
import type { ClearingError } from "./errors";
import { positionKey } from "./state/clearing-store";
import type { Transaction } from "./transaction";

/**
 * Settle one market; returns the signed payment (positive = received)
 */
export function settleMarketFunding(
  ctx: EngineContext,
  tx: Transaction,
  account: AccountId,
  marketId: MarketId,
): Result<X18, ClearingError> {
  const market = ctx.pricing.pokeFunding(tx, marketId).andThen(() => ctx.pricing.market(tx, marketId));
  if (market.isErr()) return err(market.error);

  const { config, state } = market.value;
  const cumulative = state.vamm.funding.cumulativeFundingPerUnitX18;
  const position = tx.positions.get(positionKey(account, marketId));
  if (!position || position.lastFundingIndexX18 === cumulative) return ok(0n);

  const payment = pendingFunding(position, cumulative);
  savePosition(tx, account, marketId, { ...position, lastFundingIndexX18: cumulative });
  if (payment === 0n) return ok(0n);

  const qa = quoteAccount(tx, account, config.quoteToken);
  if (qa.isErr()) return err(qa.error);

  if (payment > 0n) {
    const credited = credit(tx, qa.value, payment);
    if (credited.isErr()) return err(credited.error);
    const current = tx.positions.get(positionKey(account, marketId)) ?? position;
    savePosition(tx, account, marketId, { ...current, margin: current.margin + credited.value });
  } else {
    const charged = chargeAccount(ctx, tx, qa.value, marketId, -payment, "margin-first");
    if (charged.isErr()) return err(charged.error);
    recordBadDebt(ctx, tx, account, marketId, charged.value.uncoveredX18, "funding");
  }

  tx.emit({ type: "FUNDING_SETTLED", ts: tx.nowSec, account, marketId, paymentX18: payment });
  ctx.log.debug("funding settled", { account, marketId, paymentX18: payment });
  return ok(payment);
}

/**
 * Settle every market in the account's active set, plus `alsoMarketId`
 * when given (the market an operation is about to touch)
 */
export function settleAccountFunding(
  ctx: EngineContext,
  tx: Transaction,
  account: AccountId,
  alsoMarketId?: MarketId,
): Result<void, ClearingError> {
  const markets = [...activeMarketsOf(tx, account)];
  if (alsoMarketId !== undefined && !markets.includes(alsoMarketId)) markets.push(alsoMarketId);

  for (const marketId of markets) {
    const settled = settleMarketFunding(ctx, tx, account, marketId);
    if (settled.isErr()) return err(settled.error);
  }
  return ok(undefined);
}
