/**
 * Account bookkeeping inside a transaction
 *
 * - position reads/writes and the active-market set
 * - quote collateral, reserved margin and free collateral (1e18)
 * - collecting from and crediting to the collateral ledger
 * - bad debt
 *
 * Collecting rounds native units up, crediting rounds them down.
 */

import { err, ok, type Result } from "neverthrow";

import {
  emptyPosition,
  fromTokenUnits,
  maxOf,
  minOf,
  toTokenUnits,
  type AccountId,
  type MarketId,
  type Position,
  type TokenId,
  type X18,
} from "@perp-clearing/core";

import type { EngineContext } from "./context";
import { clearingError, fromLedgerError, type ClearingError } from "./errors";
import type { BadDebtReason } from "./events";
import { positionKey } from "./state/clearing-store";
import type { Transaction } from "./transaction";

// ─────────────────────────────────────────────────────────────────────────────
// Positions
// ─────────────────────────────────────────────────────────────────────────────

export function activeMarketsOf(tx: Transaction, account: AccountId): readonly MarketId[] {
  return tx.activeMarkets.get(account) ?? [];
}

export function loadPosition(tx: Transaction, account: AccountId, marketId: MarketId, fundingIndexX18: X18): Position {
  return tx.positions.get(positionKey(account, marketId)) ?? emptyPosition(fundingIndexX18);
}

/**
 * Store a position and keep the active-market set in step with its size
 */
export function savePosition(tx: Transaction, account: AccountId, marketId: MarketId, position: Position): void {
  tx.positions.set(positionKey(account, marketId), position);

  const active = activeMarketsOf(tx, account);
  const listed = active.includes(marketId);
  if (position.size !== 0n && !listed) {
    tx.activeMarkets.set(account, [...active, marketId]);
  } else if (position.size === 0n && listed) {
    tx.activeMarkets.set(
      account,
      active.filter(m => m !== marketId),
    );
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Collateral
// ─────────────────────────────────────────────────────────────────────────────

/**
 * An account's balance in one quote token
 */
export interface QuoteAccount {
  account: AccountId;
  token: TokenId;
  baseUnit: bigint;
}

export function quoteAccount(tx: Transaction, account: AccountId, token: TokenId): Result<QuoteAccount, ClearingError> {
  return tx.ledger
    .tokenConfig(token)
    .mapErr(fromLedgerError)
    .map(config => ({ account, token, baseUnit: config.baseUnit }));
}

export function quoteCollateral(tx: Transaction, qa: QuoteAccount): X18 {
  return fromTokenUnits(tx.ledger.balanceOf(qa.account, qa.token), qa.baseUnit);
}

/**
 * Σ margin over the account's active markets settled in `token`
 */
export function reservedMargin(ctx: EngineContext, tx: Transaction, account: AccountId, token: TokenId): X18 {
  let total = 0n;
  for (const marketId of activeMarketsOf(tx, account)) {
    if (ctx.directory.getMarket(marketId)?.quoteToken !== token) continue;
    total += tx.positions.get(positionKey(account, marketId))?.margin ?? 0n;
  }
  return total;
}

/**
 * Quote collateral not reserved as margin; negative when margin is unbacked
 */
export function freeCollateral(ctx: EngineContext, tx: Transaction, qa: QuoteAccount): X18 {
  return quoteCollateral(tx, qa) - reservedMargin(ctx, tx, qa.account, qa.token);
}

export function availableFreeCollateral(ctx: EngineContext, tx: Transaction, qa: QuoteAccount): X18 {
  return maxOf(freeCollateral(ctx, tx, qa), 0n);
}

export interface Collected {
  amountX18: X18;
  units: bigint;
}

/**
 * Take up to `amountX18` from the account's balance, capped by what it holds.
 * With `to` the amount is moved to that account, otherwise it is debited as
 * PnL.
 */
export function collect(
  tx: Transaction,
  qa: QuoteAccount,
  amountX18: X18,
  to?: AccountId,
): Result<Collected, ClearingError> {
  if (amountX18 <= 0n) return ok({ amountX18: 0n, units: 0n });

  const units = minOf(toTokenUnits(amountX18, qa.baseUnit, "up"), tx.ledger.balanceOf(qa.account, qa.token));
  if (units <= 0n) return ok({ amountX18: 0n, units: 0n });

  const moved =
    to === undefined ?
      tx.ledger.settlePnL(qa.account, qa.token, -units)
    : tx.ledger.seize(qa.account, to, qa.token, units);
  if (moved.isErr()) return err(fromLedgerError(moved.error));

  return ok({ amountX18: minOf(amountX18, fromTokenUnits(units, qa.baseUnit)), units });
}

/**
 * Credit PnL to the account; returns the 1e18 value of the units credited
 */
export function credit(tx: Transaction, qa: QuoteAccount, amountX18: X18): Result<X18, ClearingError> {
  const units = toTokenUnits(amountX18, qa.baseUnit, "down");
  if (units <= 0n) return ok(0n);
  return tx.ledger
    .settlePnL(qa.account, qa.token, units)
    .mapErr(fromLedgerError)
    .map(() => fromTokenUnits(units, qa.baseUnit));
}

// ─────────────────────────────────────────────────────────────────────────────
// Waterfalls
// ─────────────────────────────────────────────────────────────────────────────

export interface Draw {
  fromMarginX18: X18;
  fromFreeX18: X18;
  /** Part of the amount neither pool can cover */
  uncoveredX18: X18;
}

/**
 * Split a charge across position margin and free collateral in the given order
 */
export function planDraw(amountX18: X18, marginX18: X18, freeX18: X18, order: "margin-first" | "free-first"): Draw {
  const free = maxOf(freeX18, 0n);
  if (order === "margin-first") {
    const fromMarginX18 = minOf(amountX18, marginX18);
    const fromFreeX18 = minOf(amountX18 - fromMarginX18, free);
    return { fromMarginX18, fromFreeX18, uncoveredX18: amountX18 - fromMarginX18 - fromFreeX18 };
  }
  const fromFreeX18 = minOf(amountX18, free);
  const fromMarginX18 = minOf(amountX18 - fromFreeX18, marginX18);
  return { fromMarginX18, fromFreeX18, uncoveredX18: amountX18 - fromMarginX18 - fromFreeX18 };
}

export interface Charge {
  collectedX18: X18;
  collectedUnits: bigint;
  uncoveredX18: X18;
}

/**
 * Charge `amountX18` against the stored position's margin and the account's
 * free collateral, moving the collected part to `to` (or debiting it as PnL).
 * Whatever the ledger balance cannot cover is reported as uncovered.
 */
export function chargeAccount(
  ctx: EngineContext,
  tx: Transaction,
  qa: QuoteAccount,
  marketId: MarketId,
  amountX18: X18,
  order: "margin-first" | "free-first",
  to?: AccountId,
): Result<Charge, ClearingError> {
  if (amountX18 <= 0n) {
    return ok({ collectedX18: 0n, collectedUnits: 0n, uncoveredX18: 0n });
  }

  const position = tx.positions.get(positionKey(qa.account, marketId));
  const margin = position && position.size !== 0n ? position.margin : 0n;
  const draw = planDraw(amountX18, margin, freeCollateral(ctx, tx, qa), order);

  return collect(tx, qa, draw.fromMarginX18 + draw.fromFreeX18, to).map(collected => {
    if (position && draw.fromMarginX18 > 0n) {
      savePosition(tx, qa.account, marketId, { ...position, margin: position.margin - draw.fromMarginX18 });
    }
    return {
      collectedX18: collected.amountX18,
      collectedUnits: collected.units,
      uncoveredX18: amountX18 - collected.amountX18,
    };
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// Bad debt
// ─────────────────────────────────────────────────────────────────────────────

export function recordBadDebt(
  ctx: EngineContext,
  tx: Transaction,
  account: AccountId,
  marketId: MarketId,
  amountX18: X18,
  reason: BadDebtReason,
): void {
  if (amountX18 <= 0n) return;
  const market = tx.markets.get(marketId);
  if (!market) return;

  tx.markets.set(marketId, { ...market, badDebtX18: market.badDebtX18 + amountX18 });
  tx.emit({ type: "BAD_DEBT_RECORDED", ts: tx.nowSec, account, marketId, amountX18, reason });
  ctx.log.warn("bad debt recorded", { account, marketId, amountX18, reason });
}

export function requirePosition(position: Position, account: AccountId, marketId: MarketId): Result<Position, ClearingError> {
  if (position.size === 0n) {
    return err(clearingError("NO_POSITION", `${account} has no position in ${marketId}`));
  }
  return ok(position);
}
