/**
 * Trade application
 *
 * Folds a pricing-engine fill into the account's position:
 * 1. size / entry / realized PnL via applyFill
 * 2. realized PnL to collateral (losses: free collateral, then margin, then bad debt)
 * 3. trading fee from free collateral to the fee recipient
 * 4. IMR × opened notional reserved from free collateral
 * 5. IMR on the whole position at max(mark, risk price), topped up from free collateral
 * 6. no risk-adding trade may leave the position liquidatable
 *
 * Liquidation mode stops after step 2.
 */

import { err, ok, type Result } from "neverthrow";

import type { MarketConfig } from "@perp-clearing/adapters";
import {
  addsRisk,
  applyBpsUp,
  applyFill,
  checkPositionBounds,
  effectiveMargin,
  isBelowMaintenance,
  minOf,
  notional,
  requiredMargin,
  type AccountId,
  type MarketId,
  type MarketRiskParams,
  type Position,
  type SwapFill,
  type TradeKind,
  type X18,
} from "@perp-clearing/core";

import {
  availableFreeCollateral,
  chargeAccount,
  credit,
  loadPosition,
  quoteAccount,
  recordBadDebt,
  savePosition,
  type QuoteAccount,
} from "./accounts";
import type { EngineContext } from "./context";
import { clearingError, fromCoreError, type ClearingError } from "./errors";
import type { Transaction } from "./transaction";

export type TradeMode = "trade" | "liquidation";

export interface TradeInput {
  account: AccountId;
  marketId: MarketId;
  config: MarketConfig;
  riskParams: MarketRiskParams;
  fill: SwapFill;
  mode: TradeMode;
}

export interface TradeResult {
  kind: TradeKind;
  fill: SwapFill;
  position: Position;
  realizedPnlX18: X18;
  feeX18: X18;
}

export function applyTrade(ctx: EngineContext, tx: Transaction, input: TradeInput): Result<TradeResult, ClearingError> {
  const { account, marketId, config, riskParams, fill, mode } = input;

  const cumulative = ctx.pricing.cumulativeFunding(tx, marketId);
  if (cumulative.isErr()) return err(cumulative.error);

  const before = loadPosition(tx, account, marketId, cumulative.value);
  const applied = applyFill(before, fill.baseDeltaX18, fill.avgPriceX18);

  if (mode === "trade") {
    const bounds = checkPositionBounds(applied.position.size, riskParams);
    if (bounds.isErr()) return err(fromCoreError(bounds.error));
  }

  savePosition(tx, account, marketId, { ...applied.position, lastFundingIndexX18: cumulative.value });

  const qa = quoteAccount(tx, account, config.quoteToken);
  if (qa.isErr()) return err(qa.error);

  const settled = settleRealizedPnl(ctx, tx, qa.value, marketId, applied.realizedPnlX18);
  if (settled.isErr()) return err(settled.error);

  let feeX18 = 0n;
  if (mode === "trade") {
    const risked = enforceTradeRisk(ctx, tx, qa.value, {
      marketId,
      config,
      riskParams,
      fill,
      kind: applied.kind,
      openedSizeX18: applied.openedSizeX18,
      fundingIndexX18: cumulative.value,
    });
    if (risked.isErr()) return err(risked.error);
    feeX18 = risked.value;
  }

  const position = loadPosition(tx, account, marketId, cumulative.value);
  tx.emit({
    type: "POSITION_CHANGED",
    ts: tx.nowSec,
    account,
    marketId,
    kind: applied.kind,
    baseDeltaX18: fill.baseDeltaX18,
    quoteDeltaX18: fill.quoteDeltaX18,
    avgPriceX18: fill.avgPriceX18,
    feeX18,
    realizedPnlX18: applied.realizedPnlX18,
    sizeX18: position.size,
    marginX18: position.margin,
    entryPriceX18: position.entryPriceX18,
  });
  ctx.log.debug("position changed", {
    account,
    marketId,
    kind: applied.kind,
    sizeX18: position.size,
    avgPriceX18: fill.avgPriceX18,
  });

  return ok({ kind: applied.kind, fill, position, realizedPnlX18: applied.realizedPnlX18, feeX18 });
}

function settleRealizedPnl(
  ctx: EngineContext,
  tx: Transaction,
  qa: QuoteAccount,
  marketId: MarketId,
  realizedPnlX18: X18,
): Result<void, ClearingError> {
  if (realizedPnlX18 > 0n) {
    return credit(tx, qa, realizedPnlX18).map(() => undefined);
  }
  if (realizedPnlX18 < 0n) {
    return chargeAccount(ctx, tx, qa, marketId, -realizedPnlX18, "free-first").map(charge => {
      recordBadDebt(ctx, tx, qa.account, marketId, charge.uncoveredX18, "realized_loss");
    });
  }
  return ok(undefined);
}

interface RiskInput {
  marketId: MarketId;
  config: MarketConfig;
  riskParams: MarketRiskParams;
  fill: SwapFill;
  kind: TradeKind;
  openedSizeX18: X18;
  fundingIndexX18: X18;
}

/**
 * Fee, margin reservation and both post-trade checks; returns the fee charged
 */
function enforceTradeRisk(
  ctx: EngineContext,
  tx: Transaction,
  qa: QuoteAccount,
  input: RiskInput,
): Result<X18, ClearingError> {
  const { marketId, config, riskParams, fill, kind, openedSizeX18, fundingIndexX18 } = input;
  const { account } = qa;
  const risky = addsRisk(kind);

  // Fee
  const feeX18 = applyBpsUp(notional(fill.baseDeltaX18, fill.avgPriceX18), config.feeBps);
  if (risky && feeX18 > availableFreeCollateral(ctx, tx, qa)) {
    return err(clearingError("INSUFFICIENT_COLLATERAL", `free collateral does not cover the ${feeX18.toString()} fee`));
  }
  const fee = chargeAccount(ctx, tx, qa, marketId, feeX18, "free-first", config.feeRecipient);
  if (fee.isErr()) return err(fee.error);
  tx.notifyTradeFee(config.feeDistributor, fee.value.collectedUnits);

  let position = loadPosition(tx, account, marketId, fundingIndexX18);
  position = { ...position, realizedPnlX18: position.realizedPnlX18 - fee.value.collectedX18 };
  savePosition(tx, account, marketId, position);

  // Reserve initial margin for the opened part
  if (openedSizeX18 > 0n) {
    const reserve = requiredMargin(openedSizeX18, fill.avgPriceX18, riskParams.imrBps);
    if (reserve > availableFreeCollateral(ctx, tx, qa)) {
      return err(
        clearingError("INSUFFICIENT_COLLATERAL", `free collateral does not cover ${reserve.toString()} initial margin`),
      );
    }
    position = { ...position, margin: position.margin + reserve };
    savePosition(tx, account, marketId, position);
  }

  if (position.size === 0n) return ok(fee.value.collectedX18);

  // Initial margin on the whole position, priced at max(mark, risk price)
  const imrPrice = ctx.pricing.initialMarginPrice(tx, marketId);
  if (imrPrice.isErr()) return err(imrPrice.error);
  const risk = ctx.pricing.riskPrice(tx, marketId);
  if (risk.isErr()) return err(risk.error);

  const required = requiredMargin(position.size, imrPrice.value, riskParams.imrBps);
  const effective = effectiveMargin(position, risk.value.priceX18, fundingIndexX18);
  if (effective < required) {
    const shortfall = required - effective;
    const topUp = minOf(shortfall, availableFreeCollateral(ctx, tx, qa));
    position = { ...position, margin: position.margin + topUp };
    savePosition(tx, account, marketId, position);

    if (topUp < shortfall && risky) {
      return err(
        clearingError(
          "INSUFFICIENT_MARGIN",
          `position needs ${required.toString()} initial margin, ${(effective + topUp).toString()} available`,
        ),
      );
    }
  }

  if (risky && isBelowMaintenance(position, risk.value.priceX18, fundingIndexX18, riskParams.mmrBps)) {
    return err(clearingError("WOULD_BE_LIQUIDATABLE", `trade would leave ${account} liquidatable in ${marketId}`));
  }

  return ok(fee.value.collectedX18);
}
