/**
 * Liquidation
 *
 * Eligibility is judged at the risk price (oracle first). Execution snapshots
 * that price before the closing trade, so the trade's own impact cannot move
 * the penalty. Each penalty share is paid from the position's margin, then the
 * account's free collateral, then the insurance fund; the rest is bad debt.
 */

import { err, ok, type Result } from "neverthrow";

import type { MarketConfig } from "@perp-clearing/adapters";
import {
  abs,
  fromTokenUnits,
  isBelowMaintenance,
  liquidationPenalty,
  splitPenalty,
  toTokenUnits,
  type AccountId,
  type MarketId,
  type X18,
} from "@perp-clearing/core";

import { chargeAccount, loadPosition, quoteAccount, recordBadDebt, requirePosition, type QuoteAccount } from "./accounts";
import type { EngineContext } from "./context";
import { clearingError, type ClearingError } from "./errors";
import { settleAccountFunding } from "./funding-settlement";
import { applyTrade, type TradeResult } from "./trade";
import type { Transaction } from "./transaction";

/**
 * Whether the account's position in `marketId` sits below maintenance margin.
 * Markets without risk parameters are never liquidatable.
 */
export function checkLiquidatable(
  ctx: EngineContext,
  tx: Transaction,
  account: AccountId,
  marketId: MarketId,
): Result<boolean, ClearingError> {
  const market = ctx.pricing.market(tx, marketId);
  if (market.isErr()) return err(market.error);
  const { riskParams, vamm } = market.value.state;
  if (!riskParams) return ok(false);

  const cumulative = vamm.funding.cumulativeFundingPerUnitX18;
  const position = loadPosition(tx, account, marketId, cumulative);
  if (position.size === 0n) return ok(false);

  return ctx.pricing
    .riskPrice(tx, marketId)
    .map(price => isBelowMaintenance(position, price.priceX18, cumulative, riskParams.mmrBps));
}

export interface LiquidationResult {
  trade: TradeResult;
  priceX18: X18;
  penaltyX18: X18;
  liquidatorPaidX18: X18;
  protocolPaidX18: X18;
}

export function liquidatePosition(
  ctx: EngineContext,
  tx: Transaction,
  liquidator: AccountId,
  account: AccountId,
  marketId: MarketId,
  sizeX18: X18,
): Result<LiquidationResult, ClearingError> {
  if (liquidator === account) {
    return err(clearingError("SELF_LIQUIDATION", "an account cannot liquidate itself"));
  }
  if (sizeX18 <= 0n) {
    return err(clearingError("ZERO_AMOUNT", "liquidation size must be positive"));
  }

  const market = ctx.pricing.market(tx, marketId);
  if (market.isErr()) return err(market.error);
  const { config } = market.value;
  const riskParams = market.value.state.riskParams;
  if (!riskParams) {
    return err(clearingError("RISK_PARAMS_NOT_SET", `market ${marketId} has no risk parameters`));
  }

  const settled = settleAccountFunding(ctx, tx, account, marketId);
  if (settled.isErr()) return err(settled.error);

  const cumulative = ctx.pricing.cumulativeFunding(tx, marketId);
  if (cumulative.isErr()) return err(cumulative.error);
  const position = requirePosition(loadPosition(tx, account, marketId, cumulative.value), account, marketId);
  if (position.isErr()) return err(position.error);

  const held = abs(position.value.size);
  if (sizeX18 > held) {
    return err(clearingError("SIZE_EXCEEDS_POSITION", `cannot liquidate ${sizeX18.toString()} of ${held.toString()}`));
  }

  const snapshot = ctx.pricing.riskPrice(tx, marketId);
  if (snapshot.isErr()) return err(snapshot.error);
  const priceX18 = snapshot.value.priceX18;

  if (!isBelowMaintenance(position.value, priceX18, cumulative.value, riskParams.mmrBps)) {
    return err(clearingError("NOT_LIQUIDATABLE", `${account} is above maintenance margin in ${marketId}`));
  }

  const remainder = held - sizeX18;
  if (remainder > 0n && riskParams.minPositionSize > 0n && remainder < riskParams.minPositionSize) {
    return err(clearingError("DUST_REMAINDER", `liquidation would leave ${remainder.toString()} below the minimum size`));
  }

  const direction = position.value.size > 0n ? "short" : "long";
  const fill = ctx.pricing.swap(tx, marketId, direction, sizeX18, 0n);
  if (fill.isErr()) return err(fill.error);

  const trade = applyTrade(ctx, tx, { account, marketId, config, riskParams, fill: fill.value, mode: "liquidation" });
  if (trade.isErr()) return err(trade.error);

  const qa = quoteAccount(tx, account, config.quoteToken);
  if (qa.isErr()) return err(qa.error);

  const penaltyX18 = liquidationPenalty(sizeX18, priceX18, riskParams);
  const split = splitPenalty(penaltyX18, riskParams.liquidatorShareBps);

  const toLiquidator = payPenaltyShare(ctx, tx, qa.value, marketId, config, split.liquidatorX18, liquidator);
  if (toLiquidator.isErr()) return err(toLiquidator.error);

  const toProtocol = payPenaltyShare(ctx, tx, qa.value, marketId, config, split.protocolX18, config.feeRecipient);
  if (toProtocol.isErr()) return err(toProtocol.error);
  tx.notifyLiquidationPenalty(config.feeDistributor, toProtocol.value.units);

  const result: LiquidationResult = {
    trade: trade.value,
    priceX18,
    penaltyX18,
    liquidatorPaidX18: toLiquidator.value.amountX18,
    protocolPaidX18: toProtocol.value.amountX18,
  };

  tx.emit({
    type: "LIQUIDATED",
    ts: tx.nowSec,
    liquidator,
    account,
    marketId,
    sizeX18,
    priceX18,
    penaltyX18,
    liquidatorPaidX18: result.liquidatorPaidX18,
    protocolPaidX18: result.protocolPaidX18,
  });
  ctx.log.info("position liquidated", { liquidator, account, marketId, sizeX18, priceX18, penaltyX18 });

  return ok(result);
}

interface Delivered {
  amountX18: X18;
  units: bigint;
}

function payPenaltyShare(
  ctx: EngineContext,
  tx: Transaction,
  qa: QuoteAccount,
  marketId: MarketId,
  config: MarketConfig,
  shareX18: X18,
  to: AccountId,
): Result<Delivered, ClearingError> {
  if (shareX18 <= 0n) return ok({ amountX18: 0n, units: 0n });

  return chargeAccount(ctx, tx, qa, marketId, shareX18, "margin-first", to).map(charge => {
    const wantedUnits = toTokenUnits(charge.uncoveredX18, qa.baseUnit, "down");
    const paidUnits = tx.payoutInsurance(config.insuranceFund, to, wantedUnits);
    const paidX18 = fromTokenUnits(paidUnits, qa.baseUnit);

    recordBadDebt(ctx, tx, qa.account, marketId, charge.uncoveredX18 - paidX18, "liquidation_penalty");
    return { amountX18: charge.collectedX18 + paidX18, units: charge.collectedUnits + paidUnits };
  });
}
