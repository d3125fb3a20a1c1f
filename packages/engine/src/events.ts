/**
 * Clearing events
 *
 * Emitted inside a transaction and published only after it commits.
 * Amounts are 1e18 unless suffixed `Units` (native token units).
 */

import type {
  AccountId,
  Bps,
  MarketId,
  MarketRiskParams,
  TokenId,
  TradeKind,
  UnixSec,
  X18,
} from "@perp-clearing/core";

export type BadDebtReason = "realized_loss" | "funding" | "liquidation_penalty";

export type ClearingEvent =
  | { type: "MARKET_INITIALIZED"; ts: UnixSec; marketId: MarketId; priceX18: X18; baseReserveX18: X18 }
  | { type: "RISK_PARAMS_SET"; ts: UnixSec; marketId: MarketId; params: MarketRiskParams }
  | { type: "RESERVES_RESET"; ts: UnixSec; marketId: MarketId; priceX18: X18; baseReserveX18: X18 }
  | { type: "SWAPS_PAUSE_CHANGED"; ts: UnixSec; marketId: MarketId; paused: boolean }
  | { type: "FEE_UPDATED"; ts: UnixSec; marketId: MarketId; feeBps: Bps }
  | {
      type: "FUNDING_PARAMS_UPDATED";
      ts: UnixSec;
      marketId: MarketId;
      frMaxBpsPerHour: number;
      kFundingX18: X18;
      twapWindowSec: number;
    }
  | {
      type: "FUNDING_RATE_UPDATED";
      ts: UnixSec;
      marketId: MarketId;
      rateX18: X18;
      premiumX18: X18;
      cumulativeFundingX18: X18;
      clamped: boolean;
    }
  | { type: "FUNDING_DEFERRED"; ts: UnixSec; marketId: MarketId; reason: string }
  | { type: "FUNDING_SETTLED"; ts: UnixSec; account: AccountId; marketId: MarketId; paymentX18: X18 }
  | {
      type: "POSITION_CHANGED";
      ts: UnixSec;
      account: AccountId;
      marketId: MarketId;
      kind: TradeKind;
      baseDeltaX18: X18;
      quoteDeltaX18: X18;
      avgPriceX18: X18;
      feeX18: X18;
      realizedPnlX18: X18;
      sizeX18: X18;
      marginX18: X18;
      entryPriceX18: X18;
    }
  | {
      type: "LIQUIDATED";
      ts: UnixSec;
      liquidator: AccountId;
      account: AccountId;
      marketId: MarketId;
      sizeX18: X18;
      priceX18: X18;
      penaltyX18: X18;
      liquidatorPaidX18: X18;
      protocolPaidX18: X18;
    }
  | {
      type: "BAD_DEBT_RECORDED";
      ts: UnixSec;
      account: AccountId;
      marketId: MarketId;
      amountX18: X18;
      reason: BadDebtReason;
    }
  | { type: "MARGIN_ADDED"; ts: UnixSec; account: AccountId; marketId: MarketId; amountX18: X18 }
  | { type: "MARGIN_REMOVED"; ts: UnixSec; account: AccountId; marketId: MarketId; amountX18: X18 }
  | { type: "COLLATERAL_DEPOSITED"; ts: UnixSec; account: AccountId; token: TokenId; amountUnits: bigint }
  | { type: "COLLATERAL_WITHDRAWN"; ts: UnixSec; account: AccountId; token: TokenId; amountUnits: bigint };

export type ClearingEventType = ClearingEvent["type"];

/**
 * Receives each committed operation's events, in order
 */
export interface EventSink {
  publish(events: readonly ClearingEvent[]): void;
}
