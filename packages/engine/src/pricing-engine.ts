/**
 * Pricing Engine
 *
 * Stateful facade over the pure vAMM, TWAP and funding functions. Reads and
 * writes each market's pricing state through the caller's transaction and
 * never calls back into the margin side.
 */

import { err, ok, type Result } from "neverthrow";

import type { MarketConfig, MarketDirectoryPort } from "@perp-clearing/adapters";
import {
  buy,
  consultTwap,
  getMarkPrice,
  initializeVamm,
  maxOf,
  pokeFunding as derivePokeFunding,
  resetReserves as resetVammReserves,
  resolvePrice,
  sell,
  setFeeBps as setVammFeeBps,
  setFundingParams as setVammFundingParams,
  setSwapsPaused,
  type Bps,
  type CoreError,
  type Direction,
  type FundingParams,
  type FundingUpdate,
  type MarketId,
  type ResolvedPrice,
  type SwapFill,
  type VammConfig,
  type VammState,
  type X18,
} from "@perp-clearing/core";
import type { Logger } from "@perp-clearing/utils";

import { clearingError, fromCoreError, type ClearingError } from "./errors";
import type { MarketState } from "./state/clearing-store";
import type { Transaction } from "./transaction";

export interface PricedMarket {
  config: MarketConfig;
  state: MarketState;
}

export class PricingEngine {
  constructor(
    private readonly directory: MarketDirectoryPort,
    private readonly log: Logger,
  ) {}

  /**
   * Directory config plus engine state for a market
   */
  market(tx: Transaction, marketId: MarketId): Result<PricedMarket, ClearingError> {
    const config = this.directory.getMarket(marketId);
    if (!config) return err(clearingError("UNKNOWN_MARKET", `market ${marketId} is not listed`));
    const state = tx.markets.get(marketId);
    if (!state) return err(clearingError("MARKET_NOT_INITIALIZED", `market ${marketId} has no pricing state`));
    return ok({ config, state });
  }

  initialize(tx: Transaction, marketId: MarketId, config: VammConfig): Result<VammState, ClearingError> {
    if (!this.directory.getMarket(marketId)) {
      return err(clearingError("UNKNOWN_MARKET", `market ${marketId} is not listed`));
    }
    if (tx.markets.get(marketId)) {
      return err(clearingError("MARKET_ALREADY_INITIALIZED", `market ${marketId} is already initialized`));
    }
    return initializeVamm(config, tx.nowSec)
      .mapErr(fromCoreError)
      .map(vamm => {
        tx.markets.set(marketId, { marketId, vamm, riskParams: null, badDebtX18: 0n });
        tx.emit({
          type: "MARKET_INITIALIZED",
          ts: tx.nowSec,
          marketId,
          priceX18: config.priceX18,
          baseReserveX18: config.baseReserveX18,
        });
        return vamm;
      });
  }

  /**
   * Trade `sizeX18` base: long buys from the pool, short sells into it.
   *
   * @param priceLimitX18 - worst acceptable average price (0 = none)
   */
  swap(
    tx: Transaction,
    marketId: MarketId,
    direction: Direction,
    sizeX18: X18,
    priceLimitX18: X18,
  ): Result<SwapFill, ClearingError> {
    return this.vamm(tx, marketId).andThen(state => {
      const outcome =
        direction === "long" ?
          buy(state, sizeX18, priceLimitX18, tx.nowSec)
        : sell(state, sizeX18, priceLimitX18, tx.nowSec);
      return outcome.mapErr(fromCoreError).map(({ state: next, fill }) => {
        this.write(tx, marketId, next);
        return fill;
      });
    });
  }

  markPrice(tx: Transaction, marketId: MarketId): Result<X18, ClearingError> {
    return this.vamm(tx, marketId).andThen(state => getMarkPrice(state).mapErr(fromCoreError));
  }

  twap(tx: Transaction, marketId: MarketId, windowSec: number): Result<X18, ClearingError> {
    return this.vamm(tx, marketId).andThen(state =>
      consultTwap(state.twap, windowSec, tx.nowSec).mapErr(fromCoreError),
    );
  }

  /**
   * Advance the market's funding index to `tx.nowSec`; at most once per second.
   */
  pokeFunding(tx: Transaction, marketId: MarketId): Result<FundingUpdate, ClearingError> {
    return this.market(tx, marketId).map(({ config, state }) => {
      const outcome = derivePokeFunding(state.vamm, tx.nowSec, config.oracle.getPrice(), e => `${e.type}: ${e.message}`);
      const { update } = outcome;
      if (update.type === "NOOP") return update;

      this.write(tx, marketId, outcome.state);

      if (update.type === "DEFERRED") {
        this.log.warn("funding deferred", { marketId, reason: update.reason });
        tx.emit({ type: "FUNDING_DEFERRED", ts: tx.nowSec, marketId, reason: update.reason });
      } else {
        tx.emit({
          type: "FUNDING_RATE_UPDATED",
          ts: tx.nowSec,
          marketId,
          rateX18: update.rateX18,
          premiumX18: update.premiumX18,
          cumulativeFundingX18: outcome.state.funding.cumulativeFundingPerUnitX18,
          clamped: update.clamped,
        });
      }
      return update;
    });
  }

  cumulativeFunding(tx: Transaction, marketId: MarketId): Result<X18, ClearingError> {
    return this.vamm(tx, marketId).map(state => state.funding.cumulativeFundingPerUnitX18);
  }

  /**
   * Price used for risk: oracle, then funding-window TWAP, then mark
   */
  riskPrice(tx: Transaction, marketId: MarketId): Result<ResolvedPrice, ClearingError> {
    return this.market(tx, marketId).andThen(({ config, state }) => {
      const { vamm } = state;
      const resolved = resolvePrice([
        { source: "oracle", read: () => config.oracle.getPrice().mapErr(e => `${e.type}: ${e.message}`) },
        {
          source: "twap",
          read: () => consultTwap(vamm.twap, vamm.funding.twapWindowSec, tx.nowSec).mapErr(e => e.message),
        },
        { source: "mark", read: () => getMarkPrice(vamm).mapErr(e => e.message) },
      ]);

      if (resolved.isOk() && resolved.value.skipped.length > 0) {
        this.log.warn("risk price fell back", {
          marketId,
          source: resolved.value.source,
          skipped: resolved.value.skipped,
        });
      }
      return resolved.mapErr(fromCoreError);
    });
  }

  /**
   * max(mark, risk price): the initial-margin check uses whichever is higher
   */
  initialMarginPrice(tx: Transaction, marketId: MarketId): Result<X18, ClearingError> {
    return this.markPrice(tx, marketId).andThen(mark =>
      this.riskPrice(tx, marketId).map(risk => maxOf(mark, risk.priceX18)),
    );
  }

  resetReserves(
    tx: Transaction,
    marketId: MarketId,
    priceX18: X18,
    baseReserveX18: X18,
  ): Result<VammState, ClearingError> {
    return this.update(tx, marketId, state => resetVammReserves(state, priceX18, baseReserveX18, tx.nowSec)).map(
      next => {
        tx.emit({ type: "RESERVES_RESET", ts: tx.nowSec, marketId, priceX18, baseReserveX18 });
        return next;
      },
    );
  }

  setPaused(tx: Transaction, marketId: MarketId, paused: boolean): Result<VammState, ClearingError> {
    return this.vamm(tx, marketId).andThen(before =>
      this.update(tx, marketId, state => setSwapsPaused(state, paused, tx.nowSec)).map(next => {
        if (before.paused !== paused) {
          tx.emit({ type: "SWAPS_PAUSE_CHANGED", ts: tx.nowSec, marketId, paused });
        }
        return next;
      }),
    );
  }

  setFeeBps(tx: Transaction, marketId: MarketId, feeBps: Bps): Result<VammState, ClearingError> {
    return this.update(tx, marketId, state => setVammFeeBps(state, feeBps)).map(next => {
      tx.emit({ type: "FEE_UPDATED", ts: tx.nowSec, marketId, feeBps });
      return next;
    });
  }

  setFundingParams(tx: Transaction, marketId: MarketId, params: FundingParams): Result<VammState, ClearingError> {
    return this.update(tx, marketId, state => setVammFundingParams(state, params)).map(next => {
      tx.emit({ type: "FUNDING_PARAMS_UPDATED", ts: tx.nowSec, marketId, ...params });
      return next;
    });
  }

  private vamm(tx: Transaction, marketId: MarketId): Result<VammState, ClearingError> {
    const state = tx.markets.get(marketId);
    if (!state) return err(clearingError("MARKET_NOT_INITIALIZED", `market ${marketId} has no pricing state`));
    return ok(state.vamm);
  }

  private update(
    tx: Transaction,
    marketId: MarketId,
    change: (state: VammState) => Result<VammState, CoreError>,
  ): Result<VammState, ClearingError> {
    return this.vamm(tx, marketId).andThen(state =>
      change(state)
        .mapErr(fromCoreError)
        .map(next => {
          this.write(tx, marketId, next);
          return next;
        }),
    );
  }

  private write(tx: Transaction, marketId: MarketId, vamm: VammState): void {
    const current = tx.markets.get(marketId);
    if (current) tx.markets.set(marketId, { ...current, vamm });
  }
}
