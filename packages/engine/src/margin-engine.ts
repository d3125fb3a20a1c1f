/**
 * Clearing Engine
 *
 * Public operations of the margin and liquidation engine. Each mutation runs
 * in its own transaction: on error nothing it touched survives, on success
 * state and collaborator effects are committed and its events published.
 *
 * Not re-entrant; callers serialize access (see the clearinghouse actor).
 */

import { err, ok, type Result } from "neverthrow";

import type { ClockPort, CollateralLedgerPort, MarketDirectoryPort } from "@perp-clearing/adapters";
import {
  abs,
  marginRatio,
  notional,
  pendingFunding,
  unrealizedPnl,
  validateRiskParams,
  isBelowMaintenance,
  type AccountId,
  type Bps,
  type Direction,
  type FundingParams,
  type FundingUpdate,
  type MarketId,
  type MarketRiskParams,
  type Position,
  type TokenId,
  type VammConfig,
  type X18,
} from "@perp-clearing/core";
import { logger, type Logger } from "@perp-clearing/utils";

import type { AccessControl, Role } from "./access-control";
import {
  activeMarketsOf,
  availableFreeCollateral,
  freeCollateral,
  loadPosition,
  quoteAccount,
  quoteCollateral,
  requirePosition,
  reservedMargin,
  savePosition,
} from "./accounts";
import type { EngineContext } from "./context";
import { clearingError, fromCoreError, fromLedgerError, type ClearingError } from "./errors";
import type { EventSink } from "./events";
import { settleAccountFunding, settleMarketFunding } from "./funding-settlement";
import { checkLiquidatable, liquidatePosition, type LiquidationResult } from "./liquidation";
import { PricingEngine, type PricedMarket } from "./pricing-engine";
import { ClearingStore } from "./state/clearing-store";
import { applyTrade, type TradeResult } from "./trade";
import { Transaction } from "./transaction";

export const DEFAULT_MAX_ACTIVE_MARKETS = 16;

export interface ClearingEngineDeps {
  ledger: CollateralLedgerPort;
  directory: MarketDirectoryPort;
  clock: ClockPort;
  accessControl: AccessControl;
  eventSink?: EventSink;
  logger?: Logger;
  maxActiveMarkets?: number;
}

export interface Reserves {
  reserveBaseX18: X18;
  reserveQuoteX18: X18;
}

export class ClearingEngine {
  private readonly store = new ClearingStore();
  private readonly ctx: EngineContext;
  private readonly log: Logger;

  constructor(private readonly deps: ClearingEngineDeps) {
    this.log = deps.logger ?? logger.child({ component: "clearing-engine" });
    this.ctx = {
      directory: deps.directory,
      pricing: new PricingEngine(deps.directory, this.log),
      log: this.log,
      maxActiveMarkets: deps.maxActiveMarkets ?? DEFAULT_MAX_ACTIVE_MARKETS,
    };
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Admin
  // ───────────────────────────────────────────────────────────────────────────

  initializeMarket(caller: AccountId, marketId: MarketId, config: VammConfig): Result<void, ClearingError> {
    return this.admin("MARKET_ADMIN", caller, "initializeMarket", tx =>
      this.ctx.pricing.initialize(tx, marketId, config).map(() => {
        this.log.info("market initialized", { marketId, priceX18: config.priceX18 });
      }),
    );
  }

  setRiskParams(caller: AccountId, marketId: MarketId, params: MarketRiskParams): Result<void, ClearingError> {
    return this.admin("RISK_ADMIN", caller, "setRiskParams", tx => {
      const market = this.ctx.pricing.market(tx, marketId);
      if (market.isErr()) return err(market.error);
      const valid = validateRiskParams(params);
      if (valid.isErr()) return err(fromCoreError(valid.error));

      tx.markets.set(marketId, { ...market.value.state, riskParams: { ...params } });
      tx.emit({ type: "RISK_PARAMS_SET", ts: tx.nowSec, marketId, params: { ...params } });
      this.log.info("risk params set", { marketId, ...params });
      return ok(undefined);
    });
  }

  resetReserves(
    caller: AccountId,
    marketId: MarketId,
    priceX18: X18,
    baseReserveX18: X18,
  ): Result<void, ClearingError> {
    return this.admin("MARKET_ADMIN", caller, "resetReserves", tx =>
      this.ctx.pricing.resetReserves(tx, marketId, priceX18, baseReserveX18).map(() => {
        this.log.info("reserves reset", { marketId, priceX18, baseReserveX18 });
      }),
    );
  }

  pauseSwaps(caller: AccountId, marketId: MarketId): Result<void, ClearingError> {
    return this.admin("PAUSER", caller, "pauseSwaps", tx =>
      this.ctx.pricing.setPaused(tx, marketId, true).map(() => {
        this.log.info("swaps paused", { marketId });
      }),
    );
  }

  unpauseSwaps(caller: AccountId, marketId: MarketId): Result<void, ClearingError> {
    return this.admin("PAUSER", caller, "unpauseSwaps", tx =>
      this.ctx.pricing.setPaused(tx, marketId, false).map(() => {
        this.log.info("swaps unpaused", { marketId });
      }),
    );
  }

  setFeeBps(caller: AccountId, marketId: MarketId, feeBps: Bps): Result<void, ClearingError> {
    return this.admin("MARKET_ADMIN", caller, "setFeeBps", tx =>
      this.ctx.pricing.setFeeBps(tx, marketId, feeBps).map(() => {
        this.log.info("vAMM fee updated", { marketId, feeBps });
      }),
    );
  }

  setFundingParams(caller: AccountId, marketId: MarketId, params: FundingParams): Result<void, ClearingError> {
    return this.admin("MARKET_ADMIN", caller, "setFundingParams", tx =>
      this.ctx.pricing.setFundingParams(tx, marketId, params).map(() => {
        this.log.info("funding params updated", { marketId, ...params });
      }),
    );
  }

  /**
   * Advance a market's funding index; callable by anyone
   */
  pokeFunding(marketId: MarketId): Result<FundingUpdate, ClearingError> {
    return this.transact("pokeFunding", tx => this.ctx.pricing.pokeFunding(tx, marketId));
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Collateral
  // ───────────────────────────────────────────────────────────────────────────

  deposit(account: AccountId, token: TokenId, amountUnits: bigint): Result<void, ClearingError> {
    return this.transact("deposit", tx => {
      if (amountUnits <= 0n) return err(clearingError("ZERO_AMOUNT", "deposit amount must be positive"));
      const deposited = tx.ledger.deposit(account, token, amountUnits);
      if (deposited.isErr()) return err(fromLedgerError(deposited.error));
      tx.emit({ type: "COLLATERAL_DEPOSITED", ts: tx.nowSec, account, token, amountUnits });
      return ok(undefined);
    });
  }

  /**
   * Withdraw, provided the remaining collateral still backs every reserved
   * margin and no active position becomes liquidatable
   */
  withdraw(account: AccountId, token: TokenId, amountUnits: bigint): Result<void, ClearingError> {
    return this.transact("withdraw", tx => {
      if (amountUnits <= 0n) return err(clearingError("ZERO_AMOUNT", "withdraw amount must be positive"));

      const settled = settleAccountFunding(this.ctx, tx, account);
      if (settled.isErr()) return err(settled.error);

      const withdrawn = tx.ledger.withdraw(account, token, amountUnits);
      if (withdrawn.isErr()) return err(fromLedgerError(withdrawn.error));

      const qa = quoteAccount(tx, account, token);
      if (qa.isErr()) return err(qa.error);
      if (quoteCollateral(tx, qa.value) < reservedMargin(this.ctx, tx, account, token)) {
        return err(clearingError("WITHDRAW_BREACHES_MARGIN", "withdrawal would leave reserved margin unbacked"));
      }

      // Free collateral does not count toward maintenance, so this only stops
      // accounts that were already liquidatable before the withdrawal
      for (const marketId of activeMarketsOf(tx, account)) {
        const liquidatable = checkLiquidatable(this.ctx, tx, account, marketId);
        if (liquidatable.isErr()) return err(liquidatable.error);
        if (liquidatable.value) {
          return err(clearingError("WITHDRAW_BREACHES_MARGIN", `${account} is liquidatable in ${marketId}`));
        }
      }

      tx.emit({ type: "COLLATERAL_WITHDRAWN", ts: tx.nowSec, account, token, amountUnits });
      return ok(undefined);
    });
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Trading
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * @param priceLimitX18 - worst acceptable average price (0 = none)
   */
  openPosition(
    account: AccountId,
    marketId: MarketId,
    direction: Direction,
    sizeX18: X18,
    priceLimitX18: X18,
  ): Result<TradeResult, ClearingError> {
    return this.transact("openPosition", tx => {
      if (sizeX18 <= 0n) return err(clearingError("ZERO_AMOUNT", "position size must be positive"));

      const market = this.tradableMarket(tx, marketId);
      if (market.isErr()) return err(market.error);
      const { config, riskParams } = market.value;

      const settled = settleAccountFunding(this.ctx, tx, account, marketId);
      if (settled.isErr()) return err(settled.error);

      const healthy = this.requireNotLiquidatable(tx, account);
      if (healthy.isErr()) return err(healthy.error);

      if (tx.ledger.balanceOf(account, config.quoteToken) === 0n) {
        return err(clearingError("INSUFFICIENT_COLLATERAL", `${account} holds no ${config.quoteToken}`));
      }

      const active = activeMarketsOf(tx, account);
      if (!active.includes(marketId) && active.length >= this.ctx.maxActiveMarkets) {
        return err(
          clearingError(
            "TOO_MANY_ACTIVE_MARKETS",
            `${account} already holds positions in ${String(active.length)} markets`,
          ),
        );
      }

      const fill = this.ctx.pricing.swap(tx, marketId, direction, sizeX18, priceLimitX18);
      if (fill.isErr()) return err(fill.error);

      return applyTrade(this.ctx, tx, { account, marketId, config, riskParams, fill: fill.value, mode: "trade" });
    });
  }

  /**
   * Trade `sizeX18` against the current position, up to its full size
   */
  closePosition(
    account: AccountId,
    marketId: MarketId,
    sizeX18: X18,
    priceLimitX18: X18,
  ): Result<TradeResult, ClearingError> {
    return this.transact("closePosition", tx => {
      if (sizeX18 <= 0n) return err(clearingError("ZERO_AMOUNT", "close size must be positive"));

      const market = this.tradableMarket(tx, marketId);
      if (market.isErr()) return err(market.error);
      const { config, riskParams } = market.value;

      const settled = settleAccountFunding(this.ctx, tx, account, marketId);
      if (settled.isErr()) return err(settled.error);

      const healthy = this.requireNotLiquidatable(tx, account);
      if (healthy.isErr()) return err(healthy.error);

      const cumulative = this.ctx.pricing.cumulativeFunding(tx, marketId);
      if (cumulative.isErr()) return err(cumulative.error);
      const position = requirePosition(loadPosition(tx, account, marketId, cumulative.value), account, marketId);
      if (position.isErr()) return err(position.error);

      const held = abs(position.value.size);
      if (sizeX18 > held) {
        return err(clearingError("SIZE_EXCEEDS_POSITION", `cannot close ${sizeX18.toString()} of ${held.toString()}`));
      }

      const direction: Direction = position.value.size > 0n ? "short" : "long";
      const fill = this.ctx.pricing.swap(tx, marketId, direction, sizeX18, priceLimitX18);
      if (fill.isErr()) return err(fill.error);

      return applyTrade(this.ctx, tx, { account, marketId, config, riskParams, fill: fill.value, mode: "trade" });
    });
  }

  liquidate(
    liquidator: AccountId,
    account: AccountId,
    marketId: MarketId,
    sizeX18: X18,
  ): Result<LiquidationResult, ClearingError> {
    return this.transact("liquidate", tx => liquidatePosition(this.ctx, tx, liquidator, account, marketId, sizeX18));
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Margin
  // ───────────────────────────────────────────────────────────────────────────

  addMargin(account: AccountId, marketId: MarketId, amountX18: X18): Result<Position, ClearingError> {
    return this.transact("addMargin", tx => {
      if (amountX18 <= 0n) return err(clearingError("ZERO_AMOUNT", "margin amount must be positive"));

      const market = this.ctx.pricing.market(tx, marketId);
      if (market.isErr()) return err(market.error);

      const settled = settleMarketFunding(this.ctx, tx, account, marketId);
      if (settled.isErr()) return err(settled.error);

      const cumulative = tx.markets.get(marketId)?.vamm.funding.cumulativeFundingPerUnitX18 ?? 0n;
      const position = requirePosition(loadPosition(tx, account, marketId, cumulative), account, marketId);
      if (position.isErr()) return err(position.error);

      const qa = quoteAccount(tx, account, market.value.config.quoteToken);
      if (qa.isErr()) return err(qa.error);
      if (availableFreeCollateral(this.ctx, tx, qa.value) < amountX18) {
        return err(clearingError("INSUFFICIENT_COLLATERAL", `free collateral does not cover ${amountX18.toString()}`));
      }

      const next = { ...position.value, margin: position.value.margin + amountX18 };
      savePosition(tx, account, marketId, next);
      tx.emit({ type: "MARGIN_ADDED", ts: tx.nowSec, account, marketId, amountX18 });
      return ok(next);
    });
  }

  removeMargin(account: AccountId, marketId: MarketId, amountX18: X18): Result<Position, ClearingError> {
    return this.transact("removeMargin", tx => {
      if (amountX18 <= 0n) return err(clearingError("ZERO_AMOUNT", "margin amount must be positive"));

      const market = this.ctx.pricing.market(tx, marketId);
      if (market.isErr()) return err(market.error);
      const riskParams = market.value.state.riskParams;
      if (!riskParams) {
        return err(clearingError("RISK_PARAMS_NOT_SET", `market ${marketId} has no risk parameters`));
      }

      const settled = settleMarketFunding(this.ctx, tx, account, marketId);
      if (settled.isErr()) return err(settled.error);

      const cumulative = tx.markets.get(marketId)?.vamm.funding.cumulativeFundingPerUnitX18 ?? 0n;
      const position = requirePosition(loadPosition(tx, account, marketId, cumulative), account, marketId);
      if (position.isErr()) return err(position.error);
      if (amountX18 > position.value.margin) {
        return err(
          clearingError("INSUFFICIENT_MARGIN", `cannot remove ${amountX18.toString()} of ${position.value.margin.toString()}`),
        );
      }

      const next = { ...position.value, margin: position.value.margin - amountX18 };
      const price = this.ctx.pricing.riskPrice(tx, marketId);
      if (price.isErr()) return err(price.error);
      if (isBelowMaintenance(next, price.value.priceX18, cumulative, riskParams.mmrBps)) {
        return err(clearingError("MARGIN_BELOW_MAINTENANCE", "removal would put the position below maintenance"));
      }

      savePosition(tx, account, marketId, next);
      tx.emit({ type: "MARGIN_REMOVED", ts: tx.nowSec, account, marketId, amountX18 });
      return ok(next);
    });
  }

  /**
   * Settle pending funding for one market, or every active market when
   * `marketId` is omitted. Returns the net payment (positive = received).
   */
  settleFunding(account: AccountId, marketId?: MarketId): Result<X18, ClearingError> {
    return this.transact("settleFunding", tx => {
      const markets = marketId === undefined ? [...activeMarketsOf(tx, account)] : [marketId];
      let net = 0n;
      for (const id of markets) {
        const settled = settleMarketFunding(this.ctx, tx, account, id);
        if (settled.isErr()) return err(settled.error);
        net += settled.value;
      }
      return ok(net);
    });
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────────

  getPosition(account: AccountId, marketId: MarketId): Position {
    const tx = this.view();
    const cumulative = tx.markets.get(marketId)?.vamm.funding.cumulativeFundingPerUnitX18 ?? 0n;
    return loadPosition(tx, account, marketId, cumulative);
  }

  getActiveMarkets(account: AccountId): readonly MarketId[] {
    return activeMarketsOf(this.view(), account);
  }

  /**
   * |size| × risk price
   */
  getNotional(account: AccountId, marketId: MarketId): Result<X18, ClearingError> {
    const tx = this.view();
    return this.ctx.pricing
      .riskPrice(tx, marketId)
      .map(price => notional(this.getPosition(account, marketId).size, price.priceX18));
  }

  getMarginRatio(account: AccountId, marketId: MarketId): Result<X18 | null, ClearingError> {
    const tx = this.view();
    return this.ctx.pricing.riskPrice(tx, marketId).andThen(price =>
      this.ctx.pricing
        .cumulativeFunding(tx, marketId)
        .map(cumulative => marginRatio(this.getPosition(account, marketId), price.priceX18, cumulative)),
    );
  }

  isLiquidatable(account: AccountId, marketId: MarketId): Result<boolean, ClearingError> {
    return checkLiquidatable(this.ctx, this.view(), account, marketId);
  }

  /**
   * Collateral value plus unrealized PnL and pending funding over active markets
   */
  getAccountValue(account: AccountId): Result<X18, ClearingError> {
    const tx = this.view();
    const collateral = tx.ledger.accountCollateralValue(account);
    if (collateral.isErr()) return err(fromLedgerError(collateral.error));

    let total = collateral.value;
    for (const marketId of activeMarketsOf(tx, account)) {
      const price = this.ctx.pricing.riskPrice(tx, marketId);
      if (price.isErr()) return err(price.error);
      const cumulative = this.ctx.pricing.cumulativeFunding(tx, marketId);
      if (cumulative.isErr()) return err(cumulative.error);

      const position = loadPosition(tx, account, marketId, cumulative.value);
      total += unrealizedPnl(position, price.value.priceX18) + pendingFunding(position, cumulative.value);
    }
    return ok(total);
  }

  /**
   * Collateral in `token` not reserved as margin (1e18, may be negative)
   */
  getFreeCollateral(account: AccountId, token: TokenId): Result<X18, ClearingError> {
    const tx = this.view();
    return quoteAccount(tx, account, token).map(qa => freeCollateral(this.ctx, tx, qa));
  }

  getBadDebt(marketId: MarketId): X18 {
    return this.store.markets.get(marketId)?.badDebtX18 ?? 0n;
  }

  getRiskParams(marketId: MarketId): MarketRiskParams | null {
    return this.store.markets.get(marketId)?.riskParams ?? null;
  }

  getMarkPrice(marketId: MarketId): Result<X18, ClearingError> {
    return this.ctx.pricing.markPrice(this.view(), marketId);
  }

  getTwap(marketId: MarketId, windowSec: number): Result<X18, ClearingError> {
    return this.ctx.pricing.twap(this.view(), marketId, windowSec);
  }

  getReserves(marketId: MarketId): Result<Reserves, ClearingError> {
    return this.ctx.pricing.market(this.view(), marketId).map(({ state }) => ({
      reserveBaseX18: state.vamm.reserveBaseX18,
      reserveQuoteX18: state.vamm.reserveQuoteX18,
    }));
  }

  getCumulativeFunding(marketId: MarketId): Result<X18, ClearingError> {
    return this.ctx.pricing.cumulativeFunding(this.view(), marketId);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────────

  private tradableMarket(
    tx: Transaction,
    marketId: MarketId,
  ): Result<PricedMarket & { riskParams: MarketRiskParams }, ClearingError> {
    return this.ctx.pricing.market(tx, marketId).andThen(market => {
      if (!this.deps.directory.isActive(marketId)) {
        return err(clearingError("MARKET_INACTIVE", `market ${marketId} is not active`));
      }
      const { riskParams } = market.state;
      if (!riskParams) {
        return err(clearingError("RISK_PARAMS_NOT_SET", `market ${marketId} has no risk parameters`));
      }
      return ok({ ...market, riskParams });
    });
  }

  private requireNotLiquidatable(tx: Transaction, account: AccountId): Result<void, ClearingError> {
    for (const marketId of activeMarketsOf(tx, account)) {
      const liquidatable = checkLiquidatable(this.ctx, tx, account, marketId);
      if (liquidatable.isErr()) return err(liquidatable.error);
      if (liquidatable.value) {
        return err(clearingError("ACCOUNT_LIQUIDATABLE", `${account} is liquidatable in ${marketId}`));
      }
    }
    return ok(undefined);
  }

  /**
   * Uncommitted transaction used as a read view
   */
  private view(): Transaction {
    return new Transaction(this.store, this.deps.ledger, this.deps.clock.nowSec());
  }

  private admin<T>(
    role: Role,
    caller: AccountId,
    operation: string,
    body: (tx: Transaction) => Result<T, ClearingError>,
  ): Result<T, ClearingError> {
    const allowed = this.deps.accessControl.require(role, caller);
    if (allowed.isErr()) {
      this.log.warn("admin operation denied", { operation, caller, role });
      return err(allowed.error);
    }
    return this.transact(operation, body);
  }

  private transact<T>(operation: string, body: (tx: Transaction) => Result<T, ClearingError>): Result<T, ClearingError> {
    const tx = new Transaction(this.store, this.deps.ledger, this.deps.clock.nowSec());

    const result = body(tx);
    if (result.isErr()) {
      this.log.debug("operation rolled back", { operation, error: result.error.type, reason: result.error.message });
      return result;
    }

    const committed = tx.commit();
    if (committed.isErr()) {
      this.log.error("commit failed", { operation, error: committed.error.type, reason: committed.error.message });
      return err(committed.error);
    }

    if (committed.value.length > 0) {
      this.deps.eventSink?.publish(committed.value);
    }
    return result;
  }
}
