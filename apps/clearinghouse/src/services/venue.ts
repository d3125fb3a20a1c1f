/**
 * Venue bootstrap
 *
 * Builds the in-memory collaborators, the clearing engine and its actor from
 * a validated MarketsConfig, then initializes every market.
 */

import {
  ManualClock,
  MemoryCollateralLedger,
  MemoryFeeDistributor,
  MemoryInsuranceFund,
  MemoryMarketDirectory,
  StaticPriceSource,
  type TokenConfig,
} from "@perp-clearing/adapters";
import { parseDecimal, type MarketId, type MarketRiskParams, type VammConfig } from "@perp-clearing/core";
import { AccessControl, ClearingEngine, type ClearingError, type EventSink } from "@perp-clearing/engine";
import type { Logger } from "@perp-clearing/utils";
import { err, ok, type Result } from "neverthrow";

import type { MarketDefinition, MarketsConfig, TokenDefinition } from "../types/schemas";
import { ClearingHouse } from "./clearing-house";
import type { ConfigError } from "./markets-config";

export interface Venue {
  engine: ClearingEngine;
  house: ClearingHouse;
  ledger: MemoryCollateralLedger;
  directory: MemoryMarketDirectory;
  clock: ManualClock;
  oracles: ReadonlyMap<MarketId, StaticPriceSource>;
  feeDistributors: ReadonlyMap<MarketId, MemoryFeeDistributor>;
}

export interface VenueOptions {
  eventSink?: EventSink;
  maxActiveMarkets?: number;
  logger?: Logger;
}

export type VenueError = ConfigError | ClearingError;

const toTokenConfig = (t: TokenDefinition): TokenConfig => ({
  token: t.token,
  baseUnit: 10n ** BigInt(t.decimals),
  enabled: true,
  priceX18: t.price,
  haircutBps: t.haircutBps,
});

const toVammConfig = (m: MarketDefinition): VammConfig => ({
  priceX18: m.vamm.price,
  baseReserveX18: m.vamm.baseReserve,
  feeBps: m.vamm.feeBps,
  frMaxBpsPerHour: m.vamm.frMaxBpsPerHour,
  kFundingX18: m.vamm.kFunding,
  observationCardinality: m.vamm.observationCardinality,
  minReserveBaseX18: m.vamm.minReserveBase,
  minReserveQuoteX18: m.vamm.minReserveQuote,
  fundingTwapWindowSec: m.vamm.fundingTwapWindowSec,
});

const toRiskParams = (m: MarketDefinition): MarketRiskParams => ({ ...m.risk });

export function buildVenue(config: MarketsConfig, options: VenueOptions = {}): Result<Venue, VenueError> {
  const ledger = new MemoryCollateralLedger(config.tokens.map(toTokenConfig));
  const clock = new ManualClock(config.genesisTs);
  const directory = new MemoryMarketDirectory();
  const oracles = new Map<MarketId, StaticPriceSource>();
  const feeDistributors = new Map<MarketId, MemoryFeeDistributor>();

  for (const m of config.markets) {
    const oracle = new StaticPriceSource(m.indexPrice);
    const feeDistributor = new MemoryFeeDistributor();
    oracles.set(m.marketId, oracle);
    feeDistributors.set(m.marketId, feeDistributor);
    directory.register({
      marketId: m.marketId,
      baseToken: m.baseToken,
      quoteToken: m.quoteToken,
      baseUnit: 10n ** BigInt(m.baseDecimals),
      feeBps: m.clearingFeeBps,
      paused: m.paused,
      oracle,
      insuranceFund: new MemoryInsuranceFund(ledger, config.insuranceAccount, m.quoteToken),
      feeDistributor,
      feeRecipient: config.feeRecipient,
    });
  }

  for (const seed of config.seedBalances) {
    const token = config.tokens.find(t => t.token === seed.token);
    if (!token) {
      return err({ type: "CONFIG_INVALID", message: `seed balance for unknown token ${seed.token}` });
    }
    const units = parseDecimal(seed.amount, token.decimals);
    if (units.isErr()) return err({ type: "CONFIG_INVALID", message: units.error.message });
    const deposited = ledger.deposit(seed.account, seed.token, units.value);
    if (deposited.isErr()) return err({ type: "CONFIG_INVALID", message: deposited.error.message });
  }

  const engine = new ClearingEngine({
    ledger,
    directory,
    clock,
    accessControl: new AccessControl({
      RISK_ADMIN: [config.admin],
      MARKET_ADMIN: [config.admin],
      PAUSER: [config.admin],
    }),
    eventSink: options.eventSink,
    logger: options.logger,
    maxActiveMarkets: options.maxActiveMarkets,
  });

  for (const m of config.markets) {
    const initialized = engine
      .initializeMarket(config.admin, m.marketId, toVammConfig(m))
      .andThen(() => engine.setRiskParams(config.admin, m.marketId, toRiskParams(m)));
    if (initialized.isErr()) return err(initialized.error);
  }

  return ok({
    engine,
    house: new ClearingHouse(engine, options.logger?.child({ component: "clearing-house" })),
    ledger,
    directory,
    clock,
    oracles,
    feeDistributors,
  });
}
