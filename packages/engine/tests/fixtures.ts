/**
 * Engine wiring over in-memory adapters
 */

import {
  ManualClock,
  MemoryCollateralLedger,
  MemoryFeeDistributor,
  MemoryInsuranceFund,
  MemoryMarketDirectory,
  StaticPriceSource,
  stableToken,
  type MarketConfig,
} from "@perp-clearing/adapters";
import type { MarketRiskParams, VammConfig } from "@perp-clearing/core";

import { AccessControl } from "../src/access-control";
import type { ClearingEvent, EventSink } from "../src/events";
import { ClearingEngine } from "../src/margin-engine";

export const WAD = 10n ** 18n;
export const USDC = 1_000_000n;
export const T0 = 1_700_000_000;

export const ADMIN = "admin";

export const createVammConfig = (overrides: Partial<VammConfig> = {}): VammConfig => ({
  priceX18: 2000n * WAD,
  baseReserveX18: 1000n * WAD,
  feeBps: 0,
  frMaxBpsPerHour: 10,
  kFundingX18: WAD,
  observationCardinality: 16,
  minReserveBaseX18: 0n,
  minReserveQuoteX18: 0n,
  fundingTwapWindowSec: 0,
  ...overrides,
});

export const createRiskParams = (overrides: Partial<MarketRiskParams> = {}): MarketRiskParams => ({
  imrBps: 1000,
  mmrBps: 500,
  liquidationPenaltyBps: 250,
  penaltyCap: 20n * WAD,
  maxPositionSize: 0n,
  minPositionSize: 0n,
  liquidatorShareBps: 5000,
  ...overrides,
});

export class RecordingSink implements EventSink {
  readonly batches: (readonly ClearingEvent[])[] = [];

  publish(events: readonly ClearingEvent[]): void {
    this.batches.push(events);
  }

  get events(): ClearingEvent[] {
    return this.batches.flat();
  }

  types(): string[] {
    return this.events.map(e => e.type);
  }

  clear(): void {
    this.batches.length = 0;
  }
}

export interface HarnessOptions {
  markets?: string[];
  tradeFeeBps?: number;
  vamm?: Partial<VammConfig>;
  risk?: Partial<MarketRiskParams>;
  maxActiveMarkets?: number;
}

export interface Harness {
  engine: ClearingEngine;
  ledger: MemoryCollateralLedger;
  directory: MemoryMarketDirectory;
  clock: ManualClock;
  sink: RecordingSink;
  oracles: Map<string, StaticPriceSource>;
  oracle: StaticPriceSource;
  feeDistributor: MemoryFeeDistributor;
  insurance: MemoryInsuranceFund;
  fund: (account: string, usdc: bigint) => void;
}

/**
 * Engine with initialized, risk-configured USDC markets (ETH-USD by default)
 * at price 2000 and 1000 base of virtual liquidity
 */
export function createHarness(options: HarnessOptions = {}): Harness {
  const ledger = new MemoryCollateralLedger([stableToken("USDC", 6)]);
  const clock = new ManualClock(T0);
  const sink = new RecordingSink();
  const feeDistributor = new MemoryFeeDistributor();
  const insurance = new MemoryInsuranceFund(ledger, "insurance", "USDC");
  const directory = new MemoryMarketDirectory();
  const oracles = new Map<string, StaticPriceSource>();

  const marketIds = options.markets ?? ["ETH-USD"];
  for (const marketId of marketIds) {
    const oracle = new StaticPriceSource(2000n * WAD);
    oracles.set(marketId, oracle);
    const config: MarketConfig = {
      marketId,
      baseToken: marketId.split("-")[0] ?? marketId,
      quoteToken: "USDC",
      baseUnit: WAD,
      feeBps: options.tradeFeeBps ?? 0,
      paused: false,
      oracle,
      insuranceFund: insurance,
      feeDistributor,
      feeRecipient: "fees",
    };
    directory.register(config);
  }

  const engine = new ClearingEngine({
    ledger,
    directory,
    clock,
    accessControl: new AccessControl({ RISK_ADMIN: [ADMIN], MARKET_ADMIN: [ADMIN], PAUSER: [ADMIN] }),
    eventSink: sink,
    maxActiveMarkets: options.maxActiveMarkets,
  });

  for (const marketId of marketIds) {
    engine.initializeMarket(ADMIN, marketId, createVammConfig(options.vamm))._unsafeUnwrap();
    engine.setRiskParams(ADMIN, marketId, createRiskParams(options.risk))._unsafeUnwrap();
  }
  sink.clear();

  const oracle = oracles.get(marketIds[0] ?? "ETH-USD");
  if (!oracle) throw new Error("harness needs at least one market");

  return {
    engine,
    ledger,
    directory,
    clock,
    sink,
    oracles,
    oracle,
    feeDistributor,
    insurance,
    fund: (account, usdc) => {
      engine.deposit(account, "USDC", usdc * USDC)._unsafeUnwrap();
    },
  };
}
