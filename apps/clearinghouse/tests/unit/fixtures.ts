/**
 * Venue factories shared by the clearinghouse tests
 *
 * One ETH-USD market at 2000 with 1000 base of virtual liquidity, no fees,
 * IMR 10% / MMR 5%. A long of 1 fills at 2002.002002002002002003.
 */

import { parseMarketsConfig } from "../../src/services/markets-config";
import { buildVenue, type Venue, type VenueOptions } from "../../src/services/venue";

export const WAD = 10n ** 18n;
export const T0 = 1_700_000_000;

export const createRawMarket = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  marketId: "ETH-USD",
  baseToken: "ETH",
  quoteToken: "USDC",
  clearingFeeBps: 0,
  indexPrice: "2000",
  vamm: {
    price: "2000",
    baseReserve: "1000",
    feeBps: 0,
    frMaxBpsPerHour: 10,
    kFunding: "1",
    observationCardinality: 16,
    fundingTwapWindowSec: 0,
  },
  risk: {
    imrBps: 1000,
    mmrBps: 500,
    liquidationPenaltyBps: 250,
    penaltyCap: "20",
    liquidatorShareBps: 5000,
  },
  ...overrides,
});

export const createRawConfig = (overrides: Record<string, unknown> = {}): Record<string, unknown> => ({
  admin: "admin",
  insuranceAccount: "insurance",
  feeRecipient: "fees",
  genesisTs: T0,
  tokens: [{ token: "USDC", decimals: 6 }],
  seedBalances: [{ account: "insurance", token: "USDC", amount: "1000" }],
  markets: [createRawMarket()],
  ...overrides,
});

export function createVenue(options: VenueOptions = {}, raw: Record<string, unknown> = createRawConfig()): Venue {
  const config = parseMarketsConfig(JSON.stringify(raw))._unsafeUnwrap();
  return buildVenue(config, options)._unsafeUnwrap();
}
