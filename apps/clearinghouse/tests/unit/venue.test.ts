/**
 * Venue Bootstrap Unit Tests
 */

import { describe, expect, test } from "vitest";

import { parseMarketsConfig } from "../../src/services/markets-config";
import { buildVenue } from "../../src/services/venue";
import { WAD, createRawConfig, createRawMarket, createVenue } from "./fixtures";

describe("buildVenue", () => {
  test("markets are initialized with their risk params and seed balances applied", () => {
    const { engine, ledger, directory } = createVenue();

    expect(engine.getMarkPrice("ETH-USD")._unsafeUnwrap()).toBe(2000n * WAD);
    expect(engine.getRiskParams("ETH-USD")?.imrBps).toBe(1000);
    expect(ledger.balanceOf("insurance", "USDC")).toBe(1_000_000_000n);
    expect(directory.getMarket("ETH-USD")?.baseUnit).toBe(WAD);
    expect(directory.getMarket("ETH-USD")?.feeRecipient).toBe("fees");
  });

  test("base units follow the market's base decimals", () => {
    const { directory } = createVenue({}, createRawConfig({ markets: [createRawMarket({ baseDecimals: 8 })] }));

    expect(directory.getMarket("ETH-USD")?.baseUnit).toBe(100_000_000n);
  });

  test("the configured admin holds every admin role", () => {
    const { engine } = createVenue();

    expect(engine.pauseSwaps("admin", "ETH-USD").isOk()).toBe(true);
    expect(engine.setFeeBps("someone", "ETH-USD", 10)._unsafeUnwrapErr().type).toBe("PERMISSION_DENIED");
  });

  test("seed balances in unknown tokens are rejected", () => {
    const raw = createRawConfig({ seedBalances: [{ account: "insurance", token: "DAI", amount: "1" }] });
    const config = parseMarketsConfig(JSON.stringify(raw))._unsafeUnwrap();

    const error = buildVenue(config)._unsafeUnwrapErr();

    expect(error.type).toBe("CONFIG_INVALID");
    expect(error.message).toBe("seed balance for unknown token DAI");
  });

  test("invalid risk params stop the bootstrap", () => {
    const raw = createRawConfig({
      markets: [
        createRawMarket({
          risk: { imrBps: 400, mmrBps: 500, liquidationPenaltyBps: 250, liquidatorShareBps: 5000 },
        }),
      ],
    });
    const config = parseMarketsConfig(JSON.stringify(raw))._unsafeUnwrap();

    expect(buildVenue(config)._unsafeUnwrapErr().type).toBe("INVALID_RISK_PARAMS");
  });
});
