/**
 * Markets Config Unit Tests
 */

import { fileURLToPath } from "node:url";

import { describe, expect, test } from "vitest";

import { loadMarketsConfig, parseMarketsConfig } from "../../src/services/markets-config";
import { WAD, createRawConfig, createRawMarket } from "./fixtures";

describe("parseMarketsConfig", () => {
  test("decimal strings become 1e18 bigints and defaults are filled", () => {
    const config = parseMarketsConfig(JSON.stringify(createRawConfig()))._unsafeUnwrap();
    const market = config.markets[0];

    expect(market?.vamm.price).toBe(2000n * WAD);
    expect(market?.vamm.minReserveBase).toBe(0n);
    expect(market?.risk.penaltyCap).toBe(20n * WAD);
    expect(market?.risk.maxPositionSize).toBe(0n);
    expect(market?.baseDecimals).toBe(18);
    expect(market?.paused).toBe(false);
    expect(config.tokens[0]?.price).toBe(WAD);
    expect(config.tokens[0]?.haircutBps).toBe(0);
  });

  test("a malformed decimal is reported with its path", () => {
    const raw = createRawConfig({
      markets: [
        createRawMarket({
          vamm: {
            price: "abc",
            baseReserve: "1000",
            feeBps: 0,
            frMaxBpsPerHour: 10,
            kFunding: "1",
            observationCardinality: 16,
            fundingTwapWindowSec: 0,
          },
        }),
      ],
    });

    const error = parseMarketsConfig(JSON.stringify(raw))._unsafeUnwrapErr();

    expect(error.type).toBe("CONFIG_INVALID");
    expect(error.message).toBe('markets.0.vamm.price: not a decimal number: "abc"');
  });

  test("duplicate market ids are rejected", () => {
    const raw = createRawConfig({ markets: [createRawMarket(), createRawMarket()] });

    const error = parseMarketsConfig(JSON.stringify(raw))._unsafeUnwrapErr();

    expect(error.message).toContain("marketId must be unique");
  });

  test("invalid JSON is a config error", () => {
    const error = parseMarketsConfig("{ not json")._unsafeUnwrapErr();

    expect(error.type).toBe("CONFIG_INVALID");
    expect(error.message.startsWith("invalid JSON:")).toBe(true);
  });
});

describe("loadMarketsConfig", () => {
  test("the shipped markets file is valid", () => {
    const path = fileURLToPath(new URL("../../config/markets.json", import.meta.url));

    const config = loadMarketsConfig(path)._unsafeUnwrap();

    expect(config.markets.map(m => m.marketId)).toEqual(["ETH-USD", "BTC-USD"]);
    expect(config.markets[1]?.risk.minPositionSize).toBe(10n ** 15n);
  });

  test("a missing file is a read error", () => {
    const error = loadMarketsConfig("/nonexistent/markets.json")._unsafeUnwrapErr();

    expect(error.type).toBe("CONFIG_READ_ERROR");
  });
});
