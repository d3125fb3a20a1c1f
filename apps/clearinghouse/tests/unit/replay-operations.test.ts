/**
 * Replay Operations Unit Tests
 */

import { describe, expect, test } from "vitest";

import { parseReplay, runReplay } from "../../src/usecases/replay-operations";
import { T0, WAD, createVenue } from "./fixtures";

describe("parseReplay", () => {
  test("skips blank lines and comments, keeping file line numbers", () => {
    const lines = parseReplay(
      ["# setup", "", '{"op":"advanceTime","seconds":60}', '{"op":"pokeFunding","marketId":"ETH-USD"}'].join("\n"),
    )._unsafeUnwrap();

    expect(lines.map(l => [l.line, l.operation.op])).toEqual([
      [3, "advanceTime"],
      [4, "pokeFunding"],
    ]);
  });

  test("decimal fields are parsed and limits default to none", () => {
    const [line] = parseReplay(
      '{"op":"openPosition","account":"alice","marketId":"ETH-USD","direction":"short","size":"1.5"}',
    )._unsafeUnwrap();

    expect(line?.operation).toEqual({
      op: "openPosition",
      account: "alice",
      marketId: "ETH-USD",
      direction: "short",
      size: 1_500_000_000_000_000_000n,
      priceLimit: 0n,
    });
  });

  test("invalid JSON reports its line", () => {
    const error = parseReplay('{"op":"advanceTime","seconds":60}\n{oops')._unsafeUnwrapErr();

    expect(error.type).toBe("REPLAY_PARSE_ERROR");
    expect(error.line).toBe(2);
  });

  test("unknown operations are rejected", () => {
    const error = parseReplay('{"op":"mint","account":"alice"}')._unsafeUnwrapErr();

    expect(error.line).toBe(1);
  });
});

describe("runReplay", () => {
  test("applies operations in order and tallies rejections", async () => {
    const venue = createVenue();
    const lines = parseReplay(
      [
        '{"op":"deposit","account":"alice","token":"USDC","amountUnits":"300000000"}',
        '{"op":"openPosition","account":"alice","marketId":"ETH-USD","direction":"long","size":"1"}',
        '{"op":"deposit","account":"bob","token":"USDC","amountUnits":"0"}',
        '{"op":"openPosition","account":"carol","marketId":"ETH-USD","direction":"long","size":"1"}',
        '{"op":"advanceTime","seconds":60}',
        '{"op":"setIndexPrice","marketId":"SOL-USD","price":"150"}',
      ].join("\n"),
    )._unsafeUnwrap();

    const summary = await runReplay({ house: venue.house, clock: venue.clock, oracles: venue.oracles }, lines);

    expect(summary.applied).toBe(3);
    expect(summary.rejected).toBe(3);
    expect(summary.rejections).toEqual({ ZERO_AMOUNT: 1, INSUFFICIENT_COLLATERAL: 1, UNKNOWN_MARKET: 1 });
    expect(summary.outcomes.filter(o => o.ok).map(o => o.detail)).toEqual([
      "300000000 USDC",
      "open size=1 avg=2002.002002002002002003",
      `now=${String(T0 + 60)}`,
    ]);
    expect(venue.engine.getPosition("alice", "ETH-USD").size).toBe(WAD);
  });

  test("index price operations drive the market's oracle", async () => {
    const venue = createVenue();
    const lines = parseReplay(
      [
        '{"op":"failIndexPrice","marketId":"ETH-USD","reason":"feed down"}',
        '{"op":"advanceTime","seconds":60}',
        '{"op":"pokeFunding","marketId":"ETH-USD"}',
        '{"op":"setIndexPrice","marketId":"ETH-USD","price":"1900"}',
      ].join("\n"),
    )._unsafeUnwrap();

    const summary = await runReplay({ house: venue.house, clock: venue.clock, oracles: venue.oracles }, lines);

    expect(summary.outcomes.map(o => o.detail)).toEqual([
      "index unavailable",
      `now=${String(T0 + 60)}`,
      "DEFERRED",
      "price=1900",
    ]);
    expect(venue.oracles.get("ETH-USD")?.getPrice()._unsafeUnwrap()).toBe(1900n * WAD);
  });

  test("admin operations carry their caller", async () => {
    const venue = createVenue();
    const lines = parseReplay(
      [
        '{"op":"pauseSwaps","caller":"admin","marketId":"ETH-USD"}',
        '{"op":"setFeeBps","caller":"mallory","marketId":"ETH-USD","feeBps":20}',
      ].join("\n"),
    )._unsafeUnwrap();

    const summary = await runReplay({ house: venue.house, clock: venue.clock, oracles: venue.oracles }, lines);

    expect(summary.outcomes.map(o => o.ok)).toEqual([true, false]);
    expect(summary.rejections).toEqual({ PERMISSION_DENIED: 1 });
  });
});
