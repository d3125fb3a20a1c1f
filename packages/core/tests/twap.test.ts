/**
 * TWAP Observation Ring Unit Tests
 */

import { describe, expect, test } from "vitest";

import { consultTwap, createTwapState, latestObservation, writeObservation } from "../src/twap";

const GENESIS = 1_000;

describe("writeObservation", () => {
  test("accumulates the previous price before recording the new one", () => {
    const state = writeObservation(createTwapState(4, 100n, GENESIS), GENESIS + 10, 200n, false);

    expect(latestObservation(state)).toEqual({
      timestamp: GENESIS + 10,
      priceCumulativeX18: 1_000n,
      activeSeconds: 10n,
      priceX18: 200n,
      paused: false,
    });
  });

  test("a second write in the same second replaces the latest observation", () => {
    const state = writeObservation(createTwapState(4, 100n, GENESIS), GENESIS, 150n, false);

    expect(state.observations).toHaveLength(1);
    expect(latestObservation(state).priceX18).toBe(150n);
    expect(latestObservation(state).priceCumulativeX18).toBe(0n);
  });

  test("overwrites the oldest slot once the ring is full", () => {
    let state = createTwapState(2, 100n, GENESIS);
    state = writeObservation(state, GENESIS + 10, 200n, false);
    state = writeObservation(state, GENESIS + 20, 300n, false);

    expect(state.observations).toHaveLength(2);
    expect(state.head).toBe(0);
    expect(state.observations.map(o => o.timestamp)).toEqual([GENESIS + 20, GENESIS + 10]);
  });
});

describe("consultTwap", () => {
  test("window 0 returns the current mark", () => {
    const state = writeObservation(createTwapState(4, 100n, GENESIS), GENESIS + 10, 200n, false);

    expect(consultTwap(state, 0, GENESIS + 20)._unsafeUnwrap()).toBe(200n);
  });

  test("a market created this second has no history for a nonzero window", () => {
    const state = createTwapState(4, 100n, GENESIS);

    expect(consultTwap(state, 600, GENESIS)._unsafeUnwrapErr().type).toBe("INSUFFICIENT_TWAP_HISTORY");
    expect(consultTwap(state, 600, GENESIS + 1)._unsafeUnwrapErr().type).toBe("INSUFFICIENT_TWAP_HISTORY");
    expect(consultTwap(state, 0, GENESIS)._unsafeUnwrap()).toBe(100n);
  });

  test("time-weights prices across observations", () => {
    const state = writeObservation(createTwapState(4, 100n, GENESIS), GENESIS + 10, 200n, false);

    // 10s at 100 and 10s at 200
    expect(consultTwap(state, 20, GENESIS + 20)._unsafeUnwrap()).toBe(150n);
    expect(consultTwap(state, 10, GENESIS + 20)._unsafeUnwrap()).toBe(200n);
  });

  test("fails when the only observation is younger than half the window", () => {
    const state = createTwapState(4, 100n, GENESIS);

    const result = consultTwap(state, 30, GENESIS + 10);

    expect(result._unsafeUnwrapErr().type).toBe("INSUFFICIENT_TWAP_HISTORY");
  });

  test("clamps to the market's age once it covers half the window", () => {
    const state = createTwapState(4, 100n, GENESIS);

    expect(consultTwap(state, 20, GENESIS + 10)._unsafeUnwrap()).toBe(100n);
  });

  test("uses the oldest retained observation after the ring wraps", () => {
    let state = createTwapState(2, 100n, GENESIS);
    state = writeObservation(state, GENESIS + 10, 200n, false);
    state = writeObservation(state, GENESIS + 20, 300n, false);

    // Genesis is gone: average over [GENESIS + 10, GENESIS + 20]
    expect(consultTwap(state, 20, GENESIS + 20)._unsafeUnwrap()).toBe(200n);
    expect(consultTwap(state, 30, GENESIS + 20)._unsafeUnwrapErr().type).toBe("INSUFFICIENT_TWAP_HISTORY");
  });

  test("paused intervals are excluded from the average", () => {
    let state = createTwapState(4, 100n, GENESIS);
    state = writeObservation(state, GENESIS + 10, 100n, true);
    state = writeObservation(state, GENESIS + 30, 300n, false);

    // 10s at 100, 20s paused, 10s at 300
    expect(consultTwap(state, 40, GENESIS + 40)._unsafeUnwrap()).toBe(200n);
  });

  test("returns the mark when the whole window was paused", () => {
    let state = createTwapState(4, 100n, GENESIS);
    state = writeObservation(state, GENESIS + 10, 120n, true);

    expect(consultTwap(state, 10, GENESIS + 30)._unsafeUnwrap()).toBe(120n);
  });
});
