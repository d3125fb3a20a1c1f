/**
 * TWAP Observation Ring
 *
 * - Fixed-size ring of cumulative-price observations
 * - Paused intervals accumulate neither price nor active time
 * - Averages are exact because price only moves at observations
 *
 * This module is pure (no I/O, no throw).
 */

import { err, ok, type Result } from "neverthrow";

import type { CoreError, Observation, TwapState, UnixSec, X18 } from "./types";

/**
 * Create a ring holding a single genesis observation
 */
export function createTwapState(cardinality: number, priceX18: X18, nowSec: UnixSec): TwapState {
  return {
    cardinality,
    observations: [
      {
        timestamp: nowSec,
        priceCumulativeX18: 0n,
        activeSeconds: 0n,
        priceX18,
        paused: false,
      },
    ],
    head: 0,
    genesisTs: nowSec,
  };
}

export function latestObservation(state: TwapState): Observation {
  return state.observations[state.head];
}

/**
 * Extend an observation's accumulators up to `atSec` (>= its timestamp)
 */
function accumulateTo(obs: Observation, atSec: UnixSec): { priceCumulativeX18: bigint; activeSeconds: bigint } {
  const elapsed = BigInt(Math.max(0, atSec - obs.timestamp));
  if (obs.paused || elapsed === 0n) {
    return { priceCumulativeX18: obs.priceCumulativeX18, activeSeconds: obs.activeSeconds };
  }
  return {
    priceCumulativeX18: obs.priceCumulativeX18 + obs.priceX18 * elapsed,
    activeSeconds: obs.activeSeconds + elapsed,
  };
}

/**
 * Record a new observation.
 *
 * Accumulates the price in force since the previous observation first, so a
 * swap must call this with the price it moved to. A second write in the same
 * second replaces the latest observation in place.
 */
export function writeObservation(state: TwapState, nowSec: UnixSec, priceX18: X18, paused: boolean): TwapState {
  const last = latestObservation(state);
  const { priceCumulativeX18, activeSeconds } = accumulateTo(last, nowSec);
  const next: Observation = {
    timestamp: Math.max(nowSec, last.timestamp),
    priceCumulativeX18,
    activeSeconds,
    priceX18,
    paused,
  };

  const observations = [...state.observations];

  if (next.timestamp === last.timestamp) {
    observations[state.head] = next;
    return { ...state, observations };
  }

  const head = (state.head + 1) % state.cardinality;
  if (observations.length < state.cardinality) {
    observations.push(next);
  } else {
    observations[head] = next;
  }

  return { ...state, observations, head };
}

/**
 * Oldest retained observation
 */
function oldestObservation(state: TwapState): Observation {
  if (state.observations.length < state.cardinality) {
    return state.observations[0];
  }
  return state.observations[(state.head + 1) % state.cardinality];
}

/**
 * Most recent observation at or before `targetSec`, scanning backward from head
 */
function findObservationAtOrBefore(state: TwapState, targetSec: UnixSec): Observation | undefined {
  const count = state.observations.length;
  for (let i = 0; i < count; i++) {
    const idx = (state.head - i + count) % count;
    const obs = state.observations[idx];
    if (obs.timestamp <= targetSec) {
      return obs;
    }
  }
  return undefined;
}

/**
 * Time-weighted average mark price over `[now - windowSec, now]`.
 *
 * - windowSec = 0 or a market created this second: current mark
 * - no observation old enough: the oldest one is used only when it covers at
 *   least half of the requested window, otherwise INSUFFICIENT_TWAP_HISTORY
 * - a window longer than the market's age is thereby clamped to that age
 */
export function consultTwap(state: TwapState, windowSec: number, nowSec: UnixSec): Result<X18, CoreError> {
  const last = latestObservation(state);

  if (windowSec <= 0) {
    return ok(last.priceX18);
  }

  const now = accumulateTo(last, nowSec);
  const targetSec = nowSec - windowSec;

  let start: { priceCumulativeX18: bigint; activeSeconds: bigint };
  const anchor = findObservationAtOrBefore(state, targetSec);

  if (anchor) {
    start = accumulateTo(anchor, targetSec);
  } else {
    const oldest = oldestObservation(state);
    const covered = nowSec - oldest.timestamp;
    if (covered * 2 < windowSec) {
      return err({
        type: "INSUFFICIENT_TWAP_HISTORY",
        message: `requested ${String(windowSec)}s window but only ${String(covered)}s of history is retained`,
      });
    }
    start = { priceCumulativeX18: oldest.priceCumulativeX18, activeSeconds: oldest.activeSeconds };
  }

  const activeDelta = now.activeSeconds - start.activeSeconds;
  if (activeDelta <= 0n) {
    // Whole window paused
    return ok(last.priceX18);
  }

  return ok((now.priceCumulativeX18 - start.priceCumulativeX18) / activeDelta);
}
