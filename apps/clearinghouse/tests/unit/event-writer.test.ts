/**
 * EventWriter Unit Tests
 *
 * - Events map to rows with bigints as integer strings
 * - Flush retries failed writes, then moves them to dead letter
 * - Concurrent flush calls do not duplicate inserts
 * - Snapshots follow committed positions
 */

import type { Position } from "@perp-clearing/core";
import type { ClearingEvent } from "@perp-clearing/engine";
import { MemoryClearingEventRepository, MemoryPositionSnapshotRepository } from "@perp-clearing/repositories";
import { describe, expect, test } from "vitest";

import { EventWriter, toEventRecord } from "../../src/services/event-writer";
import { parseReplay, runReplay } from "../../src/usecases/replay-operations";
import { T0, WAD, createVenue } from "./fixtures";

const marginAdded = (amountX18: bigint = 50n * WAD): ClearingEvent => ({
  type: "MARGIN_ADDED",
  ts: T0,
  account: "alice",
  marketId: "ETH-USD",
  amountX18,
});

const createPosition = (overrides: Partial<Position> = {}): Position => ({
  size: WAD,
  margin: 250n * WAD,
  entryPriceX18: 2000n * WAD,
  lastFundingIndexX18: 0n,
  realizedPnlX18: -WAD / 2n,
  ...overrides,
});

function createWriter(maxRetries = 3) {
  const events = new MemoryClearingEventRepository();
  const snapshots = new MemoryPositionSnapshotRepository();
  const writer = new EventWriter({ events, snapshots }, { retryBaseDelayMs: 0, maxRetries });
  return { writer, events, snapshots };
}

describe("toEventRecord", () => {
  test("account and market become columns, the rest the payload", () => {
    expect(toEventRecord(marginAdded())).toEqual({
      ts: new Date(T0 * 1000),
      eventType: "MARGIN_ADDED",
      marketId: "ETH-USD",
      account: "alice",
      payload: { amountX18: "50000000000000000000" },
    });
  });

  test("nested bigints are stringified and missing keys are null", () => {
    const record = toEventRecord({
      type: "RISK_PARAMS_SET",
      ts: T0,
      marketId: "ETH-USD",
      params: {
        imrBps: 1000,
        mmrBps: 500,
        liquidationPenaltyBps: 250,
        penaltyCap: 20n * WAD,
        maxPositionSize: 0n,
        minPositionSize: 0n,
        liquidatorShareBps: 5000,
      },
    });

    expect(record.account).toBeNull();
    expect(record.payload).toEqual({
      params: {
        imrBps: 1000,
        mmrBps: 500,
        liquidationPenaltyBps: 250,
        penaltyCap: "20000000000000000000",
        maxPositionSize: "0",
        minPositionSize: "0",
        liquidatorShareBps: 5000,
      },
    });
  });
});

describe("EventWriter", () => {
  test("flush removes events only after a successful insert", async () => {
    const { writer, events } = createWriter();
    writer.publish([marginAdded()]);

    await writer.flush();

    expect(writer.getBufferSizes().events).toBe(0);
    expect(writer.getDeadLetterSize()).toBe(0);
    expect(events.records).toHaveLength(1);
  });

  test("flush retries and eventually succeeds", async () => {
    const { writer, events } = createWriter();
    events.failNext(2);
    writer.publish([marginAdded()]);

    await writer.flush();

    expect(events.records).toHaveLength(1);
    expect(writer.getDeadLetterSize()).toBe(0);
  });

  test("permanent failures move events to dead letter", async () => {
    const { writer, events } = createWriter();
    events.failNext(3);
    writer.publish([marginAdded(), marginAdded(WAD)]);

    await writer.flush();

    expect(events.records).toHaveLength(0);
    expect(writer.getBufferSizes().events).toBe(0);
    const [entry] = writer.getDeadLetters();
    expect(entry?.table).toBe("clearing_event");
    expect(entry?.records).toHaveLength(2);
    expect(entry?.error.type).toBe("DB_ERROR");
  });

  test("concurrent flush calls share one insert", async () => {
    const { writer, events } = createWriter();
    writer.publish([marginAdded()]);

    await Promise.all([writer.flush(), writer.flush()]);

    expect(events.records).toHaveLength(1);
  });

  test("events published during a flush wait for the next one", async () => {
    const { writer, events } = createWriter();
    writer.publish([marginAdded()]);

    const flushing = writer.flush();
    writer.publish([marginAdded(WAD)]);
    await flushing;

    expect(events.records).toHaveLength(1);
    expect(writer.getBufferSizes().events).toBe(1);
  });

  test("position events snapshot the position read after commit", async () => {
    const { writer, snapshots } = createWriter();
    writer.trackPositions(() => createPosition());

    writer.publish([
      { type: "COLLATERAL_DEPOSITED", ts: T0, account: "alice", token: "USDC", amountUnits: 1n },
      marginAdded(),
      { type: "FUNDING_SETTLED", ts: T0 + 60, account: "alice", marketId: "ETH-USD", paymentX18: -1n },
    ]);
    expect(writer.getBufferSizes().snapshots).toBe(2);

    await writer.flush();

    expect(snapshots.get("alice", "ETH-USD")).toEqual({
      account: "alice",
      marketId: "ETH-USD",
      ts: new Date((T0 + 60) * 1000),
      size: "1",
      margin: "250",
      entryPrice: "2000",
      realizedPnl: "-0.5",
    });
    expect(snapshots.snapshots.size).toBe(1);
  });

  test("without a position reader only events are buffered", () => {
    const { writer } = createWriter();

    writer.publish([marginAdded()]);

    expect(writer.getBufferSizes()).toEqual({ events: 1, snapshots: 0 });
  });

  test("replayed trades reach both tables", async () => {
    const { writer, events, snapshots } = createWriter();
    const venue = createVenue({ eventSink: writer });
    writer.trackPositions((account, marketId) => venue.engine.getPosition(account, marketId));
    const lines = parseReplay(
      [
        '{"op":"deposit","account":"alice","token":"USDC","amountUnits":"300000000"}',
        '{"op":"openPosition","account":"alice","marketId":"ETH-USD","direction":"long","size":"1"}',
      ].join("\n"),
    )._unsafeUnwrap();

    await runReplay({ house: venue.house, clock: venue.clock, oracles: venue.oracles }, lines);
    await writer.flush();

    const trading = events.records.filter(r => r.account === "alice").map(r => r.eventType);
    expect(trading).toEqual(["COLLATERAL_DEPOSITED", "POSITION_CHANGED"]);
    expect(snapshots.get("alice", "ETH-USD")).toEqual({
      account: "alice",
      marketId: "ETH-USD",
      ts: new Date(T0 * 1000),
      size: "1",
      margin: "202.402602803003203405",
      entryPrice: "2002.002002002002002003",
      realizedPnl: "0",
    });
  });
});
