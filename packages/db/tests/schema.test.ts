/**
 * Database Schema Unit Tests
 */

import { getTableConfig } from "drizzle-orm/pg-core";
import { describe, expect, test } from "vitest";

import { clearingEvent, positionSnapshot } from "../src";

describe("clearing_event", () => {
  test("columns and indexes", () => {
    const config = getTableConfig(clearingEvent);

    expect(config.name).toBe("clearing_event");
    expect(config.columns.map(c => c.name)).toEqual([
      "id",
      "ts",
      "event_type",
      "market_id",
      "account",
      "payload",
      "recorded_at",
    ]);
    expect(config.indexes.map(i => i.config.name)).toEqual([
      "clearing_event_market_ts_idx",
      "clearing_event_account_ts_idx",
      "clearing_event_type_idx",
    ]);
  });
});

describe("position_snapshot", () => {
  test("keyed by account and market", () => {
    const config = getTableConfig(positionSnapshot);

    expect(config.name).toBe("position_snapshot");
    expect(config.primaryKeys).toHaveLength(1);
    expect(config.primaryKeys[0]?.columns.map(c => c.name)).toEqual(["account", "market_id"]);
    expect(config.columns.find(c => c.name === "size")?.notNull).toBe(true);
  });
});
