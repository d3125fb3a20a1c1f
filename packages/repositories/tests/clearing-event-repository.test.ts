/**
 * ClearingEventRepository Unit Tests
 */

import { describe, expect, test } from "vitest";

import type { ClearingEventRecord } from "../src/interfaces/clearing-event-repository";
import { MemoryClearingEventRepository } from "../src/memory/memory-repositories";
import { createPostgresClearingEventRepository } from "../src/postgres/clearing-event-repository";
import { createFakeDb } from "./fake-pg";

const createRecord = (overrides: Partial<ClearingEventRecord> = {}): ClearingEventRecord => ({
  ts: new Date("2024-01-01T00:00:00Z"),
  eventType: "POSITION_CHANGED",
  marketId: "ETH-USD",
  account: "alice",
  payload: { sizeX18: "1" },
  ...overrides,
});

describe("createPostgresClearingEventRepository", () => {
  test("writes a batch in one insert", async () => {
    const { db, queries } = createFakeDb();
    const repo = createPostgresClearingEventRepository(db);

    const result = await repo.insertMany([createRecord(), createRecord({ eventType: "LIQUIDATED" })]);

    expect(result._unsafeUnwrap()).toBe(2);
    expect(queries).toHaveLength(1);
    expect(queries[0]?.text.startsWith('insert into "clearing_event"')).toBe(true);
    expect(queries[0]?.values).toHaveLength(10);
    expect(queries[0]?.values).toContain("LIQUIDATED");
    expect(queries[0]?.values).toContain('{"sizeX18":"1"}');
  });

  test("an empty batch never reaches the database", async () => {
    const { db, queries } = createFakeDb();
    const repo = createPostgresClearingEventRepository(db);

    expect((await repo.insertMany([]))._unsafeUnwrap()).toBe(0);
    expect(queries).toHaveLength(0);
  });

  test("driver failures become DB_ERROR", async () => {
    const { db } = createFakeDb({ failWith: new Error("Connection refused") });
    const repo = createPostgresClearingEventRepository(db);

    const result = await repo.insertMany([createRecord()]);

    expect(result._unsafeUnwrapErr().type).toBe("DB_ERROR");
  });
});

describe("MemoryClearingEventRepository", () => {
  test("keeps records and fails on request", async () => {
    const repo = new MemoryClearingEventRepository();
    repo.failNext();

    expect((await repo.insertMany([createRecord()]))._unsafeUnwrapErr().type).toBe("DB_ERROR");
    expect((await repo.insertMany([createRecord()]))._unsafeUnwrap()).toBe(1);
    expect(repo.records).toHaveLength(1);
  });
});
