/**
 * clearing_event - Clearing Events (append only)
 *
 * - One row per event committed by the clearing engine
 * - Amounts inside `payload` are 1e18 decimal strings
 */

import { index, jsonb, pgTable, text, timestamp, uuid } from "drizzle-orm/pg-core";

export const clearingEvent = pgTable(
  "clearing_event",
  {
    id: uuid("id").primaryKey().defaultRandom(),
    ts: timestamp("ts", { withTimezone: true, mode: "date" }).notNull(),
    eventType: text("event_type").notNull(),
    marketId: text("market_id"),
    account: text("account"),
    payload: jsonb("payload").notNull(),
    recordedAt: timestamp("recorded_at", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
  },
  table => [
    index("clearing_event_market_ts_idx").on(table.marketId, table.ts.desc()),
    index("clearing_event_account_ts_idx").on(table.account, table.ts.desc()),
    index("clearing_event_type_idx").on(table.eventType),
  ],
);

export type ClearingEventRow = typeof clearingEvent.$inferSelect;
export type NewClearingEventRow = typeof clearingEvent.$inferInsert;
