/**
 * position_snapshot - Latest Position (1 row per account and market)
 *
 * Upserted after every committed position change. Quantities are 1e18
 * decimals rendered as numerics.
 */

import { numeric, pgTable, primaryKey, text, timestamp } from "drizzle-orm/pg-core";

export const positionSnapshot = pgTable(
  "position_snapshot",
  {
    account: text("account").notNull(),
    marketId: text("market_id").notNull(),
    ts: timestamp("ts", { withTimezone: true, mode: "date" }).notNull(),
    size: numeric("size").notNull(),
    margin: numeric("margin").notNull(),
    entryPrice: numeric("entry_price").notNull(),
    realizedPnl: numeric("realized_pnl").notNull(),
    updatedAt: timestamp("updated_at", { withTimezone: true, mode: "date" }).notNull().defaultNow(),
  },
  table => [primaryKey({ columns: [table.account, table.marketId] })],
);

export type PositionSnapshotRow = typeof positionSnapshot.$inferSelect;
export type NewPositionSnapshotRow = typeof positionSnapshot.$inferInsert;
