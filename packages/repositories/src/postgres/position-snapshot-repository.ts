/**
 * Postgres Position Snapshot Repository
 *
 * - Upsert position_snapshot per (account, market_id)
 * - Within a batch the last snapshot for a key wins; Postgres rejects a
 *   statement that updates the same row twice
 */

import { sql } from "drizzle-orm";
import { okAsync, ResultAsync } from "neverthrow";
import { positionSnapshot, type Db } from "@perp-clearing/db";

import type {
  PositionSnapshotRecord,
  PositionSnapshotRepository,
} from "../interfaces/position-snapshot-repository";
import { toRepositoryError, type RepositoryError } from "../interfaces/repository-error";

const excluded = (column: string) => sql.raw(`excluded.${column}`);

export function latestPerKey(snapshots: readonly PositionSnapshotRecord[]): PositionSnapshotRecord[] {
  const byKey = new Map<string, PositionSnapshotRecord>();
  for (const snapshot of snapshots) {
    byKey.set(`${snapshot.account}\u0000${snapshot.marketId}`, snapshot);
  }
  return [...byKey.values()];
}

export function createPostgresPositionSnapshotRepository(db: Db): PositionSnapshotRepository {
  return {
    upsertSnapshots(snapshots: readonly PositionSnapshotRecord[]): ResultAsync<number, RepositoryError> {
      const rows = latestPerKey(snapshots);
      if (rows.length === 0) return okAsync(0);

      const now = new Date();
      return ResultAsync.fromPromise(
        db
          .insert(positionSnapshot)
          .values(
            rows.map(s => ({
              account: s.account,
              marketId: s.marketId,
              ts: s.ts,
              size: s.size,
              margin: s.margin,
              entryPrice: s.entryPrice,
              realizedPnl: s.realizedPnl,
              updatedAt: now,
            })),
          )
          .onConflictDoUpdate({
            target: [positionSnapshot.account, positionSnapshot.marketId],
            set: {
              ts: excluded("ts"),
              size: excluded("size"),
              margin: excluded("margin"),
              entryPrice: excluded("entry_price"),
              realizedPnl: excluded("realized_pnl"),
              updatedAt: now,
            },
          }),
        toRepositoryError,
      ).map(() => rows.length);
    },
  };
}
