/**
 * Position Snapshot Repository Interface
 *
 * - Maintain position_snapshot (1 row per (account, market))
 */

import type { ResultAsync } from "neverthrow";

import type { RepositoryError } from "./repository-error";

export interface PositionSnapshotRecord {
  account: string;
  marketId: string;
  ts: Date;
  /** numeric columns are represented as strings in drizzle */
  size: string;
  margin: string;
  entryPrice: string;
  realizedPnl: string;
}

export interface PositionSnapshotRepository {
  upsertSnapshots(snapshots: readonly PositionSnapshotRecord[]): ResultAsync<number, RepositoryError>;
}
