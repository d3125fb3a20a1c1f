/**
 * Clearing Event Repository Interface
 *
 * - Append committed clearing events in batches
 */

import type { ResultAsync } from "neverthrow";

import type { RepositoryError } from "./repository-error";

/**
 * Clearing event for persistence
 */
export interface ClearingEventRecord {
  ts: Date;
  eventType: string;
  marketId: string | null;
  account: string | null;
  /** JSON-safe event body (bigints rendered as strings) */
  payload: Record<string, unknown>;
}

export interface ClearingEventRepository {
  /**
   * Insert a batch; resolves with the number of rows written
   */
  insertMany(records: readonly ClearingEventRecord[]): ResultAsync<number, RepositoryError>;
}
