/**
 * Postgres Clearing Event Repository
 *
 * - One multi-row insert per batch
 */

import { okAsync, ResultAsync } from "neverthrow";
import { clearingEvent, type Db } from "@perp-clearing/db";

import type { ClearingEventRecord, ClearingEventRepository } from "../interfaces/clearing-event-repository";
import { toRepositoryError, type RepositoryError } from "../interfaces/repository-error";

export function createPostgresClearingEventRepository(db: Db): ClearingEventRepository {
  return {
    insertMany(records: readonly ClearingEventRecord[]): ResultAsync<number, RepositoryError> {
      if (records.length === 0) return okAsync(0);

      return ResultAsync.fromPromise(
        db.insert(clearingEvent).values(
          records.map(r => ({
            ts: r.ts,
            eventType: r.eventType,
            marketId: r.marketId,
            account: r.account,
            payload: r.payload,
          })),
        ),
        toRepositoryError,
      ).map(() => records.length);
    },
  };
}
