/**
 * In-memory repositories for local runs without a database, and for tests
 */

import { errAsync, okAsync, type ResultAsync } from "neverthrow";

import type { ClearingEventRecord, ClearingEventRepository } from "../interfaces/clearing-event-repository";
import type {
  PositionSnapshotRecord,
  PositionSnapshotRepository,
} from "../interfaces/position-snapshot-repository";
import type { RepositoryError } from "../interfaces/repository-error";
import { latestPerKey } from "../postgres/position-snapshot-repository";

/**
 * Failure switch shared by the in-memory repositories: the next `count`
 * writes fail with DB_ERROR
 */
class FailureSchedule {
  private remaining = 0;

  failNext(count = 1): void {
    this.remaining = count;
  }

  take(): RepositoryError | null {
    if (this.remaining === 0) return null;
    this.remaining--;
    return { type: "DB_ERROR", message: "simulated write failure" };
  }
}

export class MemoryClearingEventRepository implements ClearingEventRepository {
  readonly records: ClearingEventRecord[] = [];
  private readonly failures = new FailureSchedule();

  failNext(count = 1): void {
    this.failures.failNext(count);
  }

  insertMany(records: readonly ClearingEventRecord[]): ResultAsync<number, RepositoryError> {
    const failure = this.failures.take();
    if (failure) return errAsync(failure);
    this.records.push(...records);
    return okAsync(records.length);
  }
}

export class MemoryPositionSnapshotRepository implements PositionSnapshotRepository {
  readonly snapshots = new Map<string, PositionSnapshotRecord>();
  private readonly failures = new FailureSchedule();

  failNext(count = 1): void {
    this.failures.failNext(count);
  }

  get(account: string, marketId: string): PositionSnapshotRecord | undefined {
    return this.snapshots.get(`${account}\u0000${marketId}`);
  }

  upsertSnapshots(snapshots: readonly PositionSnapshotRecord[]): ResultAsync<number, RepositoryError> {
    const failure = this.failures.take();
    if (failure) return errAsync(failure);
    const rows = latestPerKey(snapshots);
    for (const row of rows) {
      this.snapshots.set(`${row.account}\u0000${row.marketId}`, row);
    }
    return okAsync(rows.length);
  }
}
