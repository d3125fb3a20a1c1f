/**
 * Event Writer Service
 *
 * - Receives committed clearing events (EventSink) and buffers them as rows
 * - Keeps position_snapshot current for every account/market an event touches
 * - Flushes on interval with retry; permanent failures go to a dead letter buffer
 */

import { formatDecimal, type AccountId, type MarketId, type Position, type UnixSec } from "@perp-clearing/core";
import type { ClearingEvent, EventSink } from "@perp-clearing/engine";
import type {
  ClearingEventRecord,
  ClearingEventRepository,
  PositionSnapshotRecord,
  PositionSnapshotRepository,
  RepositoryError,
} from "@perp-clearing/repositories";
import { logger, type Logger } from "@perp-clearing/utils";
import type { Result, ResultAsync } from "neverthrow";

export type PositionReader = (account: AccountId, marketId: MarketId) => Position;

export interface EventWriterRepositories {
  events: ClearingEventRepository;
  snapshots: PositionSnapshotRepository;
}

export interface EventWriterOptions {
  retryBaseDelayMs?: number;
  maxRetries?: number;
  logger?: Logger;
}

export type DeadLetterEntry =
  | { table: "clearing_event"; records: ClearingEventRecord[]; error: RepositoryError; failedAt: Date }
  | { table: "position_snapshot"; records: PositionSnapshotRecord[]; error: RepositoryError; failedAt: Date };

/**
 * Event Writer - buffers clearing events and batch-writes them to the repositories
 */
export class EventWriter implements EventSink {
  private readonly eventBuffer: ClearingEventRecord[] = [];
  private readonly snapshotBuffer: PositionSnapshotRecord[] = [];
  private readonly deadLetterBuffer: DeadLetterEntry[] = [];
  private flushInFlight: Promise<void> | null = null;
  private readPosition: PositionReader | null = null;
  private readonly retryBaseDelayMs: number;
  private readonly maxRetries: number;
  private readonly log: Logger;

  constructor(
    private readonly repos: EventWriterRepositories,
    opts: EventWriterOptions = {},
  ) {
    this.retryBaseDelayMs = opts.retryBaseDelayMs ?? 100;
    this.maxRetries = opts.maxRetries ?? 3;
    this.log = opts.logger ?? logger.child({ component: "event-writer" });
  }

  /**
   * Source of post-commit positions for snapshots; without one only events are written
   */
  trackPositions(reader: PositionReader): void {
    this.readPosition = reader;
  }

  publish(events: readonly ClearingEvent[]): void {
    for (const event of events) {
      this.eventBuffer.push(toEventRecord(event));

      const key = positionKey(event);
      if (key && this.readPosition) {
        const position = this.readPosition(key.account, key.marketId);
        this.snapshotBuffer.push(toSnapshotRecord(key.account, key.marketId, event.ts, position));
      }
    }
  }

  getBufferSizes(): { events: number; snapshots: number } {
    return { events: this.eventBuffer.length, snapshots: this.snapshotBuffer.length };
  }

  getDeadLetterSize(): number {
    return this.deadLetterBuffer.length;
  }

  getDeadLetters(): readonly DeadLetterEntry[] {
    return this.deadLetterBuffer;
  }

  /**
   * Flush both buffers; concurrent callers share the flush in progress
   */
  async flush(): Promise<void> {
    if (this.flushInFlight) {
      await this.flushInFlight;
      return;
    }

    this.flushInFlight = this.flushOnce();
    try {
      await this.flushInFlight;
    } finally {
      this.flushInFlight = null;
    }
  }

  private async flushOnce(): Promise<void> {
    if (this.eventBuffer.length > 0) {
      const toInsert = this.eventBuffer.slice();
      const result = await this.writeWithRetry("clearing_event", toInsert.length, () =>
        this.repos.events.insertMany(toInsert),
      );
      const taken = this.eventBuffer.splice(0, toInsert.length);
      if (result.isErr()) {
        this.deadLetterBuffer.push({ table: "clearing_event", records: taken, error: result.error, failedAt: new Date() });
        this.log.error("Failed to flush clearing events; moved to dead letter", {
          count: taken.length,
          error: result.error.message,
        });
      } else {
        this.log.debug("Flushed clearing events", { count: taken.length });
      }
    }

    if (this.snapshotBuffer.length > 0) {
      const toUpsert = this.snapshotBuffer.slice();
      const result = await this.writeWithRetry("position_snapshot", toUpsert.length, () =>
        this.repos.snapshots.upsertSnapshots(toUpsert),
      );
      const taken = this.snapshotBuffer.splice(0, toUpsert.length);
      if (result.isErr()) {
        this.deadLetterBuffer.push({
          table: "position_snapshot",
          records: taken,
          error: result.error,
          failedAt: new Date(),
        });
        this.log.error("Failed to flush position snapshots; moved to dead letter", {
          count: taken.length,
          error: result.error.message,
        });
      } else {
        this.log.debug("Flushed position snapshots", { count: taken.length, rows: result.value });
      }
    }
  }

  private async writeWithRetry(
    table: DeadLetterEntry["table"],
    count: number,
    write: () => ResultAsync<number, RepositoryError>,
  ): Promise<Result<number, RepositoryError>> {
    let result = await write();

    for (let attempt = 1; result.isErr() && attempt < this.maxRetries; attempt++) {
      const delayMs = this.getRetryDelayMs(attempt);
      this.log.warn("Flush write failed; retrying", {
        table,
        attempt,
        maxRetries: this.maxRetries,
        count,
        delayMs,
        error: result.error.message,
      });
      await sleep(delayMs);
      result = await write();
    }

    return result;
  }

  private getRetryDelayMs(attempt: number): number {
    // attempt: 1 -> 100ms, 2 -> 200ms, 3 -> 400ms ...
    const base = this.retryBaseDelayMs * 2 ** (attempt - 1);
    // up to 25% jitter
    const jitter = Math.floor(Math.random() * Math.max(1, Math.floor(base * 0.25)));
    return base + jitter;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Row mapping
// ─────────────────────────────────────────────────────────────────────────────

const toDate = (ts: UnixSec): Date => new Date(ts * 1000);

/**
 * JSON-safe copy: bigints become integer strings
 */
function toJsonValue(value: unknown): unknown {
  if (typeof value === "bigint") return value.toString();
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = toJsonValue(inner);
    }
    return out;
  }
  return value;
}

export function toEventRecord(event: ClearingEvent): ClearingEventRecord {
  const payload: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(event)) {
    if (key === "type" || key === "ts" || key === "account" || key === "marketId") continue;
    payload[key] = toJsonValue(value);
  }

  return {
    ts: toDate(event.ts),
    eventType: event.type,
    marketId: "marketId" in event ? event.marketId : null,
    account: "account" in event ? event.account : null,
    payload,
  };
}

function positionKey(event: ClearingEvent): { account: AccountId; marketId: MarketId } | null {
  if ("account" in event && "marketId" in event) {
    return { account: event.account, marketId: event.marketId };
  }
  return null;
}

export function toSnapshotRecord(
  account: AccountId,
  marketId: MarketId,
  ts: UnixSec,
  position: Position,
): PositionSnapshotRecord {
  return {
    account,
    marketId,
    ts: toDate(ts),
    size: formatDecimal(position.size),
    margin: formatDecimal(position.margin),
    entryPrice: formatDecimal(position.entryPriceX18),
    realizedPnl: formatDecimal(position.realizedPnlX18),
  };
}

async function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
