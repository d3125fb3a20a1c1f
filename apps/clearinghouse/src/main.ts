/**
 * Clearinghouse Main Entry Point
 *
 * - Composition root: env, markets config, collaborators, engine, actor
 * - Audit trail to Postgres when DATABASE_URL is set, in memory otherwise
 * - Replays REPLAY_PATH through the actor, then flushes and exits
 */

import { readFileSync } from "node:fs";

import { formatDecimal } from "@perp-clearing/core";
import { getDb, type DbConnection } from "@perp-clearing/db";
import {
  createPostgresClearingEventRepository,
  createPostgresPositionSnapshotRepository,
  MemoryClearingEventRepository,
  MemoryPositionSnapshotRepository,
} from "@perp-clearing/repositories";
import { createIntervalWorker, LogLevel, logger } from "@perp-clearing/utils";

import { env } from "./env";
import { EventWriter, type EventWriterRepositories } from "./services/event-writer";
import { loadMarketsConfig } from "./services/markets-config";
import { buildVenue } from "./services/venue";
import { parseReplay, runReplay } from "./usecases/replay-operations";

async function main(): Promise<void> {
  logger.setLevel(LogLevel[env.LOG_LEVEL]);
  logger.info("Starting clearinghouse", { appEnv: env.APP_ENV, marketsConfig: env.MARKETS_CONFIG_PATH });

  const config = loadMarketsConfig(env.MARKETS_CONFIG_PATH);
  if (config.isErr()) {
    throw new Error(`markets config: ${config.error.message}`);
  }

  let connection: DbConnection | null = null;
  let repos: EventWriterRepositories;
  if (env.DATABASE_URL) {
    connection = getDb(env.DATABASE_URL);
    repos = {
      events: createPostgresClearingEventRepository(connection.db),
      snapshots: createPostgresPositionSnapshotRepository(connection.db),
    };
  } else {
    logger.warn("DATABASE_URL not set; audit trail kept in memory");
    repos = { events: new MemoryClearingEventRepository(), snapshots: new MemoryPositionSnapshotRepository() };
  }

  const writer = new EventWriter(repos);
  const venue = buildVenue(config.value, { eventSink: writer, maxActiveMarkets: env.MAX_ACTIVE_MARKETS });
  if (venue.isErr()) {
    throw new Error(`venue bootstrap: ${venue.error.type}: ${venue.error.message}`);
  }
  const { engine, house, clock, oracles } = venue.value;
  writer.trackPositions((account, marketId) => engine.getPosition(account, marketId));

  const flusher = createIntervalWorker({
    name: "event-writer",
    intervalMs: env.EVENT_FLUSH_INTERVAL_MS,
    runOnce: () => writer.flush(),
    cleanup: async () => {
      await writer.flush();
      await connection?.close();
    },
    startupMetadata: { persistent: connection !== null },
  });

  if (env.REPLAY_PATH) {
    const lines = parseReplay(readFileSync(env.REPLAY_PATH, "utf8"));
    if (lines.isErr()) {
      await flusher.stop();
      throw new Error(`replay line ${String(lines.error.line)}: ${lines.error.message}`);
    }
    const summary = await runReplay({ house, clock, oracles }, lines.value);
    logger.info("Replay summary", { applied: summary.applied, rejected: summary.rejected, ...summary.rejections });
  }

  await house.idle();
  for (const market of config.value.markets) {
    const mark = engine.getMarkPrice(market.marketId);
    logger.info("Market state", {
      marketId: market.marketId,
      mark: mark.isOk() ? formatDecimal(mark.value) : mark.error.type,
      badDebt: formatDecimal(engine.getBadDebt(market.marketId)),
    });
  }

  await flusher.stop();
  const { events, snapshots } = writer.getBufferSizes();
  logger.info("Clearinghouse stopped", {
    unflushedEvents: events,
    unflushedSnapshots: snapshots,
    deadLetters: writer.getDeadLetterSize(),
  });
}

main().catch((error: unknown) => {
  logger.error("Fatal error", error);
  process.exit(1);
});
