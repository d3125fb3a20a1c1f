/**
 * Interval worker
 *
 * Runs a task on a fixed interval, never overlapping iterations, and drains
 * the in-flight iteration plus an optional cleanup on stop or SIGINT/SIGTERM.
 */

import { logger } from "./logger";

export interface WorkerOptions {
  /**
   * Name of the worker (for logging)
   */
  name: string;

  /**
   * Interval in milliseconds between runs
   */
  intervalMs: number;

  /**
   * Function to run on each iteration
   */
  runOnce: () => Promise<void>;

  /**
   * Run after the last iteration on shutdown
   */
  cleanup?: () => Promise<void> | void;

  startupMetadata?: Record<string, unknown>;

  /**
   * Install SIGINT/SIGTERM handlers that stop the worker and exit (default true)
   */
  handleSignals?: boolean;

  /**
   * Upper bound on waiting for an in-flight iteration during stop
   */
  drainTimeoutMs?: number;
}

export interface IntervalWorker {
  /**
   * Stop scheduling, wait for the running iteration, then run cleanup.
   * Idempotent.
   */
  stop(): Promise<void>;
}

export function createIntervalWorker(options: WorkerOptions): IntervalWorker {
  const { name, intervalMs, runOnce, cleanup, startupMetadata } = options;
  const handleSignals = options.handleSignals ?? true;
  const drainTimeoutMs = options.drainTimeoutMs ?? 5000;
  const log = logger.child({ worker: name });

  log.info(`Starting ${name}`, startupMetadata ?? {});

  let running: Promise<void> | null = null;

  const tick = (): void => {
    // Skip a tick while the previous iteration is still going
    if (running) return;
    running = runOnce()
      .catch((error: unknown) => {
        log.error(`${name} iteration failed`, { error: error instanceof Error ? error.message : String(error) });
      })
      .finally(() => {
        running = null;
      });
  };

  tick();
  const interval = setInterval(tick, intervalMs);

  let stopping: Promise<void> | null = null;

  const stop = (): Promise<void> => {
    stopping ??= (async () => {
      log.info(`Shutting down ${name}...`);
      clearInterval(interval);

      if (running) {
        let timer: ReturnType<typeof setTimeout> | undefined;
        await Promise.race([
          running,
          new Promise<void>(resolve => {
            timer = setTimeout(resolve, drainTimeoutMs);
          }),
        ]);
        clearTimeout(timer);
      }

      if (cleanup) {
        await cleanup();
      }

      log.info(`${name} shutdown complete`);
    })();
    return stopping;
  };

  if (handleSignals) {
    const onSignal = (): void => {
      stop().then(
        () => process.exit(0),
        (error: unknown) => {
          log.error(`${name} cleanup failed`, { error: error instanceof Error ? error.message : String(error) });
          process.exit(1);
        },
      );
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);
  }

  log.info(`${name} running`);
  return { stop };
}
