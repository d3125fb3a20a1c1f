/**
 * Clearing House
 *
 * Single-writer actor in front of the clearing engine. Every submission runs
 * on one serial queue, so operations never interleave and execute in
 * submission order.
 */

import type { ClearingEngine, ClearingError } from "@perp-clearing/engine";
import { logger, SerialQueue, type Logger } from "@perp-clearing/utils";
import { ResultAsync, type Result } from "neverthrow";

export class ClearingHouse {
  private readonly queue = new SerialQueue();
  private readonly log: Logger;

  constructor(
    private readonly engine: ClearingEngine,
    log?: Logger,
  ) {
    this.log = log ?? logger.child({ component: "clearing-house" });
  }

  /**
   * Queue a mutation; resolves with its result once it has run
   */
  submit<T>(operation: string, run: (engine: ClearingEngine) => Result<T, ClearingError>): ResultAsync<T, ClearingError> {
    return new ResultAsync(
      this.queue.run(() => {
        const result = run(this.engine);
        this.log.debug("operation finished", {
          operation,
          ok: result.isOk(),
          queued: this.queue.size - 1,
        });
        return result;
      }),
    );
  }

  /**
   * Queue a read behind every mutation submitted before it
   */
  read<T>(run: (engine: ClearingEngine) => T): Promise<T> {
    return this.queue.run(() => run(this.engine));
  }

  get pending(): number {
    return this.queue.size;
  }

  idle(): Promise<void> {
    return this.queue.idle();
  }
}
