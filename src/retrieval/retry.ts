import { setTimeout as sleep } from "timers/promises";
import { FatalRunError, RetriesExhaustedError } from "../core/errors.js";
import { errorMessage } from "../core/json.js";
import type { RunLog } from "../logging/runLog.js";

export interface RetryOptions {
  maxAttempts: number;
  /** Pause between attempts; 0 retries immediately. */
  delayMs: number;
}

/**
 * Bounded retry around one remote call. Every failure kind is retried the same
 * way; exhausting the attempts ends the run with RetriesExhaustedError, so
 * callers only ever see a value.
 */
export class RetryExecutor {
  constructor(
    private readonly opts: RetryOptions,
    private readonly log: RunLog
  ) {
    if (!Number.isInteger(opts.maxAttempts) || opts.maxAttempts < 1) {
      throw new Error(`maxAttempts must be an integer >= 1 (got ${opts.maxAttempts})`);
    }
  }

  get maxAttempts(): number {
    return this.opts.maxAttempts;
  }

  async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    let lastError: unknown = null;
    for (let attempt = 1; attempt <= this.opts.maxAttempts; attempt++) {
      try {
        return await fn();
      } catch (err) {
        // A nested run already failed for good; retrying it would multiply attempts.
        if (err instanceof FatalRunError) throw err;
        lastError = err;
        await this.log.warn("remote.retry", `${operation} failed (${attempt}/${this.opts.maxAttempts}): ${errorMessage(err)}`, {
          operation,
          attempt,
          max_attempts: this.opts.maxAttempts,
          error: errorMessage(err)
        });
        if (this.opts.delayMs > 0 && attempt < this.opts.maxAttempts) {
          await sleep(this.opts.delayMs);
        }
      }
    }
    await this.log.error("remote.exhausted", `too many failures for ${operation} (exiting)`, { operation });
    throw new RetriesExhaustedError(operation, this.opts.maxAttempts, lastError);
  }
}
