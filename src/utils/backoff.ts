import { setTimeout as delay } from 'timers/promises';
import { WATCHER_CONSTANTS } from '../config/constants.js';

/** Configuration for the backoff helper. */
export interface BackoffOptions {
  /** Delay before the first retry. @default 10 */
  initialDelayMs?: number;
  /** Multiplier applied after each consecutive failure. @default 2 */
  factor?: number;
  /** Upper bound for a single delay. @default 1000 */
  maxDelayMs?: number;
}

/**
 * Bounded exponential backoff for recovery loops.
 *
 * Each call to `next()` returns the delay for the current consecutive
 * failure and grows the following one, capped at `maxDelayMs`. `reset()`
 * is called once the guarded operation succeeds again.
 */
export class Backoff {
  private readonly initialDelayMs: number;
  private readonly factor: number;
  private readonly maxDelayMs: number;
  private failures = 0;

  constructor(options: BackoffOptions = {}) {
    this.initialDelayMs = Math.max(0, options.initialDelayMs ?? WATCHER_CONSTANTS.RETRY_INITIAL_DELAY_MS);
    this.factor = Math.max(1, options.factor ?? WATCHER_CONSTANTS.RETRY_BACKOFF_FACTOR);
    this.maxDelayMs = Math.max(this.initialDelayMs, options.maxDelayMs ?? WATCHER_CONSTANTS.RETRY_MAX_DELAY_MS);
  }

  next(): number {
    const delayMs = Math.min(this.initialDelayMs * this.factor ** this.failures, this.maxDelayMs);
    this.failures++;
    return delayMs;
  }

  reset(): void {
    this.failures = 0;
  }

  get attempts(): number {
    return this.failures;
  }

  /**
   * Sleep for the next delay. Returns false if the signal aborted the wait.
   */
  async wait(signal?: AbortSignal): Promise<boolean> {
    const delayMs = this.next();
    if (signal?.aborted) return false;

    try {
      await delay(delayMs, undefined, { signal });
      return true;
    } catch (error) {
      if (signal?.aborted) return false;
      throw error;
    }
  }
}
