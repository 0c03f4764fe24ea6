/**
 * Time-windowed event debouncing
 *
 * Inputs are aggregated while they keep arriving less than `intervalMs`
 * apart. A burst is flushed once the input has been quiet for `intervalMs`,
 * or, when `maxDelayMs` is set, at the latest `maxDelayMs` after the burst
 * started. Closing the input flushes whatever is pending and then closes
 * the output.
 */

import { Channel } from '../utils/channel.js';
import type { ReceiveChannel, SendChannel } from '../utils/channel.js';
import { systemScheduler } from '../utils/scheduler.js';
import type { Scheduler, TimerHandle } from '../utils/scheduler.js';
import { log } from '../utils/logger.js';
import {
  CountedAccumulator,
  GroupedAccumulator,
  LastAccumulator,
  SignalAccumulator
} from './accumulators.js';
import type { Accumulator, DebounceEvent } from './accumulators.js';

export interface DebounceOptions {
  /** Quiet time required before a burst is flushed */
  intervalMs: number;
  /** Hard bound on how long a burst may hold back output; 0 disables it */
  maxDelayMs?: number;
  scheduler?: Scheduler;
}

export interface DebounceStage<TIn, TOut> {
  input: SendChannel<TIn>;
  output: ReceiveChannel<TOut>;
  /** Settles once the output has been closed */
  done: Promise<void>;
}

function validateOptions(options: DebounceOptions): void {
  if (!Number.isFinite(options.intervalMs) || options.intervalMs <= 0) {
    throw new RangeError(`Debounce interval must be a positive number of milliseconds, got ${options.intervalMs}`);
  }

  const maxDelayMs = options.maxDelayMs ?? 0;
  if (!Number.isFinite(maxDelayMs) || maxDelayMs < 0) {
    throw new RangeError(`Debounce max delay must be >= 0, got ${maxDelayMs}`);
  }
}

/**
 * Single worker driving one accumulator. Its timers are private and all
 * state changes happen inside `run()`; timer callbacks only raise a flag
 * and wake the loop.
 */
class DebounceWorker<TIn, TOut> {
  private readonly intervalMs: number;
  private readonly maxDelayMs: number;
  private readonly scheduler: Scheduler;

  private intervalTimer: TimerHandle | null = null;
  private maxDelayTimer: TimerHandle | null = null;
  private intervalFired = false;
  private maxDelayFired = false;
  private wake: (() => void) | null = null;

  constructor(
    private readonly accumulator: Accumulator<TIn, TOut>,
    private readonly input: Channel<TIn>,
    private readonly output: Channel<TOut>,
    options: DebounceOptions
  ) {
    this.intervalMs = options.intervalMs;
    this.maxDelayMs = options.maxDelayMs ?? 0;
    this.scheduler = options.scheduler ?? systemScheduler;
  }

  async run(): Promise<void> {
    this.accumulator.start();

    try {
      for (;;) {
        if (this.maxDelayFired) {
          this.maxDelayFired = false;
          this.clearInterval();
          this.clearMaxDelay();
          await this.flush();
          continue;
        }

        if (this.intervalFired) {
          this.intervalFired = false;
          this.clearMaxDelay();
          await this.flush();
          continue;
        }

        const next = this.input.tryReceive();
        if (next === undefined) {
          await this.waitForWork();
          continue;
        }

        if (next.done) {
          break;
        }

        this.accept(next.value);
      }

      this.clearInterval();
      this.clearMaxDelay();
      await this.flush();
    } catch (error) {
      log.error('Debounce worker stopped unexpectedly', error);
    } finally {
      this.clearInterval();
      this.clearMaxDelay();
      this.output.close();
    }
  }

  private accept(value: TIn): void {
    this.clearInterval();
    this.accumulator.add(value);

    this.intervalTimer = this.scheduler.schedule(() => {
      this.intervalTimer = null;
      this.intervalFired = true;
      this.notify();
    }, this.intervalMs);

    if (this.maxDelayTimer === null && this.maxDelayMs > 0) {
      this.maxDelayTimer = this.scheduler.schedule(() => {
        this.maxDelayTimer = null;
        this.maxDelayFired = true;
        this.notify();
      }, this.maxDelayMs);
    }
  }

  private async flush(): Promise<void> {
    if (this.accumulator.isEmpty()) return;
    await this.output.send(this.accumulator.drain());
  }

  private clearInterval(): void {
    this.intervalTimer?.cancel();
    this.intervalTimer = null;
    this.intervalFired = false;
  }

  private clearMaxDelay(): void {
    this.maxDelayTimer?.cancel();
    this.maxDelayTimer = null;
    this.maxDelayFired = false;
  }

  private waitForWork(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.wake = resolve;
      void this.input.waitReadable().then(() => this.notify());
    });
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

/**
 * Build a debounce stage around an arbitrary accumulator
 */
export function createDebounce<TIn, TOut>(
  accumulator: Accumulator<TIn, TOut>,
  options: DebounceOptions
): DebounceStage<TIn, TOut> {
  validateOptions(options);

  const input = new Channel<TIn>();
  const output = new Channel<TOut>();
  const worker = new DebounceWorker(accumulator, input, output, options);

  return { input, output, done: worker.run() };
}

/**
 * One signal per flushed burst
 */
export function newDebounce(
  intervalMs: number,
  maxDelayMs = 0,
  scheduler?: Scheduler
): DebounceStage<DebounceEvent, DebounceEvent> {
  return createDebounce(new SignalAccumulator(), { intervalMs, maxDelayMs, scheduler });
}

/**
 * The ordered list of inputs of each burst
 */
export function newGroupedDebounce<T>(
  intervalMs: number,
  maxDelayMs = 0,
  scheduler?: Scheduler
): DebounceStage<T, T[]> {
  return createDebounce(new GroupedAccumulator<T>(), { intervalMs, maxDelayMs, scheduler });
}

/**
 * The most recent input of each burst
 */
export function newLastDebounce<T>(
  intervalMs: number,
  maxDelayMs = 0,
  scheduler?: Scheduler
): DebounceStage<T, T> {
  return createDebounce(new LastAccumulator<T>(), { intervalMs, maxDelayMs, scheduler });
}

/**
 * The number of inputs in each burst
 */
export function newCountedDebounce(
  intervalMs: number,
  maxDelayMs = 0,
  scheduler?: Scheduler
): DebounceStage<DebounceEvent, number> {
  return createDebounce(new CountedAccumulator(), { intervalMs, maxDelayMs, scheduler });
}
