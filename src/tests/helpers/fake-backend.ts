import type { RawEventKind, WatchBackend, WatchSink, WatchSubscription } from '../../watch/types.js';
import { settle } from './manual-scheduler.js';

export class FakeSubscription implements WatchSubscription {
  readonly ready: Promise<void>;
  closed = false;

  constructor(
    readonly directories: string[],
    private readonly accept: (path: string) => boolean,
    private readonly sink: WatchSink,
    failure: Error | null
  ) {
    this.ready = failure ? Promise.reject(failure) : Promise.resolve();
  }

  /**
   * Deliver a raw notification, subject to the watch filter
   */
  emit(kind: RawEventKind, filePath: string): boolean {
    if (!this.accept(filePath)) return false;
    this.sink.event({ kind, path: filePath });
    return true;
  }

  fail(error: Error): void {
    this.sink.error(error);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * In-process WatchBackend. Tests push raw events by hand.
 */
export class FakeBackend implements WatchBackend {
  readonly subscriptions: FakeSubscription[] = [];
  /** Number of upcoming registrations whose `ready` rejects */
  failures = 0;

  watch(directories: string[], accept: (path: string) => boolean, sink: WatchSink): WatchSubscription {
    const failure = this.failures > 0 ? new Error('watch limit reached') : null;
    if (failure) this.failures--;

    const subscription = new FakeSubscription(directories, accept, sink, failure);
    this.subscriptions.push(subscription);
    return subscription;
  }

  latest(): FakeSubscription {
    const subscription = this.subscriptions[this.subscriptions.length - 1];
    if (!subscription) {
      throw new Error('no subscription registered yet');
    }
    return subscription;
  }

  async waitForSubscriptions(count: number, maxTurns = 1000): Promise<void> {
    for (let turn = 0; turn < maxTurns; turn++) {
      if (this.subscriptions.length >= count) return;
      await settle();
    }
    throw new Error(`expected ${count} subscriptions, got ${this.subscriptions.length}`);
  }
}
