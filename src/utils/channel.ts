/**
 * Async FIFO channel for handing values between independent workers
 *
 * A channel with capacity 0 is a rendezvous: `send()` settles only once a
 * receiver has taken the value, so a slow consumer holds the producer back.
 * A positive capacity lets that many values wait in the buffer first.
 */

import { ChannelClosedError } from './error-utils.js';

/**
 * Write side of a channel
 */
export interface SendChannel<T> {
  send(value: T): Promise<void>;
  trySend(value: T): boolean;
  close(): void;
  isClosed(): boolean;
}

/**
 * Read side of a channel
 */
export interface ReceiveChannel<T> extends AsyncIterable<T> {
  receive(): Promise<IteratorResult<T, undefined>>;
  tryReceive(): IteratorResult<T, undefined> | undefined;
  waitReadable(): Promise<void>;
  isClosed(): boolean;
}

interface PendingSend<T> {
  value: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

export class Channel<T> implements SendChannel<T>, ReceiveChannel<T> {
  private buffer: T[] = [];
  private receivers: Array<(result: IteratorResult<T, undefined>) => void> = [];
  private senders: Array<PendingSend<T>> = [];
  private readableWaiters: Array<() => void> = [];
  private closed = false;

  constructor(private readonly capacity = 0) {
    if (!(capacity >= 0)) {
      throw new RangeError(`Channel capacity must be >= 0, got ${capacity}`);
    }
  }

  /**
   * Send a value, waiting until it is accepted by a receiver or the buffer.
   * Rejects with ChannelClosedError if the channel is (or gets) closed first.
   */
  send(value: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ChannelClosedError());
    }

    if (this.trySend(value)) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.senders.push({ value, resolve, reject });
      this.notifyReadable();
    });
  }

  /**
   * Non-blocking send. Returns false when the value could not be accepted
   * right away (closed channel, full buffer and no waiting receiver).
   */
  trySend(value: T): boolean {
    if (this.closed) {
      return false;
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ done: false, value });
      return true;
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      this.notifyReadable();
      return true;
    }

    return false;
  }

  /**
   * Non-blocking receive. Undefined means nothing is available yet.
   */
  tryReceive(): IteratorResult<T, undefined> | undefined {
    if (this.buffer.length > 0) {
      const value = this.buffer[0];
      this.buffer.shift();

      // A blocked sender takes the freed buffer slot
      const sender = this.senders.shift();
      if (sender) {
        this.buffer.push(sender.value);
        sender.resolve();
      }
      return { done: false, value };
    }

    const sender = this.senders.shift();
    if (sender) {
      sender.resolve();
      return { done: false, value: sender.value };
    }

    if (this.closed) {
      return DONE;
    }

    return undefined;
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    const ready = this.tryReceive();
    if (ready) {
      return Promise.resolve(ready);
    }

    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /**
   * Resolves once `tryReceive()` would return a result, without consuming it.
   */
  waitReadable(): Promise<void> {
    if (this.buffer.length > 0 || this.senders.length > 0 || this.closed) {
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.readableWaiters.push(resolve);
    });
  }

  /**
   * Close the channel. Buffered values stay readable; waiting receivers see
   * the end of the stream and blocked senders are rejected.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const receiver of this.receivers) {
      receiver(DONE);
    }
    this.receivers = [];

    for (const sender of this.senders) {
      sender.reject(new ChannelClosedError());
    }
    this.senders = [];

    this.notifyReadable();
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Number of values waiting in the buffer
   */
  get size(): number {
    return this.buffer.length;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      const next = await this.receive();
      if (next.done) return;
      yield next.value;
    }
  }

  private notifyReadable(): void {
    const waiters = this.readableWaiters;
    this.readableWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}

/**
 * Collect every value until the channel closes
 */
export async function drainChannel<T>(channel: ReceiveChannel<T>): Promise<T[]> {
  const values: T[] = [];
  for await (const value of channel) {
    values.push(value);
  }
  return values;
}
