/**
 * Aggregation policies for the debounce stage. The worker only ever calls
 * these four methods; the shape of what comes out is entirely up to them.
 */
export interface Accumulator<TIn, TOut> {
  /** Reset to the empty state */
  start(): void;
  add(value: TIn): void;
  isEmpty(): boolean;
  /** Return the aggregate and reset */
  drain(): TOut;
}

/** Unit value fed into signal and counted stages */
export const DEBOUNCE_EVENT: unique symbol = Symbol('pathwatch.debounce.event');
export type DebounceEvent = typeof DEBOUNCE_EVENT;

export class SignalAccumulator implements Accumulator<DebounceEvent, DebounceEvent> {
  private pending = false;

  start(): void {
    this.pending = false;
  }

  add(): void {
    this.pending = true;
  }

  isEmpty(): boolean {
    return !this.pending;
  }

  drain(): DebounceEvent {
    this.start();
    return DEBOUNCE_EVENT;
  }
}

export class GroupedAccumulator<T> implements Accumulator<T, T[]> {
  private items: T[] = [];

  start(): void {
    this.items = [];
  }

  add(value: T): void {
    this.items.push(value);
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  drain(): T[] {
    const items = this.items;
    this.start();
    return items;
  }
}

export class LastAccumulator<T> implements Accumulator<T, T> {
  // Boxed so that undefined and null remain valid inputs
  private last: { value: T } | null = null;

  start(): void {
    this.last = null;
  }

  add(value: T): void {
    this.last = { value };
  }

  isEmpty(): boolean {
    return this.last === null;
  }

  drain(): T {
    const last = this.last;
    if (last === null) {
      throw new Error('LastAccumulator drained while empty');
    }
    this.start();
    return last.value;
  }
}

export class CountedAccumulator implements Accumulator<DebounceEvent, number> {
  private count = 0;

  start(): void {
    this.count = 0;
  }

  add(): void {
    this.count++;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  drain(): number {
    const count = this.count;
    this.start();
    return count;
  }
}
