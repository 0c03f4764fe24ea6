import test from 'node:test';
import assert from 'node:assert/strict';
import { Backoff } from '../utils/backoff.js';

test('Backoff grows exponentially up to the cap', () => {
  const backoff = new Backoff({ initialDelayMs: 10, factor: 2, maxDelayMs: 100 });
  const delays = Array.from({ length: 6 }, () => backoff.next());

  assert.deepEqual(delays, [10, 20, 40, 80, 100, 100]);
  assert.equal(backoff.attempts, 6);
});

test('Backoff starts over after reset', () => {
  const backoff = new Backoff({ initialDelayMs: 5, factor: 3, maxDelayMs: 1000 });
  backoff.next();
  backoff.next();
  backoff.reset();

  assert.equal(backoff.attempts, 0);
  assert.equal(backoff.next(), 5);
});

test('Backoff never caps below the initial delay', () => {
  const backoff = new Backoff({ initialDelayMs: 50, maxDelayMs: 10 });
  assert.equal(backoff.next(), 50);
  assert.equal(backoff.next(), 50);
});

test('Backoff wait sleeps for the next delay', async () => {
  const backoff = new Backoff({ initialDelayMs: 1, factor: 2, maxDelayMs: 4 });
  assert.equal(await backoff.wait(), true);
  assert.equal(backoff.attempts, 1);
});

test('Backoff wait returns false once the signal aborts', async () => {
  const backoff = new Backoff({ initialDelayMs: 60_000 });
  const controller = new AbortController();

  const waiting = backoff.wait(controller.signal);
  controller.abort();
  assert.equal(await waiting, false);

  assert.equal(await backoff.wait(controller.signal), false);
});
