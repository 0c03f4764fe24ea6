import test from 'node:test';
import assert from 'node:assert/strict';
import { Channel, drainChannel } from '../utils/channel.js';
import { ChannelClosedError } from '../utils/error-utils.js';
import { settle } from './helpers/manual-scheduler.js';

test('Channel with capacity 0 holds the sender until a receiver takes the value', async () => {
  const channel = new Channel<string>();
  let delivered = false;

  const sending = channel.send('a').then(() => {
    delivered = true;
  });
  await settle();
  assert.equal(delivered, false);

  const received = await channel.receive();
  await sending;

  assert.deepEqual(received, { done: false, value: 'a' });
  assert.equal(delivered, true);
});

test('Channel trySend fills the buffer up to its capacity', () => {
  const channel = new Channel<number>(2);

  assert.equal(channel.trySend(1), true);
  assert.equal(channel.trySend(2), true);
  assert.equal(channel.trySend(3), false);
  assert.equal(channel.size, 2);
});

test('Channel trySend hands the value straight to a waiting receiver', async () => {
  const channel = new Channel<number>();
  const receiving = channel.receive();

  assert.equal(channel.trySend(7), true);
  assert.deepEqual(await receiving, { done: false, value: 7 });
});

test('Channel tryReceive refills the buffer from a blocked sender', async () => {
  const channel = new Channel<number>(1);
  await channel.send(1);
  const blocked = channel.send(2);

  assert.deepEqual(channel.tryReceive(), { done: false, value: 1 });
  await blocked;
  assert.equal(channel.size, 1);
  assert.deepEqual(channel.tryReceive(), { done: false, value: 2 });
  assert.equal(channel.tryReceive(), undefined);
});

test('Channel keeps buffered values readable after close', async () => {
  const channel = new Channel<string>(3);
  channel.trySend('x');
  channel.trySend('y');
  channel.close();

  assert.deepEqual(await drainChannel(channel), ['x', 'y']);
  assert.deepEqual(channel.tryReceive(), { done: true, value: undefined });
});

test('Channel close ends waiting receivers and rejects blocked senders', async () => {
  const receiverSide = new Channel<number>();
  const receiving = receiverSide.receive();
  receiverSide.close();
  assert.deepEqual(await receiving, { done: true, value: undefined });

  const senderSide = new Channel<number>();
  const sending = senderSide.send(1);
  senderSide.close();
  await assert.rejects(sending, ChannelClosedError);
});

test('Channel send on a closed channel rejects', async () => {
  const channel = new Channel<number>(5);
  channel.close();
  channel.close();

  assert.equal(channel.isClosed(), true);
  assert.equal(channel.trySend(1), false);
  await assert.rejects(channel.send(1), { name: 'ChannelClosedError', message: 'send on closed channel' });
});

test('Channel waitReadable resolves once a sender arrives', async () => {
  const channel = new Channel<number>();
  let readable = false;

  const waiting = channel.waitReadable().then(() => {
    readable = true;
  });
  await settle();
  assert.equal(readable, false);

  const sending = channel.send(4);
  await waiting;
  assert.equal(readable, true);
  assert.deepEqual(channel.tryReceive(), { done: false, value: 4 });
  await sending;
});

test('Channel iterates values in send order', async () => {
  const channel = new Channel<number>();

  const producer = (async () => {
    for (let i = 0; i < 5; i++) {
      await channel.send(i);
    }
    channel.close();
  })();

  assert.deepEqual(await drainChannel(channel), [0, 1, 2, 3, 4]);
  await producer;
});

test('Channel rejects a negative capacity', () => {
  assert.throws(() => new Channel<number>(-1), RangeError);
  assert.doesNotThrow(() => new Channel<number>(Number.POSITIVE_INFINITY));
});
