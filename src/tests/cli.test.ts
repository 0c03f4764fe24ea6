import test from 'node:test';
import assert from 'node:assert/strict';
import { createProgram } from '../cli/index.js';
import { describeBurst, describeEvent } from '../cli/commands/watch-cmd.js';
import { WatchEventType } from '../watch/types.js';

const NOW = new Date('2024-01-02T03:04:05.000Z');

test('program registers the watch and config commands', () => {
  const program = createProgram();
  assert.equal(program.name(), 'pathwatch');
  assert.deepEqual(program.commands.map((command) => command.name()), ['watch', 'config']);
});

test('describeEvent includes the size of regular files', () => {
  const info = { path: '/etc/app.yaml', dev: 1, ino: 2, size: 12, mtimeMs: 0, isDirectory: false };

  assert.equal(
    describeEvent(WatchEventType.Updated, '/etc/app.yaml', info, NOW),
    '2024-01-02T03:04:05.000Z updated /etc/app.yaml (12 bytes)'
  );
  assert.equal(
    describeEvent(WatchEventType.Deleted, '/etc/app.yaml', null, NOW),
    '2024-01-02T03:04:05.000Z deleted /etc/app.yaml'
  );
});

test('describeBurst lists the events of a burst in order', () => {
  assert.equal(
    describeBurst([WatchEventType.Created, WatchEventType.Updated], '/etc/app.yaml', NOW),
    '2024-01-02T03:04:05.000Z 2 events at /etc/app.yaml: created, updated'
  );
  assert.equal(
    describeBurst([WatchEventType.Deleted], '/etc/app.yaml', NOW),
    '2024-01-02T03:04:05.000Z 1 event at /etc/app.yaml: deleted'
  );
});
