import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs/promises';
import { ConfigLoader } from '../reload/ConfigLoader.js';
import type { ConfigLoaderOptions } from '../reload/ConfigLoader.js';
import { ConfigParseError, ConfigValidationError } from '../utils/error-utils.js';
import { LogLevel, logger } from '../utils/logger.js';
import { FakeBackend } from './helpers/fake-backend.js';
import { createTempTree } from './helpers/temp-tree.js';

logger.setLevel(LogLevel.SILENT);

interface AppConfig extends Record<string, unknown> {
  port: number;
  host: string;
  features: { cache: boolean };
}

const DEFAULTS: AppConfig = { port: 8080, host: 'localhost', features: { cache: false } };

function fakeWatching(backend: FakeBackend, options: ConfigLoaderOptions<AppConfig> = {}): ConfigLoaderOptions<AppConfig> {
  return {
    debounceIntervalMs: 0,
    ...options,
    watcher: { backend: () => backend }
  };
}

function nextReload(loader: ConfigLoader<AppConfig>): Promise<AppConfig> {
  return new Promise((resolve) => {
    const unsubscribe = loader.onReload((config) => {
      unsubscribe();
      resolve(config);
    });
  });
}

test('ConfigLoader overlays the file on the defaults', async (t) => {
  const tree = await createTempTree({ 'app.yaml': 'port: 9000\nfeatures:\n  cache: true\n' });
  t.after(() => tree.cleanup());

  const loader = await ConfigLoader.create(tree.resolve('app.yaml'), DEFAULTS, fakeWatching(new FakeBackend()));
  t.after(() => loader.close());

  assert.deepEqual(loader.get(), { port: 9000, host: 'localhost', features: { cache: true } });
  assert.deepEqual(loader.getDefaults(), DEFAULTS);
});

test('ConfigLoader falls back to the defaults when the file is missing', async (t) => {
  const tree = await createTempTree();
  t.after(() => tree.cleanup());
  const errors: Error[] = [];

  const loader = await ConfigLoader.create(tree.resolve('app.yaml'), DEFAULTS, fakeWatching(new FakeBackend(), {
    errorHandlers: [(error) => errors.push(error)]
  }));
  t.after(() => loader.close());

  assert.deepEqual(loader.get(), DEFAULTS);
  assert.notStrictEqual(loader.get(), DEFAULTS);
  assert.equal(errors.length, 1);
  assert.match(errors[0]?.message ?? '', /ENOENT/);
});

test('ConfigLoader reloads when the watcher reports a change', async (t) => {
  const tree = await createTempTree({ 'app.yaml': 'port: 9000\n' });
  t.after(() => tree.cleanup());
  const backend = new FakeBackend();
  const target = tree.resolve('app.yaml');

  const loader = await ConfigLoader.create(target, DEFAULTS, fakeWatching(backend));
  t.after(() => loader.close());
  await loader.ready();

  const reloaded = nextReload(loader);
  await fs.writeFile(target, 'port: 9100\n');
  backend.latest().emit('modify', target);

  assert.equal((await reloaded).port, 9100);
  assert.equal(loader.get().port, 9100);
});

test('ConfigLoader coalesces a burst of changes into one reload', async (t) => {
  const tree = await createTempTree({ 'app.json': '{"port": 1}' });
  t.after(() => tree.cleanup());
  const backend = new FakeBackend();
  const target = tree.resolve('app.json');
  let reloads = 0;

  const loader = await ConfigLoader.create(target, DEFAULTS, {
    debounceIntervalMs: 30,
    debounceMaxDelayMs: 0,
    reloadHandlers: [() => reloads++],
    watcher: { backend: () => backend }
  });
  t.after(() => loader.close());
  await loader.ready();

  const reloaded = nextReload(loader);
  for (let port = 2; port <= 4; port++) {
    await fs.writeFile(target, JSON.stringify({ port }));
    backend.latest().emit('modify', target);
  }

  assert.equal((await reloaded).port, 4);
  assert.equal(reloads, 1);
});

test('ConfigLoader reverts to the defaults on a broken file', async (t) => {
  const tree = await createTempTree({ 'app.yaml': 'port: 9000\n' });
  t.after(() => tree.cleanup());
  const errors: Error[] = [];
  const target = tree.resolve('app.yaml');

  const loader = await ConfigLoader.create(target, DEFAULTS, fakeWatching(new FakeBackend(), {
    errorHandlers: [(error) => errors.push(error)]
  }));
  t.after(() => loader.close());

  await fs.writeFile(target, 'port: [9000\n');
  await loader.reload();

  assert.deepEqual(loader.get(), DEFAULTS);
  assert.ok(errors[0] instanceof ConfigParseError);
});

test('ConfigLoader keeps the last valid config when asked to', async (t) => {
  const tree = await createTempTree({ 'app.yaml': 'port: 9000\n' });
  t.after(() => tree.cleanup());
  const target = tree.resolve('app.yaml');
  let reloads = 0;

  const loader = await ConfigLoader.create(target, DEFAULTS, fakeWatching(new FakeBackend(), {
    keepLastValid: true,
    reloadHandlers: [() => reloads++]
  }));
  t.after(() => loader.close());

  await fs.writeFile(target, '- not\n- a mapping\n');
  await loader.reload();

  assert.equal(loader.get().port, 9000);
  assert.equal(reloads, 0);
});

test('ConfigLoader strict parsing rejects unknown fields', async (t) => {
  const tree = await createTempTree({ 'app.yaml': 'port: 9000\nportt: 1\n' });
  t.after(() => tree.cleanup());
  const errors: Error[] = [];

  const loader = await ConfigLoader.create(tree.resolve('app.yaml'), DEFAULTS, fakeWatching(new FakeBackend(), {
    strictParsing: true,
    errorHandlers: [(error) => errors.push(error)]
  }));
  t.after(() => loader.close());

  assert.deepEqual(loader.get(), DEFAULTS);
  assert.match(errors[0]?.message ?? '', /unknown field "portt"$/);
});

test('ConfigLoader validation handlers may replace or reject a config', async (t) => {
  const tree = await createTempTree({ 'app.yaml': 'port: 9000\nhost: Example.COM\n' });
  t.after(() => tree.cleanup());
  const target = tree.resolve('app.yaml');
  const errors: Error[] = [];

  const loader = await ConfigLoader.create(target, DEFAULTS, fakeWatching(new FakeBackend(), {
    keepLastValid: true,
    errorHandlers: [(error) => errors.push(error)],
    validationHandlers: [
      (config) => ({ ...config, host: config.host.toLowerCase() }),
      (config) => {
        if (config.port < 1024) {
          throw new Error('port must be unprivileged');
        }
        return undefined;
      }
    ]
  }));
  t.after(() => loader.close());

  assert.equal(loader.get().host, 'example.com');

  await fs.writeFile(target, 'port: 80\n');
  await loader.reload();

  assert.equal(loader.get().port, 9000);
  assert.ok(errors[0] instanceof ConfigValidationError);
  assert.equal(errors[0].message, 'Config validation failed: port must be unprivileged');
});

test('ConfigLoader reports reload handler failures and keeps notifying', async (t) => {
  const tree = await createTempTree({ 'app.yaml': 'port: 9000\n' });
  t.after(() => tree.cleanup());
  const errors: Error[] = [];
  const seen: number[] = [];

  const loader = await ConfigLoader.create(tree.resolve('app.yaml'), DEFAULTS, fakeWatching(new FakeBackend(), {
    errorHandlers: [(error) => errors.push(error)]
  }));
  t.after(() => loader.close());

  loader.onReload(() => {
    throw new Error('handler failed');
  });
  const unsubscribe = loader.onReload((config) => seen.push(config.port));

  await loader.reload();
  unsubscribe();
  await loader.reload();

  assert.deepEqual(seen, [9000]);
  assert.deepEqual(errors.map((error) => error.message), ['handler failed', 'handler failed']);
});

test('ConfigLoader close drops pending changes without reloading', async (t) => {
  const tree = await createTempTree({ 'app.yaml': 'port: 9000\n' });
  t.after(() => tree.cleanup());
  const backend = new FakeBackend();
  const target = tree.resolve('app.yaml');
  let reloads = 0;

  const loader = await ConfigLoader.create(target, DEFAULTS, {
    debounceIntervalMs: 60_000,
    reloadHandlers: [() => reloads++],
    watcher: { backend: () => backend }
  });
  await loader.ready();

  await fs.writeFile(target, 'port: 9100\n');
  backend.latest().emit('modify', target);
  await loader.close();

  assert.equal(reloads, 0);
  assert.equal(loader.get().port, 9000);
  assert.equal(backend.latest().closed, true);
});
