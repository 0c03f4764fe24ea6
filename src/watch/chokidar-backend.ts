import chokidar from 'chokidar';
import type { FSWatcher } from 'chokidar';
import type { RawEventKind, WatchBackend, WatchSink, WatchSubscription } from './types.js';

const EVENT_KINDS: ReadonlyArray<[string, RawEventKind]> = [
  ['add', 'create'],
  ['addDir', 'create'],
  ['change', 'modify'],
  ['unlink', 'remove'],
  ['unlinkDir', 'remove']
];

/**
 * Resolves once `watcher` has scanned its directory. Errors before that
 * reject; later ones go to the sink.
 */
function whenReady(watcher: FSWatcher, sink: WatchSink): Promise<void> {
  let registered = false;

  return new Promise<void>((resolve, reject) => {
    watcher.once('ready', () => {
      registered = true;
      resolve();
    });
    watcher.on('error', (error: unknown) => {
      if (registered) {
        sink.error(error);
      } else {
        reject(error);
      }
    });
  });
}

/**
 * WatchBackend on top of chokidar. Every directory gets its own FSWatcher at
 * depth 0: one watcher over nested roots reports removals for paths that
 * still exist. Entries rejected by `accept` are ignored by chokidar altogether.
 */
export class ChokidarBackend implements WatchBackend {
  watch(directories: string[], accept: (path: string) => boolean, sink: WatchSink): WatchSubscription {
    const watchers = directories.map((directory) =>
      chokidar.watch(directory, {
        depth: 0,
        ignoreInitial: true,
        persistent: true,
        ignored: (candidate: string) => !accept(candidate)
      })
    );

    for (const watcher of watchers) {
      for (const [eventName, kind] of EVENT_KINDS) {
        watcher.on(eventName, (filePath: string) => {
          sink.event({ kind, path: filePath });
        });
      }
    }

    const ready = Promise.all(watchers.map((watcher) => whenReady(watcher, sink))).then(() => undefined);

    return {
      ready,
      close: async () => {
        await Promise.all(watchers.map((watcher) => watcher.close()));
      }
    };
  }
}
