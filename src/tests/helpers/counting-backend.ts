import { ChokidarBackend } from '../../watch/chokidar-backend.js';
import type { WatchBackend, WatchSink, WatchSubscription } from '../../watch/types.js';

/**
 * Real chokidar backend that counts how often a watch is registered
 */
export class CountingBackend implements WatchBackend {
  registrations = 0;
  private readonly inner = new ChokidarBackend();

  watch(directories: string[], accept: (path: string) => boolean, sink: WatchSink): WatchSubscription {
    this.registrations++;
    return this.inner.watch(directories, accept, sink);
  }
}
