/**
 * Location watching - existence and modification events for a path,
 * whether or not anything exists there yet.
 */

export { LocationWatcher, openLocationWatcher } from './LocationWatcher.js';
export type { LocationWatcherOptions } from './LocationWatcher.js';
export { ChokidarBackend } from './chokidar-backend.js';
export {
  normalizeTarget,
  resolveLocation,
  statIdentity,
  sameFile,
  watchRoots,
  isOnPathTo,
  createWatchFilter
} from './location.js';
export { WatchEventType } from './types.js';
export type {
  FileIdentity,
  ResolvedLocation,
  RawEventKind,
  RawWatchEvent,
  WatchBackend,
  WatchBackendFactory,
  WatchSink,
  WatchSubscription
} from './types.js';
