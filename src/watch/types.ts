/** Transitions reported for a watched location. */
export enum WatchEventType {
  Created = 'created',
  Updated = 'updated',
  Deleted = 'deleted',
}

/**
 * Metadata snapshot of whatever currently sits at a path. Two snapshots
 * denote the same file when `dev` and `ino` match.
 */
export interface FileIdentity {
  path: string;
  dev: number;
  ino: number;
  size: number;
  mtimeMs: number;
  isDirectory: boolean;
}

/**
 * Where the watch is anchored for the current tree shape.
 */
export interface ResolvedLocation {
  /** Nearest existing ancestor directory of the target */
  anchorDir: string;
  /** Path directly below `anchorDir` on the way to the target, or the target itself */
  expectedChild: string;
}

export type RawEventKind = 'create' | 'modify' | 'remove';

export interface RawWatchEvent {
  kind: RawEventKind;
  path: string;
}

/**
 * Receives notifications from a backend subscription.
 */
export interface WatchSink {
  event(event: RawWatchEvent): void;
  error(error: unknown): void;
}

export interface WatchSubscription {
  /** Resolves once every path is being watched, rejects if registration failed */
  ready: Promise<void>;
  close(): Promise<void>;
}

/**
 * Filesystem notification facility. Each call to `watch()` registers the
 * given directories non-recursively; `accept` decides which entries below
 * them are reported at all.
 */
export interface WatchBackend {
  watch(directories: string[], accept: (path: string) => boolean, sink: WatchSink): WatchSubscription;
}

export type WatchBackendFactory = () => WatchBackend;
