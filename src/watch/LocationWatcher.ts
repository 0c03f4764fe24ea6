import path from 'path';
import { WATCHER_CONSTANTS } from '../config/constants.js';
import { Backoff } from '../utils/backoff.js';
import type { BackoffOptions } from '../utils/backoff.js';
import { Channel } from '../utils/channel.js';
import type { ReceiveChannel } from '../utils/channel.js';
import { SubsystemError, getErrorMessage } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';
import { ChokidarBackend } from './chokidar-backend.js';
import {
  createWatchFilter,
  isOnPathTo,
  normalizeTarget,
  resolveLocation,
  sameFile,
  statIdentity,
  statIdentitySync,
  watchRoots
} from './location.js';
import { WatchEventType } from './types.js';
import type {
  FileIdentity,
  RawWatchEvent,
  ResolvedLocation,
  WatchBackend,
  WatchBackendFactory,
  WatchSubscription
} from './types.js';

export interface LocationWatcherOptions {
  /** Aborting the signal closes the watcher */
  signal?: AbortSignal;
  /** Defaults to chokidar */
  backend?: WatchBackendFactory;
  backoff?: BackoffOptions;
  /** Capacity of the event stream */
  bufferSize?: number;
  /** Raw notifications queued before the watch is treated as overflowed */
  queueSize?: number;
}

type Message =
  | { type: 'event'; generation: number; event: RawWatchEvent }
  | { type: 'error'; generation: number; error: unknown }
  | { type: 'cancel' };

/**
 * Watches a filesystem location rather than a file.
 *
 * The target does not need to exist. The watcher anchors on the nearest
 * existing ancestor directory and also watches every directory above it,
 * so the target coming into place (created, or moved in along with a parent)
 * and going away (deleted, or any ancestor removed or renamed) are both
 * observed. Each transition is reported once on `events()`.
 *
 * Usage:
 * ```ts
 * const watcher = openLocationWatcher('config/app.yaml');
 * for await (const event of watcher.events()) {
 *   console.log(event, watcher.currentInfo());
 * }
 * ```
 */
export class LocationWatcher {
  readonly target: string;

  private readonly backend: WatchBackend;
  private readonly backoff: Backoff;
  private readonly controller = new AbortController();
  private readonly eventChannel: Channel<WatchEventType>;
  private readonly mailbox: Channel<Message>;
  private readonly queueSize: number;
  private readonly cancelled: Promise<void>;
  private readonly stopped: Promise<void>;
  private readonly firstRegistration: Promise<void>;
  private markRegistered: () => void = () => undefined;
  private info: FileIdentity | null;
  private generation = 0;
  private overflowed = false;

  constructor(target: string, options: LocationWatcherOptions = {}) {
    this.target = normalizeTarget(target);

    try {
      this.backend = (options.backend ?? (() => new ChokidarBackend()))();
    } catch (error) {
      throw new SubsystemError(`Failed to initialize file watching: ${getErrorMessage(error)}`, error);
    }

    this.backoff = new Backoff(options.backoff);
    this.eventChannel = new Channel<WatchEventType>(options.bufferSize ?? WATCHER_CONSTANTS.EVENT_BUFFER_SIZE);
    this.queueSize = Math.max(1, options.queueSize ?? WATCHER_CONSTANTS.RAW_QUEUE_SIZE);
    // One slot past the queue size so a cancel message always fits
    this.mailbox = new Channel<Message>(this.queueSize + 1);
    this.info = statIdentitySync(this.target);

    const signal = this.controller.signal;
    this.cancelled = new Promise<void>((resolve) => {
      signal.addEventListener('abort', () => {
        this.mailbox.trySend({ type: 'cancel' });
        resolve();
      }, { once: true });
    });

    this.firstRegistration = new Promise<void>((resolve) => {
      this.markRegistered = resolve;
    });

    if (options.signal) {
      const external = options.signal;
      if (external.aborted) {
        this.controller.abort();
      } else {
        external.addEventListener('abort', () => this.controller.abort(), { once: true });
      }
    }

    this.stopped = this.run();
  }

  /**
   * Stream of Created / Updated / Deleted events, closed once the watcher stops
   */
  events(): ReceiveChannel<WatchEventType> {
    return this.eventChannel;
  }

  /**
   * Metadata of the file at the target, or null while it is absent
   */
  currentInfo(): FileIdentity | null {
    return this.info;
  }

  /**
   * Resolves once the first watch is registered (or the watcher is closed)
   */
  async ready(): Promise<void> {
    await Promise.race([this.firstRegistration, this.stopped]);
  }

  /**
   * Stop watching. Safe to call more than once; resolves when the event
   * stream has been closed and every watch released.
   */
  async close(): Promise<void> {
    this.controller.abort();
    await this.stopped;
  }

  isClosed(): boolean {
    return this.controller.signal.aborted;
  }

  private async run(): Promise<void> {
    const signal = this.controller.signal;

    try {
      while (!signal.aborted) {
        const location = await resolveLocation(this.target);
        const generation = ++this.generation;
        this.overflowed = false;
        const subscription = await this.register(location, generation);

        if (!subscription) {
          await this.backoff.wait(signal);
          continue;
        }

        this.backoff.reset();
        this.markRegistered();

        try {
          if (await this.reconcile()) {
            await this.dispatch(location, generation);
          }
        } finally {
          await this.release(subscription);
          this.discardQueued();
        }
      }
    } catch (error) {
      log.error('Location watcher stopped unexpectedly', error, { target: this.target });
    } finally {
      this.eventChannel.close();
      this.mailbox.close();
      this.markRegistered();
      log.debug('watch: closed', { target: this.target });
    }
  }

  /**
   * Watch the anchor and each of its ancestors. Null when registration failed
   * or the watcher was closed meanwhile.
   */
  private async register(location: ResolvedLocation, generation: number): Promise<WatchSubscription | null> {
    const roots = watchRoots(location.anchorDir);
    let subscription: WatchSubscription;

    try {
      subscription = this.backend.watch(roots, createWatchFilter(this.target, location), {
        event: (event) => this.enqueue({ type: 'event', generation, event }),
        error: (error) => this.enqueue({ type: 'error', generation, error })
      });
    } catch (error) {
      log.warn('watch: registration failed', { anchor: location.anchorDir, error: getErrorMessage(error) });
      return null;
    }

    const registered = subscription.ready.then(
      () => true,
      (error: unknown) => {
        log.warn('watch: registration failed', { anchor: location.anchorDir, error: getErrorMessage(error) });
        return false;
      }
    );

    const outcome = await Promise.race([registered, this.cancelled.then(() => false)]);
    if (!outcome || this.controller.signal.aborted) {
      await this.release(subscription);
      return null;
    }

    log.debug('watch: registered', {
      target: this.target,
      anchor: location.anchorDir,
      expectedChild: location.expectedChild,
      generation
    });
    return subscription;
  }

  /**
   * Queue a notification for the current generation. Once the queue is full
   * the generation is marked overflowed and further notifications are dropped.
   */
  private enqueue(message: Extract<Message, { generation: number }>): void {
    if (message.generation !== this.generation || this.overflowed) return;

    if (this.mailbox.size >= this.queueSize || !this.mailbox.trySend(message)) {
      this.overflowed = true;
      log.warn('watch: notification queue overflowed', { target: this.target, generation: message.generation });
    }
  }

  private discardQueued(): void {
    while (this.mailbox.size > 0) {
      this.mailbox.tryReceive();
    }
  }

  private async release(subscription: WatchSubscription): Promise<void> {
    try {
      await subscription.close();
    } catch (error) {
      log.warn('watch: failed to release watch', { target: this.target, error: getErrorMessage(error) });
    }
  }

  /**
   * Catch up with changes that happened while no watch was registered.
   * Returns false if the watcher was closed while emitting.
   */
  private async reconcile(): Promise<boolean> {
    const current = await statIdentity(this.target);
    const previous = this.info;

    if (current && !previous) {
      this.info = current;
      return this.emit(WatchEventType.Created);
    }

    if (!current && previous) {
      this.info = null;
      return this.emit(WatchEventType.Deleted);
    }

    if (current && previous && !sameFile(current, previous)) {
      this.info = current;
      return this.emit(WatchEventType.Updated);
    }

    return true;
  }

  /**
   * Interpret raw notifications until the tree shape changes, an error is
   * reported, or the watcher is closed.
   */
  private async dispatch(location: ResolvedLocation, generation: number): Promise<void> {
    const resolved = location.expectedChild === this.target;
    let snapshot = await statIdentity(location.expectedChild);

    for (;;) {
      if (this.controller.signal.aborted) return;

      const next = await this.mailbox.receive();
      if (next.done) return;

      const message = next.value;
      if (message.type === 'cancel') return;
      if (message.generation !== generation) continue;

      if (this.overflowed) {
        log.warn('watch: notifications were lost, re-establishing watch', { target: this.target });
        return;
      }

      if (message.type === 'error') {
        log.warn('watch: subsystem error, re-establishing watch', {
          target: this.target,
          error: getErrorMessage(message.error)
        });
        return;
      }

      const event = message.event;
      const eventPath = path.resolve(event.path);
      log.debug('watch: raw event', { kind: event.kind, path: eventPath });

      switch (event.kind) {
        case 'remove': {
          // Siblings of the chain can come and go without affecting the target
          if (!isOnPathTo(this.target, eventPath)) break;

          const remaining = await statIdentity(eventPath);
          if (remaining) {
            // Stale removal, or the path was replaced before we looked
            if (eventPath === this.target) {
              if (!(await this.handleReplaced(remaining))) return;
              snapshot = this.info;
            }
            break;
          }

          await this.handleRemove();
          return;
        }

        case 'create':
          if (!(await this.handleCreate())) return;
          if (!resolved) {
            if (eventPath === location.expectedChild) return;
            break;
          }
          snapshot = this.info;
          break;

        case 'modify': {
          const changed = await statIdentity(event.path);

          if (sameFile(changed, snapshot)) {
            if (!resolved) return;
            this.info = changed;
            snapshot = changed;
            if (!(await this.emit(WatchEventType.Updated))) return;
          } else if (resolved && changed && eventPath === this.target) {
            if (!(await this.handleReplaced(changed))) return;
            snapshot = changed;
          }
          break;
        }
      }
    }
  }

  private async handleRemove(): Promise<boolean> {
    const current = await statIdentity(this.target);
    if (current === null && this.info !== null) {
      this.info = null;
      return this.emit(WatchEventType.Deleted);
    }
    return true;
  }

  private async handleCreate(): Promise<boolean> {
    const current = await statIdentity(this.target);
    if (current === null) return true;
    return this.handleReplaced(current);
  }

  /**
   * The target is present as `current`: Created if it was absent, Updated if
   * a different file now sits there (an editor renaming a temp file over it)
   */
  private async handleReplaced(current: FileIdentity): Promise<boolean> {
    if (this.info === null) {
      this.info = current;
      return this.emit(WatchEventType.Created);
    }
    if (!sameFile(current, this.info)) {
      this.info = current;
      return this.emit(WatchEventType.Updated);
    }
    return true;
  }

  /**
   * Hand an event to the consumer, waiting for room in the stream.
   * Returns false if the watcher was closed first.
   */
  private async emit(type: WatchEventType): Promise<boolean> {
    log.debug('watch: event', { target: this.target, type });

    if (this.controller.signal.aborted) return false;

    const sent = this.eventChannel.send(type).then(() => true);
    return Promise.race([sent, this.cancelled.then(() => false)]);
  }
}

/**
 * Open a watcher on `target`.
 *
 * @throws ResolutionError if the path cannot be made absolute
 * @throws SubsystemError if file watching cannot be initialized
 */
export function openLocationWatcher(target: string, options: LocationWatcherOptions = {}): LocationWatcher {
  return new LocationWatcher(target, options);
}
