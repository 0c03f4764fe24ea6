import fsp from 'fs/promises';
import { DEBOUNCE_CONSTANTS } from '../config/constants.js';
import { DEBOUNCE_EVENT, newDebounce } from '../debounce/index.js';
import type { DebounceEvent, DebounceStage } from '../debounce/index.js';
import { ConfigValidationError, getErrorMessage, toError } from '../utils/error-utils.js';
import { log } from '../utils/logger.js';
import { normalizeTarget } from '../watch/location.js';
import { openLocationWatcher } from '../watch/LocationWatcher.js';
import type { LocationWatcher, LocationWatcherOptions } from '../watch/LocationWatcher.js';
import { cloneConfig, mergeConfig, parseConfigDocument } from './parse.js';
import type { ConfigObject } from './parse.js';

export type ReloadHandler<T> = (config: T) => void;
export type ErrorHandler = (error: Error) => void;
/** May return a replacement config; throwing aborts the update */
export type ValidationHandler<T> = (config: T) => T | undefined;

export interface ConfigLoaderOptions<T> {
  reloadHandlers?: ReloadHandler<T>[];
  errorHandlers?: ErrorHandler[];
  validationHandlers?: ValidationHandler<T>[];
  /** Keys absent from the defaults are errors */
  strictParsing?: boolean;
  /** On a failed reload keep the last good config instead of reverting to defaults */
  keepLastValid?: boolean;
  /** Quiet time before reloading; 0 reloads on every watcher event */
  debounceIntervalMs?: number;
  /** Bound on how long continuous changes may postpone a reload; 0 disables it */
  debounceMaxDelayMs?: number;
  watcher?: LocationWatcherOptions;
}

/**
 * Loads a JSON or YAML config file on top of a set of defaults and reloads
 * it whenever the file at that location is created, changed or removed.
 *
 * Watcher events go through a debounce stage so a burst of writes results
 * in a single reload. Handlers run synchronously, in registration order.
 *
 * Usage:
 * ```ts
 * const loader = await ConfigLoader.create('config/app.yaml', { port: 8080 }, {
 *   reloadHandlers: [(cfg) => server.reconfigure(cfg)],
 *   errorHandlers: [(err) => console.error(err.message)]
 * });
 * loader.get().port;
 * ```
 */
export class ConfigLoader<T extends ConfigObject> {
  private readonly defaults: T;
  private readonly reloadHandlers: ReloadHandler<T>[];
  private readonly errorHandlers: ErrorHandler[];
  private readonly validationHandlers: ValidationHandler<T>[];
  private readonly strictParsing: boolean;
  private readonly keepLastValid: boolean;
  private readonly debounceIntervalMs: number;
  private readonly debounceMaxDelayMs: number;

  private current: T;
  private watcher: LocationWatcher | null = null;
  private pumps: Promise<void>[] = [];
  private closing = false;

  private constructor(readonly filename: string, defaults: T, private readonly options: ConfigLoaderOptions<T>) {
    this.defaults = cloneConfig(defaults);
    this.current = cloneConfig(defaults);
    this.reloadHandlers = [...(options.reloadHandlers ?? [])];
    this.errorHandlers = [...(options.errorHandlers ?? [])];
    this.validationHandlers = [...(options.validationHandlers ?? [])];
    this.strictParsing = options.strictParsing ?? false;
    this.keepLastValid = options.keepLastValid ?? false;
    this.debounceIntervalMs = options.debounceIntervalMs ?? DEBOUNCE_CONSTANTS.DEFAULT_INTERVAL_MS;
    this.debounceMaxDelayMs = options.debounceMaxDelayMs ?? DEBOUNCE_CONSTANTS.DEFAULT_MAX_DELAY_MS;
  }

  /**
   * Load `filename` once and start watching it.
   *
   * @throws ResolutionError if the filename cannot be made absolute
   * @throws SubsystemError if file watching cannot be initialized
   */
  static async create<T extends ConfigObject>(
    filename: string,
    defaults: T,
    options: ConfigLoaderOptions<T> = {}
  ): Promise<ConfigLoader<T>> {
    const loader = new ConfigLoader(normalizeTarget(filename), defaults, options);
    loader.start();
    await loader.initialLoad();
    return loader;
  }

  /**
   * Current configuration
   */
  get(): T {
    return this.current;
  }

  /**
   * Copy of the defaults the loader was created with
   */
  getDefaults(): T {
    return cloneConfig(this.defaults);
  }

  onReload(handler: ReloadHandler<T>): () => void {
    return this.register(this.reloadHandlers, handler);
  }

  onError(handler: ErrorHandler): () => void {
    return this.register(this.errorHandlers, handler);
  }

  onValidate(handler: ValidationHandler<T>): () => void {
    return this.register(this.validationHandlers, handler);
  }

  /**
   * Wait until the watcher has registered its first watch
   */
  async ready(): Promise<void> {
    await this.watcher?.ready();
  }

  /**
   * Stop watching. Pending debounced changes are drained without reloading.
   */
  async close(): Promise<void> {
    this.closing = true;
    await this.watcher?.close();
    await Promise.all(this.pumps);
  }

  /**
   * Re-read the file now, outside of any watcher event
   */
  async reload(): Promise<void> {
    const loaded = await this.loadFromDisk();
    let next: T;

    if (loaded.ok) {
      next = loaded.config;
    } else {
      if (this.keepLastValid) {
        log.warn('Keeping last valid config', { path: this.filename });
        return;
      }
      next = cloneConfig(this.defaults);
    }

    const validated = this.applyValidations(next);
    if (!validated.ok) {
      if (this.keepLastValid) return;
      next = cloneConfig(this.defaults);
    } else {
      next = validated.config;
    }

    this.current = next;
    log.info('Config reloaded', { path: this.filename });
    this.notifyReloadHandlers(next);
  }

  private register<H>(handlers: H[], handler: H): () => void {
    handlers.push(handler);
    return () => {
      const index = handlers.indexOf(handler);
      if (index >= 0) handlers.splice(index, 1);
    };
  }

  private start(): void {
    const watcher = openLocationWatcher(this.filename, this.options.watcher);
    this.watcher = watcher;

    if (this.debounceIntervalMs > 0) {
      const stage = newDebounce(this.debounceIntervalMs, this.debounceMaxDelayMs);
      this.pumps = [this.forwardEvents(watcher, stage), this.consumeBursts(stage)];
    } else {
      this.pumps = [this.reloadOnEvents(watcher)];
    }
  }

  private async initialLoad(): Promise<void> {
    const loaded = await this.loadFromDisk();
    const base = loaded.ok ? loaded.config : cloneConfig(this.defaults);
    const validated = this.applyValidations(base);
    this.current = validated.ok ? validated.config : cloneConfig(this.defaults);
  }

  private async forwardEvents(watcher: LocationWatcher, stage: DebounceStage<DebounceEvent, DebounceEvent>): Promise<void> {
    try {
      for await (const event of watcher.events()) {
        log.debug('Config file event', { path: this.filename, event });
        await stage.input.send(DEBOUNCE_EVENT);
      }
    } catch (error) {
      log.error('Config watcher pump failed', error, { path: this.filename });
    } finally {
      stage.input.close();
    }
  }

  private async consumeBursts(stage: DebounceStage<DebounceEvent, DebounceEvent>): Promise<void> {
    try {
      for await (const burst of stage.output) {
        if (this.closing) continue;
        log.debug('Config change burst settled', { path: this.filename, burst: String(burst) });
        await this.reload();
      }
    } catch (error) {
      log.error('Config reload pump failed', error, { path: this.filename });
    }
    await stage.done;
  }

  private async reloadOnEvents(watcher: LocationWatcher): Promise<void> {
    try {
      for await (const event of watcher.events()) {
        if (this.closing) continue;
        log.debug('Config file event', { path: this.filename, event });
        await this.reload();
      }
    } catch (error) {
      log.error('Config reload pump failed', error, { path: this.filename });
    }
  }

  private async loadFromDisk(): Promise<{ ok: true; config: T } | { ok: false }> {
    try {
      const content = await fsp.readFile(this.filename, 'utf8');
      const parsed = parseConfigDocument(content, this.filename);
      const config = cloneConfig(this.defaults);
      mergeConfig(config, parsed, this.filename, this.strictParsing);
      return { ok: true, config };
    } catch (error) {
      this.handleError(toError(error));
      return { ok: false };
    }
  }

  private applyValidations(config: T): { ok: true; config: T } | { ok: false } {
    let result = config;

    for (const validate of this.validationHandlers) {
      try {
        const replacement = validate(result);
        if (replacement !== undefined) {
          result = replacement;
        }
      } catch (error) {
        this.handleError(new ConfigValidationError(`Config validation failed: ${getErrorMessage(error)}`, error));
        return { ok: false };
      }
    }

    return { ok: true, config: result };
  }

  private notifyReloadHandlers(config: T): void {
    for (const handler of this.reloadHandlers) {
      try {
        handler(config);
      } catch (error) {
        this.handleError(toError(error));
      }
    }
  }

  private handleError(error: Error): void {
    log.warn('Config error', { path: this.filename, error: error.message });

    for (const handler of this.errorHandlers) {
      try {
        handler(error);
      } catch (handlerError) {
        log.error('Config error handler threw', handlerError, { path: this.filename });
      }
    }
  }
}
