/**
 * Centralized configuration constants for pathwatch
 *
 * Defaults for the location watcher, the debounce stages and the config
 * reload pipeline. Values read from the environment can be tuned without
 * touching call sites.
 */

function readIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = parseInt(raw, 10);
  return !isNaN(value) && value >= 0 ? value : fallback;
}

/**
 * Location Watcher Configuration
 */
export const WATCHER_CONSTANTS = {
  /** Capacity of the event stream handed to consumers */
  EVENT_BUFFER_SIZE: 1,

  /** Raw notifications held per watch generation before it counts as overflowed */
  RAW_QUEUE_SIZE: readIntEnv('PATHWATCH_RAW_QUEUE_SIZE', 256),

  /** First delay before re-registering a failed watch (milliseconds) */
  RETRY_INITIAL_DELAY_MS: 10,

  /** Growth factor between consecutive registration retries */
  RETRY_BACKOFF_FACTOR: 2,

  /** Upper bound for a single registration retry delay (milliseconds) */
  RETRY_MAX_DELAY_MS: readIntEnv('PATHWATCH_RETRY_MAX_DELAY_MS', 1000),
} as const;

/**
 * Debounce Configuration
 */
export const DEBOUNCE_CONSTANTS = {
  /** Quiet time before a burst is considered finished (milliseconds) */
  DEFAULT_INTERVAL_MS: readIntEnv('PATHWATCH_DEBOUNCE_MS', 1000),

  /** Longest a continuous burst may hold back output; 0 disables the bound */
  DEFAULT_MAX_DELAY_MS: readIntEnv('PATHWATCH_MAX_DELAY_MS', 3000),
} as const;

/**
 * Config Reload Configuration
 */
export const RELOAD_CONSTANTS = {
  /** Extensions parsed with JSON.parse; anything else goes through YAML */
  JSON_EXTENSIONS: ['.json'] as const,
} as const;
