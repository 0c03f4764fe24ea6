/**
 * pathwatch - location-aware file watching and time-windowed debouncing
 */

export * from './watch/index.js';
export * from './debounce/index.js';
export * from './reload/index.js';
export { Channel, drainChannel } from './utils/channel.js';
export type { SendChannel, ReceiveChannel } from './utils/channel.js';
export { Backoff } from './utils/backoff.js';
export type { BackoffOptions } from './utils/backoff.js';
export { systemScheduler } from './utils/scheduler.js';
export type { Scheduler, TimerHandle } from './utils/scheduler.js';
export {
  ChannelClosedError,
  ConfigParseError,
  ConfigValidationError,
  ResolutionError,
  SubsystemError
} from './utils/error-utils.js';
export { LogLevel, logger, log } from './utils/logger.js';
