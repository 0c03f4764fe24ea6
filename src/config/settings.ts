/**
 * Zod schemas for CLI option parsing
 *
 * Commander hands option values over as strings; these schemas coerce and
 * range-check them before they reach the watcher or the debounce stage.
 */

import { z } from 'zod';
import { DEBOUNCE_CONSTANTS } from './constants.js';
import { LogLevel, parseLogLevel } from '../utils/logger.js';

const DurationSchema = z.coerce
  .number({ invalid_type_error: 'Duration must be a number of milliseconds' })
  .int('Duration must be an integer number of milliseconds')
  .min(0, 'Duration cannot be negative')
  .max(3_600_000, 'Duration cannot exceed one hour');

const LogLevelSchema = z
  .enum(['debug', 'info', 'warn', 'error', 'silent'])
  .optional();

export const DebounceSettingsSchema = z.object({
  debounce: DurationSchema.default(DEBOUNCE_CONSTANTS.DEFAULT_INTERVAL_MS),
  maxDelay: DurationSchema.default(DEBOUNCE_CONSTANTS.DEFAULT_MAX_DELAY_MS),
});

export const WatchCommandSchema = DebounceSettingsSchema.extend({
  target: z.string().trim().min(1, 'Path cannot be empty'),
});

export const ConfigCommandSchema = DebounceSettingsSchema.extend({
  file: z.string().trim().min(1, 'Config file cannot be empty'),
  keepLastValid: z.boolean().default(false),
  strict: z.boolean().default(false),
});

export const GlobalOptionsSchema = z.object({
  logLevel: LogLevelSchema,
});

export type DebounceSettings = z.infer<typeof DebounceSettingsSchema>;
export type WatchCommandSettings = z.infer<typeof WatchCommandSchema>;
export type ConfigCommandSettings = z.infer<typeof ConfigCommandSchema>;

/**
 * Format the first zod issue as a one-line message
 */
export function formatSettingsError(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'Invalid options';
  const field = issue.path.join('.');
  return field ? `${field}: ${issue.message}` : issue.message;
}

export function parseWatchSettings(input: unknown): WatchCommandSettings {
  const result = WatchCommandSchema.safeParse(input);
  if (!result.success) {
    throw new Error(formatSettingsError(result.error));
  }
  return result.data;
}

export function parseConfigSettings(input: unknown): ConfigCommandSettings {
  const result = ConfigCommandSchema.safeParse(input);
  if (!result.success) {
    throw new Error(formatSettingsError(result.error));
  }
  return result.data;
}

export function resolveLogLevel(input: unknown): LogLevel | undefined {
  const result = GlobalOptionsSchema.safeParse(input);
  if (!result.success || !result.data.logLevel) {
    return undefined;
  }
  return parseLogLevel(result.data.logLevel);
}
