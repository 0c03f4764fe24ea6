/**
 * Structured logging utility for pathwatch
 *
 * Provides consistent logging with levels, structured metadata, and
 * environment-based configuration.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogValue = string | number | boolean | null | undefined | LogValue[] | { [key: string]: LogValue };

export interface LogMetadata {
  [key: string]: LogValue;
}

export function parseLogLevel(level: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  if (!level) return fallback;

  switch (level.toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
      return LogLevel.SILENT;
    default:
      return fallback;
  }
}

export function formatLogLine(level: string, message: string, meta?: LogMetadata, now: Date = new Date()): string {
  const prefix = `[${now.toISOString()}] [${level}]`;

  if (meta && Object.keys(meta).length > 0) {
    return `${prefix} ${message} ${JSON.stringify(meta)}`;
  }

  return `${prefix} ${message}`;
}

class Logger {
  private level: LogLevel;
  private quiet: boolean;

  constructor() {
    this.quiet = process.env.PATHWATCH_QUIET === 'true';
    this.level = parseLogLevel(process.env.PATHWATCH_LOG_LEVEL, this.quiet ? LogLevel.ERROR : LogLevel.INFO);
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= this.level;
  }

  debug(message: string, meta?: LogMetadata): void {
    if (!this.shouldLog(LogLevel.DEBUG)) return;
    process.stdout.write(`${formatLogLine('DEBUG', message, meta)}\n`);
  }

  info(message: string, meta?: LogMetadata): void {
    if (!this.shouldLog(LogLevel.INFO)) return;
    process.stdout.write(`${formatLogLine('INFO', message, meta)}\n`);
  }

  warn(message: string, meta?: LogMetadata): void {
    if (!this.shouldLog(LogLevel.WARN)) return;
    console.warn(formatLogLine('WARN', message, meta));
  }

  error(message: string, error?: unknown, meta?: LogMetadata): void {
    if (!this.shouldLog(LogLevel.ERROR)) return;

    const errorMeta = {
      ...meta,
      ...(error instanceof Error
        ? {
            errorMessage: error.message,
            errorStack: error.stack,
            errorName: error.name,
          }
        : { error: String(error) }),
    };

    console.error(formatLogLine('ERROR', message, errorMeta));
  }

  /**
   * Set quiet mode (suppresses INFO and DEBUG)
   */
  setQuiet(quiet: boolean): void {
    this.quiet = quiet;
    if (quiet && this.level < LogLevel.WARN) {
      this.level = LogLevel.WARN;
    }
  }

  isQuiet(): boolean {
    return this.quiet;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

// Export singleton instance
export const logger = new Logger();

/**
 * Print to stdout without logging metadata
 * Use this for user-facing CLI output
 */
export function print(message: string): void {
  process.stdout.write(`${message}\n`);
}

export const log = {
  debug: (message: string, meta?: LogMetadata) => logger.debug(message, meta),
  info: (message: string, meta?: LogMetadata) => logger.info(message, meta),
  warn: (message: string, meta?: LogMetadata) => logger.warn(message, meta),
  error: (message: string, error?: unknown, meta?: LogMetadata) =>
    logger.error(message, error, meta),
  isQuiet: () => logger.isQuiet(),
  setQuiet: (quiet: boolean) => logger.setQuiet(quiet),
  setLevel: (level: LogLevel) => logger.setLevel(level),
};
