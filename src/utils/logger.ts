/**
 * Library logger.
 *
 * The library only reports guard and view lifecycle: openings, commits,
 * rejections and discards at `debug`, guards cancelled with staged changes at
 * `warn`. The threshold is chosen once, through `configure`, and the logger
 * is rebuilt whenever it changes.
 */

export type LogLevel = 'debug' | 'warn';

/** Lowest level written, or `silent` for none. */
export type LogThreshold = LogLevel | 'silent';

export const DEFAULT_LOG_PREFIX = '[bounded-values]';

export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
}

/** `2026-01-21T12:00:00.000Z WARN  [bounded-values] message` */
export function formatLogLine(level: LogLevel, prefix: string, message: string, at: Date = new Date()): string {
  return `${at.toISOString()} ${level.toUpperCase().padEnd(5)} ${prefix} ${message}`;
}

/** No-op logger. The library logs through this until a level is configured. */
export const silentLogger: Logger = {
  debug: () => {},
  warn: () => {},
};

/**
 * Build a logger writing lines at or above `threshold` to `console.debug` and
 * `console.warn`.
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug', '[inventory]');
 * logger.debug('Guard opened on Stock');
 * ```
 */
export function createLogger(threshold: LogThreshold = 'warn', prefix = DEFAULT_LOG_PREFIX): Logger {
  if (threshold === 'silent') {
    return silentLogger;
  }
  return {
    debug: (message) => {
      if (threshold === 'debug') {
        console.debug(formatLogLine('debug', prefix, message));
      }
    },
    warn: (message) => {
      console.warn(formatLogLine('warn', prefix, message));
    },
  };
}
