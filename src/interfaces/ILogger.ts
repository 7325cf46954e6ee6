/**
 * ILogger - logging interface for the colorizing services
 *
 * Services take a logger by injection and never touch the console directly;
 * stdout belongs to the colorized data. SilentLogger is the default for
 * library use and tests.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Levels from most to least verbose */
export const LOG_LEVELS: ReadonlyArray<LogLevel> = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * True when a message at `level` should be shown under `threshold`
 */
export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

export interface ILogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Discards everything.
 */
export class SilentLogger implements ILogger {
  debug(_message: string, _context?: Record<string, unknown>): void {
    // Intentionally empty
  }

  info(_message: string, _context?: Record<string, unknown>): void {
    // Intentionally empty
  }

  warn(_message: string, _context?: Record<string, unknown>): void {
    // Intentionally empty
  }

  error(_message: string, _context?: Record<string, unknown>): void {
    // Intentionally empty
  }
}
