/**
 * ConsoleLogger - stderr implementation of ILogger
 *
 * Every level goes to the error stream so diagnostics never mix with the
 * colorized lines on stdout.
 */

import type { ILogger, LogLevel } from '../interfaces/ILogger.js';
import { isLevelEnabled } from '../interfaces/ILogger.js';
import { colorize } from '../utils/colors.js';
import type { ColorName } from '../utils/colors.js';

export interface ConsoleLoggerOptions {
  /** Enable colored output (default: true) */
  colors?: boolean;
  /** Lowest level shown (default: 'warn') */
  level?: LogLevel;
  /** Prefix for all messages (default: none) */
  prefix?: string;
  /** Destination (default: process.stderr) */
  stream?: NodeJS.WritableStream;
}

const LEVEL_COLORS: Record<LogLevel, ColorName> = {
  debug: 'dim',
  info: 'cyan',
  warn: 'yellow',
  error: 'red',
};

export class ConsoleLogger implements ILogger {
  private readonly colors: boolean;
  private readonly level: LogLevel;
  private readonly prefix?: string;
  private readonly stream: NodeJS.WritableStream;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.colors = options.colors ?? true;
    this.level = options.level ?? 'warn';
    this.prefix = options.prefix;
    this.stream = options.stream ?? process.stderr;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context);
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!isLevelEnabled(level, this.level)) {
      return;
    }
    const formatted = this.format(message, context);
    const text = this.colors ? colorize(formatted, LEVEL_COLORS[level]) : formatted;
    this.stream.write(`${text}\n`);
  }

  private format(message: string, context?: Record<string, unknown>): string {
    let result = this.prefix ? `${this.prefix} ${message}` : message;
    if (context && Object.keys(context).length > 0) {
      result += ` ${JSON.stringify(context)}`;
    }
    return result;
  }
}
