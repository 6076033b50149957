/**
 * ConsoleLogger - CLI implementation of ILogger
 *
 * Every level goes to stderr: stdout carries the highlighted stream and
 * must not be interleaved with diagnostics.
 */

import { colorCode, resetCode } from '../core/ColorCode.js';
import type { ILogger, LogLevel } from '../interfaces/ILogger.js';

export interface ConsoleLoggerOptions {
  /** Enable colored output (default: true) */
  colors?: boolean;
  /** Show debug messages (default: false) */
  debug?: boolean;
  /** Prefix for all messages (default: none) */
  prefix?: string;
}

/** 256-color palette index per level */
const LEVEL_COLORS: Record<LogLevel, number> = {
  debug: 244,
  info: 6,
  warn: 3,
  error: 1,
};

export class ConsoleLogger implements ILogger {
  private options: Required<Omit<ConsoleLoggerOptions, 'prefix'>> & { prefix?: string };

  constructor(options: ConsoleLoggerOptions = {}) {
    this.options = {
      colors: options.colors ?? true,
      debug: options.debug ?? false,
      prefix: options.prefix,
    };
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (!this.options.debug) {
      return;
    }
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
    const formatted = this.format(message, context);
    const text = this.options.colors
      ? `${colorCode(LEVEL_COLORS[level])}${formatted}${resetCode()}`
      : formatted;
    console.error(text);
  }

  private format(message: string, context?: Record<string, unknown>): string {
    let result = this.options.prefix ? `${this.options.prefix} ${message}` : message;
    if (context && Object.keys(context).length > 0) {
      result += ` ${JSON.stringify(context)}`;
    }
    return result;
  }
}
