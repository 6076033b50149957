/**
 * ILogger - logging seam for the library
 *
 * The highlighter and the stream driver only talk to this interface;
 * the CLI injects a ConsoleLogger that writes to stderr so stdout stays
 * reserved for highlighted text.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ILogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Discards everything. Default for library callers and tests.
 */
export class SilentLogger implements ILogger {
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}
