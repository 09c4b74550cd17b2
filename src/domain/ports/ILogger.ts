export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

/**
 * Log levels supported by the logger
 */
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Port interface for logging.
 * Every component receives a child logger bound to its name.
 */
export interface ILogger {
  trace(message: string, data?: Record<string, unknown>): void;

  debug(message: string, data?: Record<string, unknown>): void;

  info(message: string, data?: Record<string, unknown>): void;

  warn(message: string, data?: Record<string, unknown>): void;

  /**
   * Log at error level; `error` is attached under `err` when it is an Error
   */
  error(message: string, error?: Error | unknown, data?: Record<string, unknown>): void;

  fatal(message: string, error?: Error | unknown, data?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context
   */
  child(bindings: Record<string, unknown>): ILogger;
}
