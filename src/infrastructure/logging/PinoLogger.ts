import pino from 'pino';
import type { ILogger, LogLevel } from '../../domain/ports/ILogger.js';

export interface PinoLoggerOptions {
  name?: string;
  level?: LogLevel;
  pretty?: boolean;
}

/**
 * Pino-based logger implementation
 */
export class PinoLogger implements ILogger {
  private readonly logger: pino.Logger;

  constructor(options: PinoLoggerOptions | pino.Logger = {}) {
    if (isPinoLogger(options)) {
      this.logger = options;
      return;
    }

    const transport = options.pretty
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined;

    this.logger = pino({
      name: options.name ?? 'visitor-desk',
      level: options.level ?? 'info',
      ...(transport && { transport }),
    });
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.write('trace', message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', message, data);
  }

  error(message: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.logger.error(errorBindings(error, data), message);
  }

  fatal(message: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.logger.fatal(errorBindings(error, data), message);
  }

  child(bindings: Record<string, unknown>): ILogger {
    return new PinoLogger(this.logger.child(bindings));
  }

  private write(
    level: 'trace' | 'debug' | 'info' | 'warn',
    message: string,
    data?: Record<string, unknown>
  ): void {
    if (data) {
      this.logger[level](data, message);
    } else {
      this.logger[level](message);
    }
  }
}

function isPinoLogger(value: PinoLoggerOptions | pino.Logger): value is pino.Logger {
  return 'child' in value && typeof value.child === 'function';
}

function errorBindings(error: unknown, data?: Record<string, unknown>): Record<string, unknown> {
  return error instanceof Error ? { err: error, ...data } : { error, ...data };
}
