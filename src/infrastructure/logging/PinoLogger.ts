import pino from 'pino';
import type { ILogger, LogLevel } from '../../domain/ports/ILogger.js';

export interface PinoLoggerOptions {
  name?: string;
  level?: LogLevel;
  pretty?: boolean;
  /** Wrap an existing pino logger (used for children) */
  instance?: pino.Logger;
}

/**
 * ILogger over pino; `pretty` routes output through pino-pretty for terminals.
 */
export class PinoLogger implements ILogger {
  private readonly logger: pino.Logger;

  constructor(options?: PinoLoggerOptions) {
    if (options?.instance) {
      this.logger = options.instance;
      return;
    }

    const transport = options?.pretty
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
      name: options?.name ?? 'robot-dashboard',
      level: options?.level ?? 'info',
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
    this.write('error', message, withError(error, data));
  }

  fatal(message: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.write('fatal', message, withError(error, data));
  }

  child(bindings: Record<string, unknown>): ILogger {
    return new PinoLogger({ instance: this.logger.child(bindings) });
  }

  private write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (data) {
      this.logger[level](data, message);
    } else {
      this.logger[level](message);
    }
  }
}

/** pino serializes `err` with stack; anything else goes under `error` */
function withError(error: unknown, data?: Record<string, unknown>): Record<string, unknown> | undefined {
  if (error === undefined) return data;
  return error instanceof Error ? { err: error, ...data } : { error, ...data };
}
