export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

/**
 * Logging port. Structured data goes in `data`, never interpolated into the
 * message, so adapters can index it.
 */
export interface ILogger {
  trace(message: string, data?: Record<string, unknown>): void;

  debug(message: string, data?: Record<string, unknown>): void;

  info(message: string, data?: Record<string, unknown>): void;

  warn(message: string, data?: Record<string, unknown>): void;

  error(message: string, error?: Error | unknown, data?: Record<string, unknown>): void;

  fatal(message: string, error?: Error | unknown, data?: Record<string, unknown>): void;

  /**
   * Logger bound to extra context, e.g. `{ component: 'DashboardClient' }`
   */
  child(bindings: Record<string, unknown>): ILogger;
}
