import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - pino's Logger, no wrapper.
 *
 * API follows pino idiom (data-first):
 *   logger.debug({ bytesIn: 3 }, 'Transcode finished');
 *   logger.warn({ error }, 'Transcode failed');
 */
export type Logger = PinoLogger;

/**
 * Logger factory: one root logger, child loggers per component.
 */
export interface ILoggerFactory {
  /** Create a child logger for a component */
  create(component: string): Logger;

  /** Root logger instance */
  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];
