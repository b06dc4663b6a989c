import pino, { type DestinationStream } from 'pino';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';

export interface LoggerFactoryOptions {
  readonly level: LogLevel;
  /** Defaults to a synchronous stderr destination. Tests pass an in-memory stream. */
  readonly destination?: DestinationStream;
}

/**
 * Create the root pino logger.
 *
 * - Sync output to stderr (stdout carries encoded/decoded data)
 * - JSON format for machine parsing
 */
function createRootLogger(options: LoggerFactoryOptions): Logger {
  return pino(
    {
      level: options.level,

      // ISO timestamps for consistency
      timestamp: pino.stdTimeFunctions.isoTime,

      // Include error stack traces
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    options.destination ?? pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger factory - creates component loggers from one root.
 */
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(options: LoggerFactoryOptions) {
    this._root = createRootLogger(options);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
