import pino from 'pino';
import type { Logger, LogLevel } from './types.js';
import { LOG_LEVELS } from './types.js';

/**
 * Bootstrap logger for use BEFORE configuration is loaded.
 *
 * Used by:
 * - cli.ts while parsing the environment
 *
 * After config is ready, use a PinoLoggerFactory built from it instead.
 */
let _bootstrapLogger: Logger | null = null;

function bootstrapLevel(): LogLevel {
  const raw = process.env['I2P_BASE64_LOG_LEVEL']?.toLowerCase();
  return LOG_LEVELS.find((level) => level === raw) ?? 'silent';
}

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = pino(
      {
        level: bootstrapLevel(),
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true })
    );
  }

  return _bootstrapLogger;
}

/**
 * Create a bootstrap logger with component context.
 */
export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
