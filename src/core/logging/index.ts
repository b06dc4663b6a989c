// Types
export type { Logger, ILoggerFactory, LogLevel } from './types.js';
export { LOG_LEVELS } from './types.js';

// Factory
export { PinoLoggerFactory, type LoggerFactoryOptions } from './create-logger.js';

// Bootstrap (for pre-config code)
export { getBootstrapLogger, createBootstrapLogger } from './bootstrap.js';
