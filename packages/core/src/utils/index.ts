/**
 * Utils Module - Utility functions and helpers
 */
export { logger, initLogger, getLogger, LogLevel } from './logger.js';
export type { Logger, LoggerConfig } from './logger.js';
export { formatBytes, formatPercent } from './format.js';
