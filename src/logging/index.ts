/**
 * Logging Module
 * @module logging
 */

export {
  createLogger,
  createLoggerOptions,
  getLogger,
  createModuleLogger,
  withLogging,
} from './logger.js';
export type { LogContext, LoggerConfig, StructuredLogger, DomainLogMethods } from './logger.js';

export {
  metricsRegistry,
  metrics,
  metricsPlugin,
  normalizePath,
} from './metrics.js';
export type { MetricsPluginOptions } from './metrics.js';
