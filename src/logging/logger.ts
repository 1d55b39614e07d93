/**
 * Core Structured Logger
 * @module logging/logger
 *
 * Structured logging with Pino, extended with methods for the result
 * lifecycle: commits, queries, publication and migrations.
 */

import pino, { Logger, LoggerOptions, DestinationStream } from 'pino';

// ============================================================================
// Types and Interfaces
// ============================================================================

/**
 * Log context that can be attached to log entries
 */
export interface LogContext {
  requestId?: string;
  module?: string;
  operation?: string;
  resultId?: number;
  [key: string]: unknown;
}

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  level: string;
  pretty: boolean;
  redact: string[];
  service: string;
  version: string;
  environment: string;
}

/**
 * Domain-specific logging methods
 */
export interface DomainLogMethods {
  withContext(context: LogContext): StructuredLogger;

  resultCommitted(resultId: number, testcase: string, durationMs: number): void;
  resultsQueried(count: number, latest: boolean, durationMs: number): void;
  publishRetried(resultId: number, attempt: number, error: Error): void;
  publishFailed(resultId: number, error: Error, attempts: number): void;
  migrationApplied(version: string, name: string): void;
  performanceMetric(operation: string, durationMs: number, metadata?: Record<string, unknown>): void;
}

export type StructuredLogger = Logger & DomainLogMethods;

// ============================================================================
// Default Configuration
// ============================================================================

const SERVICE_NAME = 'results-api';

function loadLoggerConfig(): LoggerConfig {
  return {
    level: process.env.LOG_LEVEL || 'info',
    pretty: process.env.LOG_PRETTY === 'true' || process.env.NODE_ENV === 'development',
    redact: [
      'password',
      'authorization',
      'secret',
      'connectionString',
      'DATABASE_URL',
      'REDIS_URL',
      'headers.authorization',
      'headers.cookie',
    ],
    service: process.env.SERVICE_NAME || SERVICE_NAME,
    version: process.env.SERVICE_VERSION || '1.0.0',
    environment: process.env.NODE_ENV || 'development',
  };
}

/**
 * Redact the path itself and one level of nesting
 */
function createRedactionPaths(paths: string[]): string[] {
  return paths.flatMap((path) => [path, `*.${path}`]);
}

// ============================================================================
// Domain Method Extensions
// ============================================================================

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

function extendWithDomainMethods(logger: Logger): StructuredLogger {
  const methods: DomainLogMethods = {
    withContext(context) {
      return extendWithDomainMethods(logger.child(context));
    },

    resultCommitted(resultId, testcase, durationMs) {
      logger.info(
        { event: 'result_committed', resultId, testcase, durationMs },
        `Result ${resultId} committed for ${testcase}`
      );
    },

    resultsQueried(count, latest, durationMs) {
      logger.debug(
        { event: 'results_queried', count, latest, durationMs },
        `Query returned ${count} results in ${durationMs}ms`
      );
    },

    publishRetried(resultId, attempt, error) {
      logger.warn(
        { event: 'publish_retried', resultId, attempt, err: error },
        `Publishing result ${resultId} failed on attempt ${attempt}, retrying`
      );
    },

    publishFailed(resultId, error, attempts) {
      logger.error(
        { event: 'publish_failed', resultId, attempts, err: error, errorCode: errorCode(error) },
        `Failed to publish result ${resultId} after ${attempts} attempts`
      );
    },

    migrationApplied(version, name) {
      logger.info({ event: 'migration_applied', version, name }, `Applied migration ${version}: ${name}`);
    },

    performanceMetric(operation, durationMs, metadata) {
      logger.debug(
        { event: 'performance_metric', operation, durationMs, ...metadata },
        `${operation}: ${durationMs}ms`
      );
    },
  };

  return Object.assign(logger, methods);
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Pino options shared by module loggers and the Fastify request logger
 */
export function createLoggerOptions(name: string): LoggerOptions {
  const config = loadLoggerConfig();

  return {
    name,
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: createRedactionPaths(config.redact),
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: config.service,
      version: config.version,
      env: config.environment,
    },
  };
}

function createDestination(): DestinationStream | undefined {
  const config = loadLoggerConfig();
  if (!config.pretty || config.environment === 'production') {
    return undefined;
  }
  return pino.transport({
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  });
}

/**
 * Creates a new structured logger instance
 */
export function createLogger(name: string, baseContext?: LogContext): StructuredLogger {
  const options = createLoggerOptions(name);
  const destination = createDestination();
  const baseLogger = destination ? pino(options, destination) : pino(options);
  const logger = baseContext ? baseLogger.child(baseContext) : baseLogger;

  return extendWithDomainMethods(logger);
}

// ============================================================================
// Singleton Root Logger
// ============================================================================

let rootLogger: StructuredLogger | null = null;

/**
 * Gets the root logger instance (creates if not exists)
 */
export function getLogger(): StructuredLogger {
  if (!rootLogger) {
    rootLogger = createLogger(SERVICE_NAME);
  }
  return rootLogger;
}

/**
 * Creates a logger for a specific module/component
 */
export function createModuleLogger(moduleName: string): StructuredLogger {
  return getLogger().withContext({ module: moduleName });
}

/**
 * Wraps an async function with timing and logging
 */
export async function withLogging<T>(
  logger: StructuredLogger,
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  const startTime = Date.now();
  try {
    const result = await fn();
    logger.performanceMetric(operation, Date.now() - startTime, { status: 'success' });
    return result;
  } catch (error) {
    logger.performanceMetric(operation, Date.now() - startTime, { status: 'error' });
    throw error;
  }
}
