/**
 * Infrastructure Error Classes
 * @module errors/infrastructure
 *
 * Storage, messaging and configuration failures.
 */

import { BaseError, ErrorContext } from './base.js';
import { ErrorCode, StorageErrorCodes, SystemErrorCodes } from './codes.js';

// ============================================================================
// Storage Errors
// ============================================================================

/**
 * Base class for storage failures during a commit or a query.
 * A failed commit has been rolled back before this is thrown.
 */
export class StorageError extends BaseError {
  public readonly operation: string;

  constructor(
    message: string,
    operation: string,
    code: ErrorCode = StorageErrorCodes.DATABASE_ERROR,
    context: ErrorContext = {},
    isOperational = false
  ) {
    super(message, code, { ...context, operation }, isOperational);
    this.name = 'StorageError';
    this.operation = operation;
  }
}

/**
 * Database connection error
 */
export class ConnectionError extends StorageError {
  public readonly retryable = true;

  constructor(target: string, context: ErrorContext = {}) {
    super(
      `Failed to connect to database: ${target}`,
      'connect',
      StorageErrorCodes.CONNECTION_ERROR,
      context,
      true
    );
    this.name = 'ConnectionError';
  }
}

/**
 * Database query error
 */
export class QueryError extends StorageError {
  public readonly query?: string;

  constructor(message: string, query?: string, context: ErrorContext = {}) {
    super(message, 'query', StorageErrorCodes.QUERY_ERROR, context);
    this.name = 'QueryError';
    this.query = query?.substring(0, 200);
  }
}

/**
 * Transaction failed and was rolled back
 */
export class TransactionError extends StorageError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'transaction', StorageErrorCodes.TRANSACTION_ERROR, context);
    this.name = 'TransactionError';
  }
}

/**
 * Schema migration failed
 */
export class MigrationError extends StorageError {
  public readonly version: string;

  constructor(version: string, context: ErrorContext = {}) {
    super(`Migration ${version} failed`, 'migrate', StorageErrorCodes.MIGRATION_ERROR, context);
    this.name = 'MigrationError';
    this.version = version;
  }
}

// ============================================================================
// Messaging Errors
// ============================================================================

/**
 * Message bus publication failure. Never surfaces from a commit.
 */
export class PublishError extends BaseError {
  public readonly channel: string;

  constructor(channel: string, context: ErrorContext = {}) {
    super(`Failed to publish to '${channel}'`, SystemErrorCodes.PUBLISH_FAILED, context, true);
    this.name = 'PublishError';
    this.channel = channel;
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Configuration error
 */
export class ConfigurationError extends BaseError {
  public readonly configKey: string;

  constructor(configKey: string, message?: string, context: ErrorContext = {}) {
    super(
      message ?? `Invalid or missing configuration: ${configKey}`,
      SystemErrorCodes.CONFIGURATION_ERROR,
      context,
      false
    );
    this.name = 'ConfigurationError';
    this.configKey = configKey;
  }

  static missing(configKey: string): ConfigurationError {
    return new ConfigurationError(configKey, `Missing required configuration: ${configKey}`);
  }
}
