/**
 * Error Handling Module
 * @module errors
 *
 * @example
 * ```typescript
 * import { ValidationError, NotFoundError, withRetry } from './errors/index.js';
 *
 * throw NotFoundError.result(42);
 * ```
 */

export {
  HttpErrorCodes,
  ResultsErrorCodes,
  StorageErrorCodes,
  SystemErrorCodes,
  ErrorCodes,
  errorCodeToHttpStatus,
  getHttpStatusForCode,
  isClientError,
  isRetryableError,
} from './codes.js';
export type {
  ErrorCode,
  HttpErrorCode,
  ResultsErrorCode,
  StorageErrorCode,
  SystemErrorCode,
} from './codes.js';

export {
  BaseError,
  isBaseError,
  isOperationalError,
  hasErrorCode,
  getErrorMessage,
  toError,
} from './base.js';
export type { ErrorContext, SerializedError } from './base.js';

export {
  ValidationError,
  DistinctOnWithoutFilterError,
  InvalidDataKeyError,
  InvalidTimestampError,
  NotFoundError,
} from './domain.js';
export type { ValidationFieldError } from './domain.js';

export {
  StorageError,
  ConnectionError,
  QueryError,
  TransactionError,
  MigrationError,
  PublishError,
  ConfigurationError,
} from './infrastructure.js';

export { withRetry, sleep, DEFAULT_RETRY_OPTIONS } from './recovery.js';
export type { RetryOptions } from './recovery.js';
