/**
 * Domain Error Classes
 * @module errors/domain
 *
 * Errors raised by filter parsing, result submission and lookups.
 * All of them are operational: they are reported to the caller and leave
 * persisted state untouched.
 */

import { BaseError, ErrorContext } from './base.js';
import { ErrorCode, HttpErrorCodes, ResultsErrorCodes } from './codes.js';

// ============================================================================
// Validation Errors
// ============================================================================

export interface ValidationFieldError {
  field: string;
  message: string;
  value?: unknown;
}

/**
 * Rejected input: malformed filters, timestamps, data keys or testcases
 */
export class ValidationError extends BaseError {
  public readonly validationErrors: ValidationFieldError[];

  constructor(
    message: string,
    code: ErrorCode = HttpErrorCodes.VALIDATION_ERROR,
    errors: ValidationFieldError[] = [],
    context: ErrorContext = {}
  ) {
    super(message, code, context, true);
    this.name = 'ValidationError';
    this.validationErrors = errors;
  }

  static forField(
    field: string,
    message: string,
    code: ErrorCode = HttpErrorCodes.VALIDATION_ERROR,
    value?: unknown
  ): ValidationError {
    return new ValidationError(message, code, [{ field, message, value }], {
      details: { field },
    });
  }

  toJSON() {
    return {
      ...super.toJSON(),
      validationErrors: this.validationErrors,
    };
  }
}

/**
 * `_distinct_on` was requested without any other constraint
 */
export class DistinctOnWithoutFilterError extends ValidationError {
  constructor() {
    super(
      "Please, provide at least one filter beside '_distinct_on'",
      ResultsErrorCodes.DISTINCT_ON_WITHOUT_FILTER
    );
    this.name = 'DistinctOnWithoutFilterError';
  }
}

/**
 * A result-data key contained the reserved ':' separator
 */
export class InvalidDataKeyError extends ValidationError {
  public readonly key: string;

  constructor(key: string) {
    super(`Colon not allowed in key name: ${key}`, ResultsErrorCodes.INVALID_DATA_KEY, [
      { field: 'data', message: 'Colon not allowed in key name', value: key },
    ]);
    this.name = 'InvalidDataKeyError';
    this.key = key;
  }
}

/**
 * A submit_time or since value could not be understood
 */
export class InvalidTimestampError extends ValidationError {
  constructor(field: string, message: string, value: unknown) {
    super(message, ResultsErrorCodes.INVALID_TIMESTAMP, [{ field, message, value }]);
    this.name = 'InvalidTimestampError';
  }
}

// ============================================================================
// Not Found Errors
// ============================================================================

/**
 * Lookup by primary key with no match
 */
export class NotFoundError extends BaseError {
  public readonly resource: string;
  public readonly id: string;

  constructor(
    resource: string,
    id: string | number,
    code: ErrorCode = HttpErrorCodes.NOT_FOUND,
    context: ErrorContext = {}
  ) {
    super(`${resource} not found`, code, { ...context, details: { id: String(id) } }, true);
    this.name = 'NotFoundError';
    this.resource = resource;
    this.id = String(id);
  }

  static result(id: number): NotFoundError {
    return new NotFoundError('Result', id, ResultsErrorCodes.RESULT_NOT_FOUND);
  }

  static testcase(name: string): NotFoundError {
    return new NotFoundError('Testcase', name, ResultsErrorCodes.TESTCASE_NOT_FOUND);
  }

  static group(uuid: string): NotFoundError {
    return new NotFoundError('Group', uuid, ResultsErrorCodes.GROUP_NOT_FOUND);
  }
}
