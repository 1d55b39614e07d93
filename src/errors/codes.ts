/**
 * Error Codes Enumeration
 * @module errors/codes
 *
 * Centralized error codes for the results service. Every code maps to the
 * HTTP status the API reports it with.
 */

// ============================================================================
// Error Code Categories
// ============================================================================

/**
 * HTTP/API Error Codes (4xx, 5xx mapped)
 */
export const HttpErrorCodes = {
  // 400 Bad Request
  BAD_REQUEST: 'BAD_REQUEST',
  VALIDATION_ERROR: 'VALIDATION_ERROR',

  // 404 Not Found
  NOT_FOUND: 'NOT_FOUND',
  ROUTE_NOT_FOUND: 'ROUTE_NOT_FOUND',

  // 429 Too Many Requests
  RATE_LIMITED: 'RATE_LIMITED',

  // 500 Internal Server Error
  INTERNAL_ERROR: 'INTERNAL_ERROR',

  // 503 Service Unavailable
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
} as const;

export type HttpErrorCode = typeof HttpErrorCodes[keyof typeof HttpErrorCodes];

/**
 * Filter and submission validation codes
 */
export const ResultsErrorCodes = {
  INVALID_FILTER: 'INVALID_FILTER',
  INVALID_SORT: 'INVALID_SORT',
  INVALID_TIMESTAMP: 'INVALID_TIMESTAMP',
  DISTINCT_ON_WITHOUT_FILTER: 'DISTINCT_ON_WITHOUT_FILTER',
  INVALID_DATA_KEY: 'INVALID_DATA_KEY',
  INVALID_TESTCASE: 'INVALID_TESTCASE',
  UNKNOWN_OUTCOME: 'UNKNOWN_OUTCOME',
  RESULT_NOT_FOUND: 'RESULT_NOT_FOUND',
  TESTCASE_NOT_FOUND: 'TESTCASE_NOT_FOUND',
  GROUP_NOT_FOUND: 'GROUP_NOT_FOUND',
} as const;

export type ResultsErrorCode = typeof ResultsErrorCodes[keyof typeof ResultsErrorCodes];

/**
 * Storage Error Codes
 */
export const StorageErrorCodes = {
  DATABASE_ERROR: 'DATABASE_ERROR',
  CONNECTION_ERROR: 'CONNECTION_ERROR',
  QUERY_ERROR: 'QUERY_ERROR',
  TRANSACTION_ERROR: 'TRANSACTION_ERROR',
  MIGRATION_ERROR: 'MIGRATION_ERROR',
} as const;

export type StorageErrorCode = typeof StorageErrorCodes[keyof typeof StorageErrorCodes];

/**
 * Messaging and configuration codes
 */
export const SystemErrorCodes = {
  PUBLISH_FAILED: 'PUBLISH_FAILED',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
} as const;

export type SystemErrorCode = typeof SystemErrorCodes[keyof typeof SystemErrorCodes];

// ============================================================================
// Combined Error Codes
// ============================================================================

export const ErrorCodes = {
  ...HttpErrorCodes,
  ...ResultsErrorCodes,
  ...StorageErrorCodes,
  ...SystemErrorCodes,
} as const;

export type ErrorCode =
  | HttpErrorCode
  | ResultsErrorCode
  | StorageErrorCode
  | SystemErrorCode;

// ============================================================================
// HTTP Status Mapping
// ============================================================================

export const errorCodeToHttpStatus: Record<ErrorCode, number> = {
  [HttpErrorCodes.BAD_REQUEST]: 400,
  [HttpErrorCodes.VALIDATION_ERROR]: 400,
  [HttpErrorCodes.NOT_FOUND]: 404,
  [HttpErrorCodes.ROUTE_NOT_FOUND]: 404,
  [HttpErrorCodes.RATE_LIMITED]: 429,
  [HttpErrorCodes.INTERNAL_ERROR]: 500,
  [HttpErrorCodes.SERVICE_UNAVAILABLE]: 503,

  [ResultsErrorCodes.INVALID_FILTER]: 400,
  [ResultsErrorCodes.INVALID_SORT]: 400,
  [ResultsErrorCodes.INVALID_TIMESTAMP]: 400,
  [ResultsErrorCodes.DISTINCT_ON_WITHOUT_FILTER]: 400,
  [ResultsErrorCodes.INVALID_DATA_KEY]: 400,
  [ResultsErrorCodes.INVALID_TESTCASE]: 400,
  [ResultsErrorCodes.UNKNOWN_OUTCOME]: 400,
  [ResultsErrorCodes.RESULT_NOT_FOUND]: 404,
  [ResultsErrorCodes.TESTCASE_NOT_FOUND]: 404,
  [ResultsErrorCodes.GROUP_NOT_FOUND]: 404,

  [StorageErrorCodes.DATABASE_ERROR]: 500,
  [StorageErrorCodes.CONNECTION_ERROR]: 503,
  [StorageErrorCodes.QUERY_ERROR]: 500,
  [StorageErrorCodes.TRANSACTION_ERROR]: 500,
  [StorageErrorCodes.MIGRATION_ERROR]: 500,

  [SystemErrorCodes.PUBLISH_FAILED]: 502,
  [SystemErrorCodes.CONFIGURATION_ERROR]: 500,
};

/**
 * Get HTTP status code for an error code
 */
export function getHttpStatusForCode(code: ErrorCode): number {
  return errorCodeToHttpStatus[code] ?? 500;
}

/**
 * Check if an error code represents a client error (4xx)
 */
export function isClientError(code: ErrorCode): boolean {
  const status = getHttpStatusForCode(code);
  return status >= 400 && status < 500;
}

/**
 * Check if an error should be retried
 */
export function isRetryableError(code: ErrorCode): boolean {
  const retryableCodes: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
    HttpErrorCodes.SERVICE_UNAVAILABLE,
    StorageErrorCodes.CONNECTION_ERROR,
    SystemErrorCodes.PUBLISH_FAILED,
  ]);
  return retryableCodes.has(code);
}
