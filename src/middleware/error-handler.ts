/**
 * Global Error Handler Middleware
 * @module middleware/error-handler
 *
 * Maps domain, storage and Fastify errors to one JSON error shape and logs
 * them by severity.
 */

import { FastifyInstance, FastifyError, FastifyRequest, FastifyReply } from 'fastify';
import fp from 'fastify-plugin';
import {
  HttpErrorCodes,
  ValidationError,
  isBaseError,
} from '../errors/index.js';
import type { ValidationFieldError } from '../errors/index.js';
import { createModuleLogger } from '../logging/logger.js';

const logger = createModuleLogger('error-handler');

// ============================================================================
// Error Response Types
// ============================================================================

export interface ErrorResponse {
  statusCode: number;
  error: string;
  message: string;
  code: string;
  details?: unknown;
  validationErrors?: ValidationFieldError[];
  requestId: string;
  timestamp: string;
}

const GENERIC_SERVER_MESSAGE = 'An unexpected error occurred';

/**
 * Get HTTP error name from status code
 */
export function getHttpErrorName(statusCode: number): string {
  const names: Record<number, string> = {
    400: 'Bad Request',
    404: 'Not Found',
    405: 'Method Not Allowed',
    413: 'Payload Too Large',
    415: 'Unsupported Media Type',
    429: 'Too Many Requests',
    500: 'Internal Server Error',
    502: 'Bad Gateway',
    503: 'Service Unavailable',
  };
  return names[statusCode] ?? 'Error';
}

// ============================================================================
// Error Formatting
// ============================================================================

/**
 * Format error for response. Server errors that are not operational never
 * leak their message.
 */
export function formatError(error: FastifyError | Error, requestId: string): ErrorResponse {
  const timestamp = new Date().toISOString();

  if (isBaseError(error)) {
    const response: ErrorResponse = {
      statusCode: error.statusCode,
      error: getHttpErrorName(error.statusCode),
      message: error.statusCode >= 500 && !error.isOperational ? GENERIC_SERVER_MESSAGE : error.message,
      code: error.code,
      requestId,
      timestamp: error.timestamp.toISOString(),
    };
    if (error.context.details !== undefined && error.statusCode < 500) {
      response.details = error.context.details;
    }
    if (error instanceof ValidationError && error.validationErrors.length > 0) {
      response.validationErrors = error.validationErrors;
    }
    return response;
  }

  // Fastify schema validation
  if ('validation' in error && error.validation) {
    return {
      statusCode: 400,
      error: 'Bad Request',
      message: error.message,
      code: HttpErrorCodes.VALIDATION_ERROR,
      details: error.validation,
      requestId,
      timestamp,
    };
  }

  // Fastify and plugin errors carrying a status (rate limit, body parsing)
  if ('statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
    return {
      statusCode: error.statusCode,
      error: getHttpErrorName(error.statusCode),
      message: error.message,
      code: 'code' in error && typeof error.code === 'string' ? error.code : HttpErrorCodes.BAD_REQUEST,
      requestId,
      timestamp,
    };
  }

  return {
    statusCode: 500,
    error: 'Internal Server Error',
    message: GENERIC_SERVER_MESSAGE,
    code: HttpErrorCodes.INTERNAL_ERROR,
    requestId,
    timestamp,
  };
}

// ============================================================================
// Error Handler Plugin
// ============================================================================

export interface ErrorHandlerOptions {
  /** Log handled errors */
  logErrors?: boolean;
}

async function errorHandlerPlugin(
  fastify: FastifyInstance,
  options: ErrorHandlerOptions
): Promise<void> {
  const logErrors = options.logErrors ?? true;

  fastify.setErrorHandler(async (error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
    const formatted = formatError(error, request.id);

    if (logErrors) {
      const logContext = {
        err: error,
        requestId: request.id,
        method: request.method,
        url: request.url,
        statusCode: formatted.statusCode,
        code: formatted.code,
      };

      if (formatted.statusCode >= 500) {
        logger.error(logContext, 'Server error');
      } else {
        logger.warn(logContext, 'Client error');
      }
    }

    return reply.status(formatted.statusCode).send(formatted);
  });

  fastify.setNotFoundHandler(async (request: FastifyRequest, reply: FastifyReply) => {
    if (logErrors) {
      logger.warn({ method: request.method, url: request.url, requestId: request.id }, 'Route not found');
    }

    const response: ErrorResponse = {
      statusCode: 404,
      error: 'Not Found',
      message: `Route ${request.method} ${request.url} not found`,
      code: HttpErrorCodes.ROUTE_NOT_FOUND,
      requestId: request.id,
      timestamp: new Date().toISOString(),
    };
    return reply.status(404).send(response);
  });
}

export default fp(errorHandlerPlugin, {
  name: 'error-handler',
  fastify: '4.x',
});
