/**
 * Common API Schemas
 * @module routes/schemas/common
 *
 * Shared TypeBox schemas and the paging helpers every listing uses.
 */

import { Type, Static } from '@sinclair/typebox';
import { HttpErrorCodes, ValidationError } from '../../errors/index.js';
import type { PageRequest } from '../../query/types.js';

// ============================================================================
// Error Schemas
// ============================================================================

/**
 * API Error response schema
 */
export const ErrorResponseSchema = Type.Object({
  statusCode: Type.Number({ description: 'HTTP status code' }),
  error: Type.String({ description: 'Error type' }),
  message: Type.String({ description: 'Human-readable error message' }),
  code: Type.String({ description: 'Error code for programmatic handling' }),
  details: Type.Optional(Type.Unknown({ description: 'Additional error details' })),
  validationErrors: Type.Optional(
    Type.Array(
      Type.Object({
        field: Type.String(),
        message: Type.String(),
        value: Type.Optional(Type.Unknown()),
      })
    )
  ),
  requestId: Type.String(),
  timestamp: Type.String(),
});

export type ErrorResponse = Static<typeof ErrorResponseSchema>;

// ============================================================================
// Query Schemas
// ============================================================================

/**
 * Listing query strings: free-form filters plus `page` and `limit`
 */
export const FilterQuerySchema = Type.Record(Type.String(), Type.String());

export type FilterQuery = Static<typeof FilterQuerySchema>;

export const NullableString = Type.Union([Type.String(), Type.Null()]);

/**
 * Message-only response used by the health check
 */
export const MessageResponseSchema = Type.Object({
  message: Type.String(),
});

export type MessageResponse = Static<typeof MessageResponseSchema>;

// ============================================================================
// Paging
// ============================================================================

const NON_NEGATIVE_INTEGER = /^\d+$/;

function parseInteger(raw: string | undefined, name: string, fallback: number, minimum: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (!NON_NEGATIVE_INTEGER.test(trimmed) || value < minimum) {
    throw ValidationError.forField(
      name,
      `${name} must be an integer greater than or equal to ${minimum}, got '${raw}'`,
      HttpErrorCodes.BAD_REQUEST,
      raw
    );
  }
  return value;
}

/**
 * Zero-based `page` and `limit` from a query string
 */
export function parsePageRequest(query: Readonly<Record<string, string | undefined>>, defaultLimit: number): PageRequest {
  return {
    page: parseInteger(query.page, 'page', 0, 0),
    limit: parseInteger(query.limit, 'limit', defaultLimit, 1),
  };
}
