/**
 * Result, Testcase and Group Schemas
 * @module routes/schemas/results
 *
 * Request bodies accepted by the POST endpoints.
 */

import { Type, Static } from '@sinclair/typebox';
import { NullableString } from './common.js';

// ============================================================================
// Results
// ============================================================================

const DataScalarSchema = Type.Union([Type.String(), Type.Number(), Type.Boolean(), Type.Null()]);

export const TestcaseBodySchema = Type.Object({
  name: Type.String(),
  ref_url: Type.Optional(NullableString),
});

export type TestcaseBody = Static<typeof TestcaseBodySchema>;

/**
 * Testcase object inside a result; a missing name is reported by submission
 * validation
 */
const TestcaseReferenceSchema = Type.Object({
  name: Type.Optional(Type.String()),
  ref_url: Type.Optional(NullableString),
});

export const GroupBodySchema = Type.Object({
  uuid: Type.Optional(Type.String({ minLength: 1 })),
  description: Type.Optional(NullableString),
  ref_url: Type.Optional(NullableString),
});

export type GroupBody = Static<typeof GroupBodySchema>;

export const ResultBodySchema = Type.Object({
  testcase: Type.Union([Type.String(), TestcaseReferenceSchema]),
  outcome: Type.String({ minLength: 1 }),
  note: Type.Optional(NullableString),
  ref_url: Type.Optional(NullableString),
  submit_time: Type.Optional(Type.Union([Type.String(), Type.Number(), Type.Null()])),
  groups: Type.Optional(Type.Union([Type.Array(Type.Union([Type.String(), GroupBodySchema])), Type.Null()])),
  data: Type.Optional(
    Type.Union([
      Type.Record(Type.String(), Type.Union([DataScalarSchema, Type.Array(DataScalarSchema)])),
      Type.Null(),
    ])
  ),
});

export type ResultBody = Static<typeof ResultBodySchema>;

// ============================================================================
// Parameters
// ============================================================================

export const ResultIdParamsSchema = Type.Object({
  id: Type.String({ pattern: '^[0-9]+$' }),
});

export type ResultIdParams = Static<typeof ResultIdParamsSchema>;

export const GroupUuidParamsSchema = Type.Object({
  uuid: Type.String(),
});

export type GroupUuidParams = Static<typeof GroupUuidParamsSchema>;

// ============================================================================
// Landing
// ============================================================================

export const LandingResponseSchema = Type.Object({
  outcomes: Type.Array(Type.String()),
  documentation: Type.String(),
});

export type LandingResponse = Static<typeof LandingResponseSchema>;
