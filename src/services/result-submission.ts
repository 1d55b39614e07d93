/**
 * Result Submission
 * @module services/result-submission
 *
 * Turns a submitted result body into a PendingResult: testcase and group
 * references are normalized, data values stringified and `submit_time`
 * canonicalized.
 */

import { v4 as uuidv4 } from 'uuid';
import type { GroupReference, PendingResult, ResultData, TestcaseReference } from '../types/results.js';
import { parseSubmitTime } from '../utils/time.js';
import { InvalidDataKeyError, ResultsErrorCodes, ValidationError } from '../errors/index.js';

// ============================================================================
// Submission Shape
// ============================================================================

export type DataScalar = string | number | boolean | null;

export interface TestcaseSubmission {
  name?: string;
  ref_url?: string | null;
}

export interface GroupSubmission {
  uuid?: string;
  description?: string | null;
  ref_url?: string | null;
}

export interface ResultSubmission {
  testcase: string | TestcaseSubmission;
  outcome: string;
  note?: string | null;
  ref_url?: string | null;
  submit_time?: string | number | null;
  groups?: (string | GroupSubmission)[] | null;
  data?: Record<string, DataScalar | DataScalar[]> | null;
}

export interface SubmissionOptions {
  /** When set, outcomes outside this list are rejected */
  allowedOutcomes?: readonly string[];
  clock?: () => Date;
  generateUuid?: () => string;
}

// ============================================================================
// Normalization
// ============================================================================

function toTestcaseReference(testcase: ResultSubmission['testcase']): TestcaseReference {
  return typeof testcase === 'string'
    ? { name: testcase }
    : { name: testcase.name ?? '', refUrl: testcase.ref_url };
}

function toGroupReferences(
  groups: ResultSubmission['groups'],
  generateUuid: () => string
): GroupReference[] {
  return (groups ?? []).map((group) =>
    typeof group === 'string'
      ? { uuid: group }
      : { uuid: group.uuid ?? generateUuid(), description: group.description, refUrl: group.ref_url }
  );
}

/**
 * Scalars are stored as strings; null entries carry no value and are dropped
 */
function toResultData(data: ResultSubmission['data']): ResultData[] {
  const entries: ResultData[] = [];
  for (const [key, raw] of Object.entries(data ?? {})) {
    const values = Array.isArray(raw) ? raw : [raw];
    for (const value of values) {
      if (value !== null) {
        entries.push({ key, value: String(value) });
      }
    }
  }
  return entries;
}

/**
 * Rejections that must happen before anything is persisted
 */
export function validatePendingResult(pending: Pick<PendingResult, 'testcase' | 'data'>): void {
  if (pending.testcase.name.length === 0) {
    throw ValidationError.forField(
      'testcase',
      'testcase name must be non-empty',
      ResultsErrorCodes.INVALID_TESTCASE
    );
  }

  const badKey = pending.data.find((entry) => entry.key.includes(':'));
  if (badKey) {
    throw new InvalidDataKeyError(badKey.key);
  }
}

export function toPendingResult(submission: ResultSubmission, options: SubmissionOptions = {}): PendingResult {
  const { allowedOutcomes } = options;
  if (allowedOutcomes && !allowedOutcomes.includes(submission.outcome)) {
    throw ValidationError.forField(
      'outcome',
      `must be one of: ${allowedOutcomes.join(', ')}`,
      ResultsErrorCodes.UNKNOWN_OUTCOME,
      submission.outcome
    );
  }

  const pending: PendingResult = {
    testcase: toTestcaseReference(submission.testcase),
    outcome: submission.outcome,
    submitTime: parseSubmitTime(submission.submit_time, options.clock),
    note: submission.note ?? null,
    refUrl: submission.ref_url ?? null,
    groups: toGroupReferences(submission.groups, options.generateUuid ?? uuidv4),
    data: toResultData(submission.data),
  };

  validatePendingResult(pending);
  return pending;
}
