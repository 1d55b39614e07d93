/**
 * Result Entity Type Definitions
 * @module types/results
 *
 * Normalized entities of the results store: testcases, groups, results and
 * the key/value data attached to a result.
 */

// ============================================================================
// Branded Types
// ============================================================================

/**
 * Naive UTC timestamp in canonical form `YYYY-MM-DDTHH:MM:SS.ffffff`.
 * The fixed width makes lexicographic order equal chronological order.
 * @example
 * const time = parseSubmitTime('2022-08-24T06:54:57.123456Z');
 */
export type Timestamp = string & { readonly __brand: 'Timestamp' };

// ============================================================================
// Entities
// ============================================================================

export interface Testcase {
  readonly name: string;
  readonly refUrl: string | null;
}

export interface Group {
  readonly uuid: string;
  readonly description: string | null;
  readonly refUrl: string | null;
}

export interface GroupWithCount extends Group {
  readonly resultsCount: number;
}

/**
 * One key/value attribute of a result; keys may repeat
 */
export interface ResultData {
  readonly key: string;
  readonly value: string;
}

export interface Result {
  readonly id: number;
  readonly testcase: Testcase;
  readonly outcome: string;
  readonly submitTime: Timestamp;
  readonly note: string | null;
  readonly refUrl: string | null;
  /** Group uuids, in the order they were attached */
  readonly groups: readonly string[];
  /** Data rows in insertion order */
  readonly data: readonly ResultData[];
}

// ============================================================================
// Commit Input
// ============================================================================

/**
 * Testcase reference inside a submission. A string `refUrl` overwrites the
 * stored value; undefined or null keeps it.
 */
export interface TestcaseReference {
  readonly name: string;
  readonly refUrl?: string | null;
}

/**
 * Group reference inside a submission. Description and refUrl are only
 * used when the group does not exist yet.
 */
export interface GroupReference {
  readonly uuid: string;
  readonly description?: string | null;
  readonly refUrl?: string | null;
}

/**
 * A validated result waiting to be committed
 */
export interface PendingResult {
  readonly testcase: TestcaseReference;
  readonly outcome: string;
  readonly submitTime: Timestamp;
  readonly note: string | null;
  readonly refUrl: string | null;
  readonly groups: readonly GroupReference[];
  readonly data: readonly ResultData[];
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Collects data rows into `{ key: [values] }`, preserving insertion order
 */
export function groupResultData(data: readonly ResultData[]): Record<string, string[]> {
  const grouped = new Map<string, string[]>();
  for (const { key, value } of data) {
    const values = grouped.get(key);
    if (values) {
      values.push(value);
    } else {
      grouped.set(key, [value]);
    }
  }
  return Object.fromEntries(grouped);
}

/**
 * Every value stored under `key`
 */
export function dataValues(result: Pick<Result, 'data'>, key: string): string[] {
  return result.data.filter((entry) => entry.key === key).map((entry) => entry.value);
}
