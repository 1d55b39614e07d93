/**
 * Query Type Definitions
 * @module query/types
 *
 * Predicates, sort and paging produced by the filter parser and consumed by
 * the SQL builder and the in-memory evaluator alike.
 */

import type { Timestamp } from '../types/results.js';

// ============================================================================
// Predicates
// ============================================================================

/**
 * `in` matches any listed value exactly, `like` any listed pattern
 */
export type MatchOperator = 'in' | 'like';

/**
 * OR over `values`. Like patterns use `%` as the wildcard.
 */
export interface ValueMatch {
  readonly operator: MatchOperator;
  readonly values: readonly string[];
}

export interface OutcomePredicate {
  readonly kind: 'outcome';
  readonly match: ValueMatch;
}

export interface TestcasePredicate {
  readonly kind: 'testcases';
  readonly match: ValueMatch;
}

export interface GroupPredicate {
  readonly kind: 'groups';
  readonly match: ValueMatch;
}

export interface DataPredicate {
  readonly kind: 'data';
  readonly key: string;
  readonly match: ValueMatch;
}

/**
 * `from <= submit_time < until`; `until` null leaves the range open
 */
export interface SubmitTimePredicate {
  readonly kind: 'submit_time';
  readonly from: Timestamp;
  readonly until: Timestamp | null;
}

/**
 * Predicates combine with AND
 */
export type PredicateSpec =
  | OutcomePredicate
  | TestcasePredicate
  | GroupPredicate
  | DataPredicate
  | SubmitTimePredicate;

export type PredicateKind = PredicateSpec['kind'];

// ============================================================================
// Sort and Paging
// ============================================================================

export const SORT_FIELDS = ['submit_time', 'id'] as const;
export type SortField = typeof SORT_FIELDS[number];

export type SortDirection = 'asc' | 'desc';

/**
 * Ties on `submit_time` are broken by `id` in the same direction
 */
export interface SortSpec {
  readonly field: SortField;
  readonly direction: SortDirection;
}

export const DEFAULT_SORT: SortSpec = { field: 'submit_time', direction: 'desc' };

/**
 * Zero-based page of `limit` rows
 */
export interface PageRequest {
  readonly page: number;
  readonly limit: number;
}

export interface Page<T> {
  readonly items: T[];
  /** More rows exist after this page */
  readonly hasMore: boolean;
}

// ============================================================================
// Result Queries
// ============================================================================

export interface ParsedResultFilters {
  readonly predicates: PredicateSpec[];
  readonly sort: SortSpec;
  /** Result-data key partitioning latest resolution */
  readonly distinctOn: string | null;
}

export interface ResultQuery extends ParsedResultFilters {
  /** Keep only the newest result per (testcase, distinct value) */
  readonly latest: boolean;
  readonly page: PageRequest;
}

// ============================================================================
// Entity List Filters
// ============================================================================

/**
 * Column filter for testcase and group listings
 */
export interface ColumnFilter<TColumn extends string> {
  readonly column: TColumn;
  readonly match: ValueMatch;
}

export type TestcaseColumn = 'name';
export type GroupColumn = 'uuid' | 'description';
