/**
 * Filter Parser
 * @module query/filter-parser
 *
 * Turns raw query parameters into typed predicates.
 *
 * - `key=a,b` matches a OR b exactly, `key:like=a*,*b` matches either pattern
 * - distinct keys combine with AND
 * - `since=t1` means submitted at or after t1, `since=t1,t2` means [t1, t2)
 * - `_sort=asc:<field>|desc:<field>` and `_distinct_on=<data key>` are controls
 * - empty values and unknown keys add no constraint
 */

import { ValidationError, InvalidTimestampError, ResultsErrorCodes } from '../errors/index.js';
import { parseIsoTimestamp } from '../utils/time.js';
import {
  ColumnFilter,
  DEFAULT_SORT,
  MatchOperator,
  ParsedResultFilters,
  PredicateSpec,
  SORT_FIELDS,
  SortField,
  SortSpec,
  SubmitTimePredicate,
  ValueMatch,
} from './types.js';

/**
 * Raw query parameters, one (possibly comma separated) value per key
 */
export type RawFilters = Readonly<Record<string, string | undefined>>;

export interface FilterParserOptions {
  /** Sort used when `_sort` is absent */
  defaultSort?: SortSpec;
  /** Keys handled elsewhere (paging, transport) */
  ignoredKeys?: readonly string[];
}

export const LIKE_SUFFIX = ':like';
export const SORT_KEY = '_sort';
export const DISTINCT_ON_KEY = '_distinct_on';
export const SINCE_KEY = 'since';
export const DEFAULT_IGNORED_KEYS: readonly string[] = ['page', 'limit', 'callback'];

// ============================================================================
// Value Helpers
// ============================================================================

/**
 * `*` is the user-facing wildcard, `%` the stored pattern's
 */
export function toLikePattern(value: string): string {
  return value.replaceAll('*', '%');
}

function splitValues(raw: string): string[] {
  return raw
    .split(',')
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}

/**
 * Build the OR-list for a raw value; null when nothing is left to match
 */
export function parseValueMatch(raw: string, operator: MatchOperator): ValueMatch | null {
  const values = splitValues(raw);
  if (values.length === 0) {
    return null;
  }
  return {
    operator,
    values: operator === 'like' ? values.map(toLikePattern) : values,
  };
}

interface FilterKey {
  name: string;
  operator: MatchOperator;
}

/**
 * `item` -> in, `item:like` -> like, any other suffix -> null
 */
function splitFilterKey(rawKey: string): FilterKey | null {
  const key = rawKey.trim();
  if (key.endsWith(LIKE_SUFFIX)) {
    const name = key.slice(0, -LIKE_SUFFIX.length);
    return name.includes(':') ? null : { name, operator: 'like' };
  }
  return key.includes(':') ? null : { name: key, operator: 'in' };
}

// ============================================================================
// Control Parsers
// ============================================================================

function isSortField(value: string): value is SortField {
  return SORT_FIELDS.some((field) => field === value);
}

/**
 * Parse `asc:<field>` or `desc:<field>`
 *
 * @throws ValidationError for any other shape or an unknown field
 */
export function parseSort(raw: string): SortSpec {
  const [direction, field, ...rest] = raw.trim().split(':');
  if (
    rest.length === 0 &&
    (direction === 'asc' || direction === 'desc') &&
    field !== undefined &&
    isSortField(field)
  ) {
    return { field, direction };
  }
  throw ValidationError.forField(
    SORT_KEY,
    `Invalid _sort value '${raw}': expected 'asc:<field>' or 'desc:<field>' with field one of: ${SORT_FIELDS.join(', ')}`,
    ResultsErrorCodes.INVALID_SORT,
    raw
  );
}

/**
 * Parse one or two comma separated ISO-8601 timestamps
 *
 * @throws InvalidTimestampError when a value is not ISO-8601 or more than two are given
 */
export function parseSince(raw: string): SubmitTimePredicate {
  const parts = raw.split(',').map((part) => part.trim());
  if (parts.length > 2) {
    throw new InvalidTimestampError(
      SINCE_KEY,
      `Invalid since value '${raw}': expected one or two comma separated timestamps`,
      raw
    );
  }

  const [fromText = '', untilText] = parts;
  const from = parseIsoTimestamp(fromText);
  if (from === null) {
    throw new InvalidTimestampError(SINCE_KEY, `Invalid ISO-8601 timestamp in since: '${fromText}'`, raw);
  }

  if (untilText === undefined || untilText === '') {
    return { kind: 'submit_time', from, until: null };
  }
  const until = parseIsoTimestamp(untilText);
  if (until === null) {
    throw new InvalidTimestampError(SINCE_KEY, `Invalid ISO-8601 timestamp in since: '${untilText}'`, raw);
  }
  return { kind: 'submit_time', from, until };
}

function parseDistinctOn(raw: string): string {
  const key = raw.trim();
  if (key.includes(':') || key.includes(',')) {
    throw ValidationError.forField(
      DISTINCT_ON_KEY,
      `Invalid _distinct_on value '${raw}': expected a single result data key`,
      ResultsErrorCodes.INVALID_FILTER,
      raw
    );
  }
  return key;
}

// ============================================================================
// Result Filters
// ============================================================================

function toPredicate(name: string, match: ValueMatch): PredicateSpec | null {
  switch (name) {
    case 'outcome':
      return { kind: 'outcome', match };
    case 'testcases':
      return { kind: 'testcases', match };
    case 'groups':
      return { kind: 'groups', match };
    case SINCE_KEY:
      // `since` only takes a time range; `since:like` adds no constraint
      return null;
    default:
      // Remaining keys address result data; reserved-looking keys are ignored
      return name.startsWith('_') || name.length === 0 ? null : { kind: 'data', key: name, match };
  }
}

/**
 * Parse result filters from raw query parameters
 *
 * @example
 * parseResultFilters({ item: 'grub', 'outcome': 'PASSED,FAILED', _sort: 'asc:submit_time' });
 *
 * @throws ValidationError on a malformed `since`, `_sort` or `_distinct_on`
 */
export function parseResultFilters(
  raw: RawFilters,
  options: FilterParserOptions = {}
): ParsedResultFilters {
  const ignored = new Set(options.ignoredKeys ?? DEFAULT_IGNORED_KEYS);
  const predicates: PredicateSpec[] = [];
  let sort = options.defaultSort ?? DEFAULT_SORT;
  let distinctOn: string | null = null;

  for (const [rawKey, rawValue] of Object.entries(raw)) {
    const value = rawValue?.trim();
    if (value === undefined || value === '' || ignored.has(rawKey)) {
      continue;
    }

    if (rawKey === SORT_KEY) {
      sort = parseSort(value);
      continue;
    }
    if (rawKey === DISTINCT_ON_KEY) {
      distinctOn = parseDistinctOn(value);
      continue;
    }
    if (rawKey === SINCE_KEY) {
      predicates.push(parseSince(value));
      continue;
    }

    const key = splitFilterKey(rawKey);
    const match = key ? parseValueMatch(value, key.operator) : null;
    const predicate = key && match ? toPredicate(key.name, match) : null;
    if (predicate) {
      predicates.push(predicate);
    }
  }

  return { predicates, sort, distinctOn };
}

// ============================================================================
// Entity List Filters
// ============================================================================

/**
 * Parse `column` / `column:like` filters for testcase and group listings
 */
export function parseColumnFilters<TColumn extends string>(
  raw: RawFilters,
  columns: readonly TColumn[]
): ColumnFilter<TColumn>[] {
  const filters: ColumnFilter<TColumn>[] = [];

  for (const [rawKey, rawValue] of Object.entries(raw)) {
    const key = splitFilterKey(rawKey);
    const column = columns.find((candidate) => candidate === key?.name);
    if (!key || column === undefined || rawValue === undefined) {
      continue;
    }
    const match = parseValueMatch(rawValue, key.operator);
    if (match) {
      filters.push({ column, match });
    }
  }

  return filters;
}
