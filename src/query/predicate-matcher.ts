/**
 * In-memory predicate evaluation
 * @module query/predicate-matcher
 *
 * Evaluates predicates against hydrated results with the same semantics as
 * the SQL the query builder emits.
 */

import type { Result } from '../types/results.js';
import type { ColumnFilter, PredicateSpec, SortSpec, ValueMatch } from './types.js';

/** Compiled LIKE patterns kept, oldest evicted first */
export const MAX_CACHED_PATTERNS = 256;

const patternCache = new Map<string, RegExp>();

export function cachedPatternCount(): number {
  return patternCache.size;
}

/**
 * Compile a LIKE pattern (`%` any run, `_` any single character)
 */
export function likePatternToRegExp(pattern: string): RegExp {
  const cached = patternCache.get(pattern);
  if (cached) {
    return cached;
  }
  const source = Array.from(pattern, (char) => {
    if (char === '%') return '.*';
    if (char === '_') return '.';
    return char.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  }).join('');
  const compiled = new RegExp(`^${source}$`, 's');
  if (patternCache.size >= MAX_CACHED_PATTERNS) {
    const [oldest] = patternCache.keys();
    if (oldest !== undefined) {
      patternCache.delete(oldest);
    }
  }
  patternCache.set(pattern, compiled);
  return compiled;
}

export function matchesValue(match: ValueMatch, value: string): boolean {
  return match.operator === 'in'
    ? match.values.includes(value)
    : match.values.some((pattern) => likePatternToRegExp(pattern).test(value));
}

function predicateValues(
  result: Result,
  predicate: Exclude<PredicateSpec, { kind: 'submit_time' }>
): readonly string[] {
  switch (predicate.kind) {
    case 'outcome':
      return [result.outcome];
    case 'testcases':
      return [result.testcase.name];
    case 'groups':
      return result.groups;
    case 'data':
      return result.data.filter((entry) => entry.key === predicate.key).map((entry) => entry.value);
  }
}

/**
 * True when the result satisfies every predicate; each predicate may be
 * satisfied by a different value of the same relation
 */
export function matchesPredicates(result: Result, predicates: readonly PredicateSpec[]): boolean {
  return predicates.every((predicate) => {
    if (predicate.kind === 'submit_time') {
      return (
        result.submitTime >= predicate.from && (predicate.until === null || result.submitTime < predicate.until)
      );
    }
    return predicateValues(result, predicate).some((value) => matchesValue(predicate.match, value));
  });
}

/**
 * Column filters over a plain entity; a null column never matches
 */
export function matchesColumnFilters<TColumn extends string>(
  entity: Readonly<Record<TColumn, string | null>>,
  filters: readonly ColumnFilter<TColumn>[]
): boolean {
  return filters.every(({ column, match }) => {
    const value = entity[column];
    return value !== null && matchesValue(match, value);
  });
}

/**
 * Comparator for a sort order; `submit_time` ties fall back to `id`
 */
export function compareResults(
  a: Pick<Result, 'id' | 'submitTime'>,
  b: Pick<Result, 'id' | 'submitTime'>,
  sort: SortSpec
): number {
  let order = 0;
  if (sort.field === 'submit_time' && a.submitTime !== b.submitTime) {
    order = a.submitTime < b.submitTime ? -1 : 1;
  } else {
    order = a.id - b.id;
  }
  return sort.direction === 'asc' ? order : -order;
}
