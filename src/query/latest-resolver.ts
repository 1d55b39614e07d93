/**
 * Latest-Result Resolver
 * @module query/latest-resolver
 *
 * Keeps the newest result per (testcase, value of the `distinctOn` data key).
 *
 * A result without the key forms its own "no value" group for its testcase.
 * A result carrying several values of the key competes in every one of
 * those groups. The newest result is the one with the greatest submit time,
 * then the greatest id. Survivors are returned once each, in `sort` order.
 */

import type { Result } from '../types/results.js';
import type { SortSpec } from './types.js';
import { DEFAULT_SORT } from './types.js';
import { compareResults } from './predicate-matcher.js';

const NEWEST_FIRST: SortSpec = { field: 'submit_time', direction: 'desc' };

/**
 * Group keys a result belongs to. `null` stands for "key absent".
 */
export function distinctValuesOf(result: Result, distinctOn: string | null): (string | null)[] {
  if (distinctOn === null) {
    return [null];
  }
  const values = result.data.filter((entry) => entry.key === distinctOn).map((entry) => entry.value);
  return values.length === 0 ? [null] : [...new Set(values)];
}

function groupKey(testcase: string, value: string | null): string {
  return JSON.stringify([testcase, value]);
}

/**
 * Resolve latest results from an already filtered candidate set
 */
export function resolveLatest(
  candidates: readonly Result[],
  distinctOn: string | null,
  sort: SortSpec = DEFAULT_SORT
): Result[] {
  const survivors = new Map<string, Result>();

  for (const candidate of candidates) {
    for (const value of distinctValuesOf(candidate, distinctOn)) {
      const key = groupKey(candidate.testcase.name, value);
      const current = survivors.get(key);
      if (!current || compareResults(candidate, current, NEWEST_FIRST) < 0) {
        survivors.set(key, candidate);
      }
    }
  }

  const unique = new Map<number, Result>();
  for (const survivor of survivors.values()) {
    unique.set(survivor.id, survivor);
  }
  return [...unique.values()].sort((a, b) => compareResults(a, b, sort));
}
