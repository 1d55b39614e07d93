/**
 * Latest-result resolver tests
 */

import { describe, it, expect } from 'vitest';
import { distinctValuesOf, resolveLatest } from '../latest-resolver.js';
import { matchesPredicates } from '../predicate-matcher.js';
import { parseResultFilters } from '../filter-parser.js';
import type { Result } from '../../types/results.js';
import { data, makeResult, ts } from '../../../tests/helpers/index.js';

function summary(results: readonly Result[]): [string | null, string, string][] {
  return results.map((result) => [
    result.data.find((entry) => entry.key === 'scenario')?.value ?? null,
    result.testcase.name,
    result.outcome,
  ]);
}

function tc(name: string): Result['testcase'] {
  return { name, refUrl: null };
}

describe('Latest Resolver', () => {
  const history = [
    makeResult({ id: 1, testcase: tc('tc_1'), submitTime: ts('2024-01-01T01:00:00'), data: data({ item: 'grub', scenario: 's_1' }) }),
    makeResult({ id: 2, testcase: tc('tc_2'), submitTime: ts('2024-01-01T02:00:00'), data: data({ item: 'grub', scenario: 's_1' }) }),
    makeResult({ id: 3, testcase: tc('tc_2'), submitTime: ts('2024-01-01T03:00:00'), data: data({ item: 'grub', scenario: 's_2' }) }),
    makeResult({ id: 4, testcase: tc('tc_3'), submitTime: ts('2024-01-01T04:00:00'), data: data({ item: 'grub' }) }),
    makeResult({ id: 5, testcase: tc('tc_1'), outcome: 'FAILED', submitTime: ts('2024-01-01T05:00:00'), data: data({ item: 'grub' }) }),
    makeResult({ id: 6, testcase: tc('tc_1'), outcome: 'INFO', submitTime: ts('2024-01-01T06:00:00'), data: data({ item: 'grub', scenario: 's_1' }) }),
    makeResult({ id: 7, testcase: tc('tc_1'), outcome: 'ERROR', submitTime: ts('2024-01-01T07:00:00'), data: data({ item: 'bash', scenario: 's_1' }) }),
  ];

  it('should keep the newest result per testcase and scenario, absent values grouped apart', () => {
    const { predicates } = parseResultFilters({ item: 'grub' });
    const candidates = history.filter((result) => matchesPredicates(result, predicates));

    expect(summary(resolveLatest(candidates, 'scenario'))).toEqual([
      ['s_1', 'tc_1', 'INFO'],
      [null, 'tc_1', 'FAILED'],
      [null, 'tc_3', 'PASSED'],
      ['s_2', 'tc_2', 'PASSED'],
      ['s_1', 'tc_2', 'PASSED'],
    ]);
  });

  it('should keep one result per testcase without a distinct key', () => {
    const latest = resolveLatest(history, null);
    expect(latest.map((result) => result.id)).toEqual([7, 4, 3]);
  });

  it('should apply the requested output order', () => {
    const latest = resolveLatest(history, null, { field: 'id', direction: 'asc' });
    expect(latest.map((result) => result.id)).toEqual([3, 4, 7]);
  });

  it('should break submit time ties by the greater id', () => {
    const same = ts('2024-02-01T00:00:00');
    const latest = resolveLatest(
      [makeResult({ id: 10, submitTime: same }), makeResult({ id: 11, submitTime: same })],
      null
    );
    expect(latest.map((result) => result.id)).toEqual([11]);
  });

  it('should let a multi-valued result compete in every group and appear once', () => {
    const both = makeResult({ id: 20, submitTime: ts('2024-02-02'), data: data({ scenario: ['a', 'b'] }) });
    const onlyA = makeResult({ id: 21, submitTime: ts('2024-02-03'), data: data({ scenario: 'a' }) });

    const latest = resolveLatest([both, onlyA], 'scenario');
    expect(latest.map((result) => result.id)).toEqual([21, 20]);

    const alone = resolveLatest([both], 'scenario');
    expect(alone.map((result) => result.id)).toEqual([20]);
  });

  it('should group an empty value apart from an absent key', () => {
    const empty = makeResult({ id: 30, submitTime: ts('2024-02-01'), data: data({ scenario: '' }) });
    const absent = makeResult({ id: 31, submitTime: ts('2024-02-02') });

    expect(distinctValuesOf(empty, 'scenario')).toEqual(['']);
    expect(distinctValuesOf(absent, 'scenario')).toEqual([null]);
    expect(resolveLatest([empty, absent], 'scenario').map((result) => result.id)).toEqual([31, 30]);
  });
});
