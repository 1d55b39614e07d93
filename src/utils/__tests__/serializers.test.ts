/**
 * Serializer tests
 */

import { describe, it, expect } from 'vitest';
import { Serializer, testcasePath } from '../serializers.js';
import { API_ROOT, data, makeResult, ts } from '../../../tests/helpers/index.js';

describe('Serializer', () => {
  const serializer = new Serializer(`${API_ROOT}/`);

  it('should keep slashes readable in testcase paths', () => {
    expect(testcasePath('compose/install x')).toBe('/testcases/compose/install%20x');
  });

  it('should serialize testcases', () => {
    expect(serializer.testcase({ name: 'dist.rpmlint', refUrl: 'https://ci.test/rpmlint' })).toEqual({
      name: 'dist.rpmlint',
      ref_url: 'https://ci.test/rpmlint',
      href: `${API_ROOT}/testcases/dist.rpmlint`,
    });
  });

  it('should serialize groups with a link to their results', () => {
    expect(
      serializer.group({ uuid: 'g-1', description: 'nightly', refUrl: null, resultsCount: 2 })
    ).toEqual({
      uuid: 'g-1',
      description: 'nightly',
      ref_url: null,
      href: `${API_ROOT}/groups/g-1`,
      results_count: 2,
      results: `${API_ROOT}/results?groups=g-1`,
    });
  });

  it('should serialize results with grouped data', () => {
    const result = makeResult({
      id: 5,
      submitTime: ts('2024-01-01T00:00:00.5'),
      groups: ['g-1'],
      note: 'flaky',
      data: data({ item: ['a', 'b'], arch: 'x86_64' }),
    });

    expect(serializer.result(result)).toEqual({
      id: 5,
      groups: ['g-1'],
      testcase: { name: 'tc_1', ref_url: null, href: `${API_ROOT}/testcases/tc_1` },
      submit_time: '2024-01-01T00:00:00.500000',
      outcome: 'PASSED',
      note: 'flaky',
      ref_url: null,
      data: { item: ['a', 'b'], arch: ['x86_64'] },
      href: `${API_ROOT}/results/5`,
    });
  });

  describe('pageLinks', () => {
    it('should link neighbouring pages keeping other parameters', () => {
      expect(serializer.pageLinks('/results', { item: 'grub', page: '1', limit: '2' }, 1, true)).toEqual({
        prev: `${API_ROOT}/results?item=grub&limit=2&page=0`,
        next: `${API_ROOT}/results?item=grub&limit=2&page=2`,
      });
    });

    it('should encode filter keys', () => {
      expect(serializer.pageLinks('/results', { 'item:like': '*rub' }, 0, true).next).toBe(
        `${API_ROOT}/results?item%3Alike=*rub&page=1`
      );
    });

    it('should omit links past either end', () => {
      expect(serializer.pageLinks('/results', {}, 0, false)).toEqual({ prev: null, next: null });
    });
  });
});
