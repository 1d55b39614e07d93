/**
 * Result service tests on the in-memory store
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ResultService } from '../result-service.js';
import { MemoryResultStore } from '../../repositories/memory-store.js';
import { DistinctOnWithoutFilterError, NotFoundError, ValidationError } from '../../errors/index.js';
import { parseResultFilters } from '../../query/filter-parser.js';
import type { ResultQuery } from '../../query/types.js';
import { createMockEventEmitter, type MockEventEmitter } from '../../../tests/mocks/index.js';
import { data, makePending, ts } from '../../../tests/helpers/index.js';

function query(raw: Record<string, string>, latest = false): ResultQuery {
  return { ...parseResultFilters(raw), latest, page: { page: 0, limit: 20 } };
}

describe('ResultService', () => {
  let store: MemoryResultStore;
  let events: MockEventEmitter;
  let service: ResultService;

  beforeEach(() => {
    store = new MemoryResultStore();
    events = createMockEventEmitter();
    service = new ResultService(store, events);
  });

  describe('commitResult', () => {
    it('should persist the result and announce it', async () => {
      const result = await service.commitResult(
        makePending({ groups: [{ uuid: 'g-1' }, { uuid: 'g-1' }], data: data({ item: 'grub' }) })
      );

      expect(result.id).toBe(1);
      expect(result.groups).toEqual(['g-1']);
      expect(await store.groups.findByUuid('g-1')).toEqual({
        uuid: 'g-1',
        description: null,
        refUrl: null,
        resultsCount: 1,
      });
      expect(events.publish).toHaveBeenCalledWith(result);
    });

    it('should not wait for or fail on the publisher', async () => {
      events.publish.mockRejectedValueOnce(new Error('emitter crashed'));

      await expect(service.commitResult(makePending())).resolves.toMatchObject({ id: 1 });
    });

    it('should reject invalid results before touching storage', async () => {
      await expect(service.commitResult(makePending({ testcase: { name: '' } }))).rejects.toBeInstanceOf(
        ValidationError
      );
      await expect(
        service.commitResult(makePending({ data: [{ key: 'a:b', value: 'x' }] }))
      ).rejects.toThrow('Colon not allowed in key name: a:b');

      expect(await store.results.findById(1)).toBeNull();
      expect(await store.testcases.findByName('tc_1')).toBeNull();
      expect(events.publish).not.toHaveBeenCalled();
    });

    it('should assign increasing ids', async () => {
      const first = await service.commitResult(makePending());
      const second = await service.commitResult(makePending());
      expect(second.id).toBeGreaterThan(first.id);
    });
  });

  describe('getResult', () => {
    it('should fail for unknown ids', async () => {
      await expect(service.getResult(99)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should treat ids beyond the column range as unknown', async () => {
      await expect(service.getResult(3_000_000_000)).rejects.toThrow('Result not found');
    });
  });

  describe('queryResults', () => {
    beforeEach(async () => {
      await service.commitResult(makePending({ submitTime: ts('2024-01-01T01:00:00'), data: data({ scenario: 'a' }) }));
      await service.commitResult(makePending({ submitTime: ts('2024-01-01T02:00:00'), data: data({ scenario: 'b' }) }));
      await service.commitResult(makePending({ submitTime: ts('2024-01-01T03:00:00'), data: data({ scenario: 'a' }) }));
    });

    it('should list newest first', async () => {
      const page = await service.queryResults(query({}));
      expect(page.items.map((result) => result.id)).toEqual([3, 2, 1]);
      expect(page.hasMore).toBe(false);
    });

    it('should refuse _distinct_on as the only constraint on latest queries', async () => {
      await expect(service.queryResults(query({ _distinct_on: 'scenario' }, true))).rejects.toBeInstanceOf(
        DistinctOnWithoutFilterError
      );
    });

    it('should ignore _distinct_on on plain listings', async () => {
      const page = await service.queryResults(query({ _distinct_on: 'scenario' }));
      expect(page.items).toHaveLength(3);
    });

    it('should resolve latest results per distinct value', async () => {
      const page = await service.queryResults(query({ testcases: 'tc_1', _distinct_on: 'scenario' }, true));
      expect(page.items.map((result) => result.id)).toEqual([3, 2]);
    });

    it('should resolve latest results per testcase', async () => {
      const page = await service.queryResults(query({}, true));
      expect(page.items.map((result) => result.id)).toEqual([3]);
    });
  });
});
