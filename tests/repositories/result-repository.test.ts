/**
 * PostgreSQL Repository Tests
 * @module tests/repositories/result-repository
 *
 * Repositories against a mocked `pg` pool: SQL issued, transaction
 * boundaries and row mapping.
 */

import { describe, it, expect } from 'vitest';
import { ResultRepository, mapResultRow } from '../../src/repositories/result-repository.js';
import { GroupRepository } from '../../src/repositories/group-repository.js';
import { TestcaseRepository } from '../../src/repositories/testcase-repository.js';
import { PostgresResultStore } from '../../src/repositories/postgres-store.js';
import { ConnectionError, QueryError, StorageError, TransactionError } from '../../src/errors/index.js';
import { DEFAULT_SORT } from '../../src/query/types.js';
import { parseResultFilters } from '../../src/query/filter-parser.js';
import { asPool, createMockPool, createMockPoolClient, executedSql } from '../mocks/index.js';
import { data, makePending } from '../helpers/index.js';

const resultRow = (id: number, submitTime = '2024-01-01 00:00:00') => ({
  id,
  testcase_name: 'tc_1',
  outcome: 'PASSED',
  submit_time: submitTime,
  note: null,
  ref_url: null,
  testcase_ref_url: null,
});

describe('ResultRepository', () => {
  describe('commit', () => {
    it('should write everything inside one transaction', async () => {
      const pool = createMockPool({
        'INSERT INTO testcases': [{ name: 'tc_1', ref_url: 'https://ci.test/tc_1' }],
        'INSERT INTO results (': [{ id: 7 }],
      });
      const repository = new ResultRepository(asPool(pool));

      const result = await repository.commit(
        makePending({
          testcase: { name: 'tc_1', refUrl: 'https://ci.test/tc_1' },
          groups: [{ uuid: 'g-1' }, { uuid: 'g-1' }, { uuid: 'g-2' }],
          data: data({ item: ['grub', 'kernel'] }),
        })
      );

      expect(result).toEqual({
        id: 7,
        testcase: { name: 'tc_1', refUrl: 'https://ci.test/tc_1' },
        outcome: 'PASSED',
        submitTime: '2024-01-01T00:00:00.000000',
        note: null,
        refUrl: null,
        groups: ['g-1', 'g-2'],
        data: [
          { key: 'item', value: 'grub' },
          { key: 'item', value: 'kernel' },
        ],
      });

      const sql = executedSql(pool.client.query);
      expect(sql[0]).toBe('BEGIN');
      expect(sql[sql.length - 1]).toBe('COMMIT');
      expect(sql).toHaveLength(9);
      expect(pool.query).not.toHaveBeenCalled();
      expect(pool.client.release).toHaveBeenCalledTimes(1);

      const dataInsert = pool.client.query.mock.calls.find(([text]) => text.includes('INSERT INTO result_data'));
      expect(dataInsert?.[1]).toEqual([7, ['item', 'item'], ['grub', 'kernel']]);
      const groupInsert = pool.client.query.mock.calls.find(([text]) => text.includes('INSERT INTO results_groups'));
      expect(groupInsert?.[1]).toEqual([7, ['g-1', 'g-2']]);
    });

    it('should skip data and membership inserts when there are none', async () => {
      const pool = createMockPool({
        'INSERT INTO testcases': [{ name: 'tc_1', ref_url: null }],
        'INSERT INTO results (': [{ id: 1 }],
      });

      await new ResultRepository(asPool(pool)).commit(makePending());

      const sql = executedSql(pool.client.query);
      expect(sql).toHaveLength(4);
      expect(sql.some((text) => text.includes('result_data'))).toBe(false);
    });

    it('should roll back and report a driver failure', async () => {
      const client = createMockPoolClient({});
      client.query
        .mockResolvedValueOnce({ rows: [], rowCount: 0 })
        .mockRejectedValueOnce(new Error('connection terminated'));
      const pool = createMockPool({}, client);

      await expect(new ResultRepository(asPool(pool)).commit(makePending())).rejects.toThrow(
        'Transaction on results rolled back: connection terminated'
      );

      const sql = executedSql(client.query);
      expect(sql[sql.length - 1]).toBe('ROLLBACK');
      expect(sql).not.toContain('COMMIT');
      expect(client.release).toHaveBeenCalledTimes(1);
    });

    it('should report a pool that cannot connect as a connection error', async () => {
      const pool = createMockPool();
      pool.connect.mockRejectedValueOnce(new Error('connect ECONNREFUSED 127.0.0.1:5432'));

      const commit = new ResultRepository(asPool(pool)).commit(makePending());

      await expect(commit).rejects.toBeInstanceOf(ConnectionError);
      await expect(commit).rejects.toBeInstanceOf(StorageError);
      await expect(commit).rejects.toThrow('Failed to connect to database: connect ECONNREFUSED 127.0.0.1:5432');
      expect(pool.client.query).not.toHaveBeenCalled();
    });

    it('should discard the client when the rollback fails', async () => {
      const rollbackFailure = new Error('socket closed');
      const client = createMockPoolClient({});
      client.query
        .mockResolvedValueOnce({ rows: [], rowCount: 0 })
        .mockRejectedValueOnce(new Error('connection terminated'))
        .mockRejectedValueOnce(rollbackFailure);
      const pool = createMockPool({}, client);

      await expect(new ResultRepository(asPool(pool)).commit(makePending())).rejects.toBeInstanceOf(
        TransactionError
      );

      expect(client.release).toHaveBeenCalledWith(rollbackFailure);
    });

    it('should wrap unexpected empty inserts as transaction errors', async () => {
      const pool = createMockPool({ 'INSERT INTO testcases': [{ name: 'tc_1', ref_url: null }] });

      await expect(new ResultRepository(asPool(pool)).commit(makePending())).rejects.toBeInstanceOf(
        TransactionError
      );
    });
  });

  describe('queries', () => {
    it('should hydrate data and groups and detect another page', async () => {
      const pool = createMockPool({
        'FROM results r JOIN testcases': [resultRow(2, '2024-01-01 00:00:00.5'), resultRow(1)],
        'FROM result_data': [{ result_id: 2, key: 'item', value: 'grub' }],
        'FROM results_groups': [{ result_id: 1, group_uuid: 'g-1' }],
      });
      const repository = new ResultRepository(asPool(pool));

      const page = await repository.findMany({ predicates: [], sort: DEFAULT_SORT, page: { page: 0, limit: 1 } });

      expect(page.hasMore).toBe(true);
      expect(page.items).toEqual([
        {
          id: 2,
          testcase: { name: 'tc_1', refUrl: null },
          outcome: 'PASSED',
          submitTime: '2024-01-01T00:00:00.500000',
          note: null,
          refUrl: null,
          groups: [],
          data: [{ key: 'item', value: 'grub' }],
        },
      ]);
      expect(pool.query.mock.calls[0]?.[1]).toEqual([2, 0]);
      expect(pool.query.mock.calls[1]?.[1]).toEqual([[2, 1]]);
    });

    it('should pass filters through the latest query', async () => {
      const pool = createMockPool();
      const repository = new ResultRepository(asPool(pool));
      const { predicates } = parseResultFilters({ item: 'grub' });

      const page = await repository.findLatest({
        predicates,
        sort: DEFAULT_SORT,
        distinctOn: 'scenario',
        page: { page: 1, limit: 5 },
      });

      expect(page).toEqual({ items: [], hasMore: false });
      expect(pool.query).toHaveBeenCalledTimes(1);
      expect(pool.query.mock.calls[0]?.[1]).toEqual(['scenario', 'item', ['grub'], 6, 5]);
    });

    it('should return null for a missing id', async () => {
      const pool = createMockPool();
      expect(await new ResultRepository(asPool(pool)).findById(3)).toBeNull();
    });

    it('should surface driver errors as query errors', async () => {
      const pool = createMockPool();
      pool.query.mockRejectedValueOnce(new Error('relation "results" does not exist'));

      await expect(new ResultRepository(asPool(pool)).findById(3)).rejects.toBeInstanceOf(QueryError);
    });
  });

  describe('mapResultRow', () => {
    it('should read timestamps returned as Date', () => {
      const row = { ...resultRow(4), submit_time: new Date(Date.UTC(2024, 1, 2, 3, 4, 5)) };
      expect(mapResultRow(row, [], []).submitTime).toBe('2024-02-02T03:04:05.000000');
    });

    it('should reject unreadable timestamps', () => {
      expect(() => mapResultRow(resultRow(4, 'garbage'), [], [])).toThrow('Unreadable submit_time on result 4');
    });
  });
});

describe('TestcaseRepository', () => {
  it('should keep a stored ref_url when none is given', async () => {
    const pool = createMockPool({ 'INSERT INTO testcases': [{ name: 'tc_1', ref_url: 'https://ci.test/old' }] });

    const testcase = await new TestcaseRepository(asPool(pool)).upsert({ name: 'tc_1' });

    expect(testcase).toEqual({ name: 'tc_1', refUrl: 'https://ci.test/old' });
    expect(pool.query.mock.calls[0]?.[0]).toContain('COALESCE(EXCLUDED.ref_url, testcases.ref_url)');
    expect(pool.query.mock.calls[0]?.[1]).toEqual(['tc_1', null]);
  });

  it('should list by name', async () => {
    const pool = createMockPool({ 'FROM testcases': [{ name: 'a', ref_url: null }] });

    const page = await new TestcaseRepository(asPool(pool)).list([], { page: 0, limit: 20 });

    expect(page.items).toEqual([{ name: 'a', refUrl: null }]);
    expect(pool.query.mock.calls[0]?.[0]).toContain('ORDER BY name ASC');
  });
});

describe('GroupRepository', () => {
  it('should count results per group', async () => {
    const pool = createMockPool({
      'FROM groups g': [{ uuid: 'g-1', description: 'nightly', ref_url: null, results_count: '3' }],
    });

    expect(await new GroupRepository(asPool(pool)).findByUuid('g-1')).toEqual({
      uuid: 'g-1',
      description: 'nightly',
      refUrl: null,
      resultsCount: 3,
    });
  });

  it('should fail an upsert it cannot read back', async () => {
    const pool = createMockPool();
    await expect(new GroupRepository(asPool(pool)).upsert({ uuid: 'g-9' })).rejects.toThrow(
      'Failed to upsert group g-9'
    );
  });
});

describe('PostgresResultStore', () => {
  it('should check connectivity and release the pool', async () => {
    const pool = createMockPool({ 'SELECT 1 AS health_check': [{ health_check: 1 }] });
    const store = new PostgresResultStore(asPool(pool));

    expect(await store.healthCheck()).toBe(true);
    await store.close();
    expect(pool.end).toHaveBeenCalledTimes(1);
  });

  it('should report an unreachable database', async () => {
    const pool = createMockPool();
    pool.query.mockRejectedValueOnce(new Error('ECONNREFUSED'));

    expect(await new PostgresResultStore(asPool(pool)).healthCheck()).toBe(false);
  });
});
