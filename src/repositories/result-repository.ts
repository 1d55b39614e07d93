/**
 * Result Repository Implementation
 * @module repositories/result-repository
 *
 * Implements IResultRepository on `results`, `result_data` and
 * `results_groups`. Result rows are hydrated with their data and group
 * memberships in two batched queries.
 */

import pg from 'pg';
import type { PendingResult, Result, ResultData } from '../types/results.js';
import type { Page } from '../query/types.js';
import { buildLatestResultsQuery, buildResultsQuery, RESULT_COLUMNS } from '../query/query-builder.js';
import { fromStoredTimestamp } from '../utils/time.js';
import { BaseRepository } from './base-repository.js';
import { IResultRepository, LatestResultQuery, ResultListQuery, toPage } from './interfaces.js';
import { TestcaseRepository } from './testcase-repository.js';
import { GroupRepository } from './group-repository.js';
import { QueryError } from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

export interface ResultRow {
  id: number;
  testcase_name: string;
  outcome: string;
  submit_time: string | Date;
  note: string | null;
  ref_url: string | null;
  testcase_ref_url: string | null;
}

interface ResultDataRow {
  result_id: number;
  key: string;
  value: string;
}

interface ResultGroupRow {
  result_id: number;
  group_uuid: string;
}

// ============================================================================
// Repository Implementation
// ============================================================================

export class ResultRepository extends BaseRepository implements IResultRepository {
  private readonly testcases: TestcaseRepository;
  private readonly groups: GroupRepository;

  constructor(pool: pg.Pool) {
    super(pool, 'results');
    this.testcases = new TestcaseRepository(pool);
    this.groups = new GroupRepository(pool);
  }

  async commit(pending: PendingResult): Promise<Result> {
    const groupUuids = [...new Set(pending.groups.map((group) => group.uuid))];

    return this.withTransaction(async (client) => {
      const testcase = await this.testcases.upsert(pending.testcase, { client });
      await this.groups.ensureExists(pending.groups, { client });

      const inserted = await this.queryOne<{ id: number }>(
        `INSERT INTO results (testcase_name, outcome, submit_time, note, ref_url)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING id`,
        [testcase.name, pending.outcome, pending.submitTime, pending.note, pending.refUrl],
        { client }
      );
      if (!inserted) {
        throw new QueryError('Result insert returned no id');
      }

      if (pending.data.length > 0) {
        await this.query(
          `INSERT INTO result_data (result_id, key, value)
           SELECT $1, d.key, d.value
           FROM unnest($2::text[], $3::text[]) WITH ORDINALITY AS d(key, value, ord)
           ORDER BY d.ord`,
          [inserted.id, pending.data.map((entry) => entry.key), pending.data.map((entry) => entry.value)],
          { client }
        );
      }

      if (groupUuids.length > 0) {
        await this.query(
          `INSERT INTO results_groups (result_id, group_uuid, position)
           SELECT $1, g.uuid, g.ord
           FROM unnest($2::text[]) WITH ORDINALITY AS g(uuid, ord)
           ON CONFLICT DO NOTHING`,
          [inserted.id, groupUuids],
          { client }
        );
      }

      return {
        id: inserted.id,
        testcase,
        outcome: pending.outcome,
        submitTime: pending.submitTime,
        note: pending.note,
        refUrl: pending.refUrl,
        groups: groupUuids,
        data: pending.data.map((entry) => ({ key: entry.key, value: entry.value })),
      };
    });
  }

  async findById(id: number): Promise<Result | null> {
    const rows = await this.queryAll<ResultRow>(
      `SELECT ${RESULT_COLUMNS}
       FROM results r JOIN testcases t ON t.name = r.testcase_name
       WHERE r.id = $1`,
      [id]
    );
    const [result] = await this.hydrate(rows);
    return result ?? null;
  }

  async findMany(query: ResultListQuery): Promise<Page<Result>> {
    const rows = await this.queryBuilt<ResultRow>(
      buildResultsQuery(query.predicates, query.sort, query.page)
    );
    return toPage(await this.hydrate(rows), query.page);
  }

  async findLatest(query: LatestResultQuery): Promise<Page<Result>> {
    const rows = await this.queryBuilt<ResultRow>(
      buildLatestResultsQuery(query.predicates, query.sort, query.distinctOn, query.page)
    );
    return toPage(await this.hydrate(rows), query.page);
  }

  // ============================================================================
  // Hydration
  // ============================================================================

  private async hydrate(rows: readonly ResultRow[]): Promise<Result[]> {
    if (rows.length === 0) {
      return [];
    }

    const ids = rows.map((row) => row.id);
    const [dataRows, groupRows] = await Promise.all([
      this.queryAll<ResultDataRow>(
        `SELECT result_id, key, value FROM result_data
         WHERE result_id = ANY($1::int[])
         ORDER BY result_id, id`,
        [ids]
      ),
      this.queryAll<ResultGroupRow>(
        `SELECT result_id, group_uuid FROM results_groups
         WHERE result_id = ANY($1::int[])
         ORDER BY result_id, position`,
        [ids]
      ),
    ]);

    const dataById = collectBy(dataRows, (row): ResultData => ({ key: row.key, value: row.value }));
    const groupsById = collectBy(groupRows, (row) => row.group_uuid);

    return rows.map((row) => mapResultRow(row, dataById.get(row.id) ?? [], groupsById.get(row.id) ?? []));
  }
}

// ============================================================================
// Row Mapping
// ============================================================================

function collectBy<TRow extends { result_id: number }, TValue>(
  rows: readonly TRow[],
  map: (row: TRow) => TValue
): Map<number, TValue[]> {
  const collected = new Map<number, TValue[]>();
  for (const row of rows) {
    const values = collected.get(row.result_id);
    if (values) {
      values.push(map(row));
    } else {
      collected.set(row.result_id, [map(row)]);
    }
  }
  return collected;
}

export function mapResultRow(row: ResultRow, data: readonly ResultData[], groups: readonly string[]): Result {
  const submitTime = fromStoredTimestamp(row.submit_time);
  if (submitTime === null) {
    throw new QueryError(`Unreadable submit_time on result ${row.id}`);
  }

  return {
    id: row.id,
    testcase: { name: row.testcase_name, refUrl: row.testcase_ref_url },
    outcome: row.outcome,
    submitTime,
    note: row.note,
    refUrl: row.ref_url,
    groups,
    data,
  };
}
