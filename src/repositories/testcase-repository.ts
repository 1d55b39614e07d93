/**
 * Testcase Repository Implementation
 * @module repositories/testcase-repository
 *
 * Implements ITestcaseRepository on the `testcases` table.
 */

import pg from 'pg';
import type { Testcase, TestcaseReference } from '../types/results.js';
import type { ColumnFilter, Page, PageRequest, TestcaseColumn } from '../query/types.js';
import { buildEntityListQuery } from '../query/query-builder.js';
import { BaseRepository, QueryOptions } from './base-repository.js';
import { ITestcaseRepository, toPage } from './interfaces.js';
import { QueryError } from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Database row type for testcases table
 */
export interface TestcaseRow {
  name: string;
  ref_url: string | null;
}

const TESTCASE_COLUMNS: Readonly<Record<TestcaseColumn, string>> = {
  name: 'name',
};

// ============================================================================
// Repository Implementation
// ============================================================================

export class TestcaseRepository extends BaseRepository implements ITestcaseRepository {
  constructor(pool: pg.Pool) {
    super(pool, 'testcases');
  }

  async upsert(testcase: TestcaseReference, options?: QueryOptions): Promise<Testcase> {
    const row = await this.queryOne<TestcaseRow>(
      `INSERT INTO testcases (name, ref_url)
       VALUES ($1, $2)
       ON CONFLICT (name) DO UPDATE
         SET ref_url = COALESCE(EXCLUDED.ref_url, testcases.ref_url)
       RETURNING name, ref_url`,
      [testcase.name, testcase.refUrl ?? null],
      options
    );

    if (!row) {
      throw new QueryError(`Failed to upsert testcase ${testcase.name}`);
    }

    return mapTestcaseRow(row);
  }

  async findByName(name: string): Promise<Testcase | null> {
    const row = await this.queryOne<TestcaseRow>(
      'SELECT name, ref_url FROM testcases WHERE name = $1',
      [name]
    );
    return row ? mapTestcaseRow(row) : null;
  }

  async list(filters: readonly ColumnFilter<TestcaseColumn>[], page: PageRequest): Promise<Page<Testcase>> {
    const rows = await this.queryBuilt<TestcaseRow>(
      buildEntityListQuery({
        select: 'name, ref_url',
        from: 'testcases',
        columns: TESTCASE_COLUMNS,
        filters,
        orderBy: 'name ASC',
        page,
      })
    );
    return toPage(rows.map(mapTestcaseRow), page);
  }
}

export function mapTestcaseRow(row: TestcaseRow): Testcase {
  return { name: row.name, refUrl: row.ref_url };
}
