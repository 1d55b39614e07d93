/**
 * Group Repository Implementation
 * @module repositories/group-repository
 *
 * Implements IGroupRepository on the `groups` table. Counts come from the
 * `results_groups` association.
 */

import pg from 'pg';
import type { GroupReference, GroupWithCount } from '../types/results.js';
import type { ColumnFilter, GroupColumn, Page, PageRequest } from '../query/types.js';
import { buildEntityListQuery } from '../query/query-builder.js';
import { BaseRepository, QueryOptions, toCount } from './base-repository.js';
import { IGroupRepository, toPage } from './interfaces.js';
import { QueryError } from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

export interface GroupRow {
  uuid: string;
  description: string | null;
  ref_url: string | null;
  results_count: string | number | null;
}

const GROUP_COLUMNS: Readonly<Record<GroupColumn, string>> = {
  uuid: 'g.uuid',
  description: 'g.description',
};

const GROUP_SELECT = [
  'g.uuid',
  'g.description',
  'g.ref_url',
  '(SELECT COUNT(*) FROM results_groups rg WHERE rg.group_uuid = g.uuid) AS results_count',
].join(', ');

// ============================================================================
// Repository Implementation
// ============================================================================

export class GroupRepository extends BaseRepository implements IGroupRepository {
  constructor(pool: pg.Pool) {
    super(pool, 'groups');
  }

  async upsert(group: GroupReference): Promise<GroupWithCount> {
    await this.query(
      `INSERT INTO groups (uuid, description, ref_url)
       VALUES ($1, $2, $3)
       ON CONFLICT (uuid) DO UPDATE
         SET description = COALESCE(EXCLUDED.description, groups.description),
             ref_url = COALESCE(EXCLUDED.ref_url, groups.ref_url)`,
      [group.uuid, group.description ?? null, group.refUrl ?? null]
    );

    const stored = await this.findByUuid(group.uuid);
    if (!stored) {
      throw new QueryError(`Failed to upsert group ${group.uuid}`);
    }
    return stored;
  }

  /**
   * Create groups referenced by a submission; existing groups stay untouched
   */
  async ensureExists(groups: readonly GroupReference[], options?: QueryOptions): Promise<void> {
    for (const group of groups) {
      await this.query(
        `INSERT INTO groups (uuid, description, ref_url)
         VALUES ($1, $2, $3)
         ON CONFLICT (uuid) DO NOTHING`,
        [group.uuid, group.description ?? null, group.refUrl ?? null],
        options
      );
    }
  }

  async findByUuid(uuid: string): Promise<GroupWithCount | null> {
    const row = await this.queryOne<GroupRow>(
      `SELECT ${GROUP_SELECT} FROM groups g WHERE g.uuid = $1`,
      [uuid]
    );
    return row ? mapGroupRow(row) : null;
  }

  async list(filters: readonly ColumnFilter<GroupColumn>[], page: PageRequest): Promise<Page<GroupWithCount>> {
    const rows = await this.queryBuilt<GroupRow>(
      buildEntityListQuery({
        select: GROUP_SELECT,
        from: 'groups g',
        columns: GROUP_COLUMNS,
        filters,
        orderBy: 'g.uuid ASC',
        page,
      })
    );
    return toPage(rows.map(mapGroupRow), page);
  }
}

export function mapGroupRow(row: GroupRow): GroupWithCount {
  return {
    uuid: row.uuid,
    description: row.description,
    refUrl: row.ref_url,
    resultsCount: toCount(row.results_count),
  };
}
