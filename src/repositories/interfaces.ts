/**
 * Repository Interfaces
 * @module repositories/interfaces
 *
 * Storage contracts shared by the PostgreSQL and in-memory drivers.
 */

import type {
  GroupReference,
  GroupWithCount,
  PendingResult,
  Result,
  Testcase,
  TestcaseReference,
} from '../types/results.js';
import type {
  ColumnFilter,
  GroupColumn,
  Page,
  PageRequest,
  PredicateSpec,
  SortSpec,
  TestcaseColumn,
} from '../query/types.js';

// ============================================================================
// Query Inputs
// ============================================================================

export interface ResultListQuery {
  readonly predicates: readonly PredicateSpec[];
  readonly sort: SortSpec;
  readonly page: PageRequest;
}

export interface LatestResultQuery extends ResultListQuery {
  readonly distinctOn: string | null;
}

// ============================================================================
// Repositories
// ============================================================================

export interface ITestcaseRepository {
  /**
   * Create the testcase or update it in place; a null or absent refUrl
   * keeps the stored one
   */
  upsert(testcase: TestcaseReference): Promise<Testcase>;
  findByName(name: string): Promise<Testcase | null>;
  list(filters: readonly ColumnFilter<TestcaseColumn>[], page: PageRequest): Promise<Page<Testcase>>;
}

export interface IGroupRepository {
  /**
   * Create the group or update it in place; null or absent fields keep
   * the stored values
   */
  upsert(group: GroupReference): Promise<GroupWithCount>;
  findByUuid(uuid: string): Promise<GroupWithCount | null>;
  list(filters: readonly ColumnFilter<GroupColumn>[], page: PageRequest): Promise<Page<GroupWithCount>>;
}

export interface IResultRepository {
  /**
   * Persist a result atomically: testcase upsert, group creation, id
   * assignment, data and memberships. Nothing persists on failure.
   */
  commit(pending: PendingResult): Promise<Result>;
  findById(id: number): Promise<Result | null>;
  findMany(query: ResultListQuery): Promise<Page<Result>>;
  findLatest(query: LatestResultQuery): Promise<Page<Result>>;
}

/**
 * One storage driver
 */
export interface ResultStore {
  readonly driver: string;
  readonly testcases: ITestcaseRepository;
  readonly groups: IGroupRepository;
  readonly results: IResultRepository;
  healthCheck(): Promise<boolean>;
  close(): Promise<void>;
}

/**
 * Split a fetched `limit + 1` rows into a page
 */
export function toPage<T>(rows: readonly T[], page: PageRequest): Page<T> {
  return {
    items: rows.slice(0, page.limit),
    hasMore: rows.length > page.limit,
  };
}
