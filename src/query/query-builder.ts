/**
 * Query Builder
 * @module query/query-builder
 *
 * Composes predicates into parameterized PostgreSQL.
 *
 * Relationship predicates become correlated EXISTS subqueries so that a
 * result matching through several rows is still returned once. Every
 * predicate gets its own alias: `item=X&type=Y` needs one row with key
 * `item` and another with key `type`, and `item=a&item:like=b*` may match
 * two different `item` rows.
 */

import type {
  ColumnFilter,
  PageRequest,
  PredicateSpec,
  SortSpec,
  ValueMatch,
} from './types.js';

/**
 * Parameterized SQL ready for `pg`
 */
export interface SqlQuery {
  readonly text: string;
  readonly values: unknown[];
}

/**
 * Collects positional parameters
 */
export class SqlParameters {
  readonly values: unknown[] = [];

  add(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }
}

export const RESULT_COLUMNS = [
  'r.id',
  'r.testcase_name',
  'r.outcome',
  'r.submit_time',
  'r.note',
  'r.ref_url',
  't.ref_url AS testcase_ref_url',
].join(', ');

const RESULT_FROM = 'FROM results r JOIN testcases t ON t.name = r.testcase_name';

// ============================================================================
// Conditions
// ============================================================================

/**
 * `column = ANY(values)` or `column LIKE ANY(patterns)`
 */
export function matchCondition(column: string, match: ValueMatch, params: SqlParameters): string {
  const placeholder = params.add([...match.values]);
  return match.operator === 'in'
    ? `${column} = ANY(${placeholder}::text[])`
    : `${column} LIKE ANY(${placeholder}::text[])`;
}

/**
 * WHERE conditions for result predicates, one per predicate in order.
 * Relationship predicates each get their own alias, so two filters on the
 * same key may be satisfied by different rows.
 */
export function buildResultConditions(
  predicates: readonly PredicateSpec[],
  params: SqlParameters
): string[] {
  let groupAliasIndex = 0;
  let dataAliasIndex = 0;

  return predicates.flatMap((predicate) => {
    switch (predicate.kind) {
      case 'submit_time': {
        const from = `r.submit_time >= ${params.add(predicate.from)}`;
        return predicate.until === null ? [from] : [from, `r.submit_time < ${params.add(predicate.until)}`];
      }
      case 'outcome':
        return [matchCondition('r.outcome', predicate.match, params)];
      case 'testcases':
        return [matchCondition('r.testcase_name', predicate.match, params)];
      case 'groups': {
        const alias = `rg_${groupAliasIndex++}`;
        const condition = matchCondition(`${alias}.group_uuid`, predicate.match, params);
        return [
          `EXISTS (SELECT 1 FROM results_groups ${alias} WHERE ${alias}.result_id = r.id AND ${condition})`,
        ];
      }
      case 'data': {
        const alias = `rd_${dataAliasIndex++}`;
        const keyPlaceholder = params.add(predicate.key);
        const condition = matchCondition(`${alias}.value`, predicate.match, params);
        return [
          `EXISTS (SELECT 1 FROM result_data ${alias} WHERE ${alias}.result_id = r.id AND ${alias}.key = ${keyPlaceholder} AND ${condition})`,
        ];
      }
    }
  });
}

// ============================================================================
// Ordering and Paging
// ============================================================================

/**
 * ORDER BY body; `submit_time` ties are broken by `id` in the same direction
 */
export function buildOrderBy(sort: SortSpec, prefix = 'r.'): string {
  const direction = sort.direction === 'asc' ? 'ASC' : 'DESC';
  return sort.field === 'submit_time'
    ? `${prefix}submit_time ${direction}, ${prefix}id ${direction}`
    : `${prefix}id ${direction}`;
}

/**
 * Fetches one row beyond the page to tell whether another page exists
 */
export function buildPagination(page: PageRequest, params: SqlParameters): string {
  return `LIMIT ${params.add(page.limit + 1)} OFFSET ${params.add(page.page * page.limit)}`;
}

function whereClause(conditions: readonly string[]): string {
  return conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
}

function joinLines(lines: readonly string[]): string {
  return lines.filter((line) => line.length > 0).join('\n');
}

// ============================================================================
// Result Queries
// ============================================================================

/**
 * Filtered, sorted and paged results
 */
export function buildResultsQuery(
  predicates: readonly PredicateSpec[],
  sort: SortSpec,
  page: PageRequest
): SqlQuery {
  const params = new SqlParameters();
  const conditions = buildResultConditions(predicates, params);

  const text = joinLines([
    `SELECT ${RESULT_COLUMNS}`,
    RESULT_FROM,
    whereClause(conditions),
    `ORDER BY ${buildOrderBy(sort)}`,
    buildPagination(page, params),
  ]);

  return { text, values: params.values };
}

/**
 * Newest result per (testcase, value of `distinctOn`), filtered first.
 * The LEFT JOIN yields one row per value of a multi-valued key and a NULL
 * row when the key is absent, so each value and "absent" partition apart.
 */
export function buildLatestResultsQuery(
  predicates: readonly PredicateSpec[],
  sort: SortSpec,
  distinctOn: string | null,
  page: PageRequest
): SqlQuery {
  const params = new SqlParameters();
  const distinctJoin =
    distinctOn === null
      ? ''
      : `LEFT JOIN result_data dv ON dv.result_id = r.id AND dv.key = ${params.add(distinctOn)}`;
  const partition = distinctOn === null ? 'r.testcase_name' : 'r.testcase_name, dv.value';
  const conditions = buildResultConditions(predicates, params);

  const text = joinLines([
    'WITH ranked AS (',
    `SELECT ${RESULT_COLUMNS},`,
    `ROW_NUMBER() OVER (PARTITION BY ${partition} ORDER BY r.submit_time DESC, r.id DESC) AS latest_rank`,
    RESULT_FROM,
    distinctJoin,
    whereClause(conditions),
    ')',
    'SELECT DISTINCT id, testcase_name, outcome, submit_time, note, ref_url, testcase_ref_url',
    'FROM ranked',
    'WHERE latest_rank = 1',
    `ORDER BY ${buildOrderBy(sort, '')}`,
    buildPagination(page, params),
  ]);

  return { text, values: params.values };
}

// ============================================================================
// Entity Listings
// ============================================================================

export interface EntityListQueryOptions<TColumn extends string> {
  select: string;
  from: string;
  /** Maps filter columns to SQL columns */
  columns: Readonly<Record<TColumn, string>>;
  filters: readonly ColumnFilter<TColumn>[];
  orderBy: string;
  page: PageRequest;
}

/**
 * Filtered, paged listing of testcases or groups
 */
export function buildEntityListQuery<TColumn extends string>(
  options: EntityListQueryOptions<TColumn>
): SqlQuery {
  const params = new SqlParameters();
  const conditions = options.filters.map(({ column, match }) =>
    matchCondition(options.columns[column], match, params)
  );

  const text = joinLines([
    `SELECT ${options.select}`,
    `FROM ${options.from}`,
    whereClause(conditions),
    `ORDER BY ${options.orderBy}`,
    buildPagination(options.page, params),
  ]);

  return { text, values: params.values };
}
