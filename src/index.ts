/**
 * Results Service
 * @module results-api
 *
 * Main entry point: the application factory plus the query core for
 * embedding.
 *
 * @example
 * ```typescript
 * import { buildApp, loadConfig } from 'results-api';
 *
 * const app = await buildApp({ config: await loadConfig() });
 * await app.listen({ port: 5001 });
 * ```
 */

export { buildApp, eventBaseUrl } from './app.js';
export type { AppOptions } from './app.js';

export { loadConfig, getConfig, resetConfig, AppConfigSchema, knownOutcomes, DEFAULT_OUTCOMES } from './config/index.js';
export type { AppConfig, AppConfigInput } from './config/index.js';

export type {
  Timestamp,
  Testcase,
  Group,
  GroupWithCount,
  Result,
  ResultData,
  PendingResult,
  TestcaseReference,
  GroupReference,
} from './types/results.js';
export { groupResultData, dataValues } from './types/results.js';

export type {
  PredicateSpec,
  ValueMatch,
  SortSpec,
  PageRequest,
  Page,
  ParsedResultFilters,
  ResultQuery,
} from './query/types.js';
export { DEFAULT_SORT, SORT_FIELDS } from './query/types.js';
export { parseResultFilters, parseColumnFilters } from './query/filter-parser.js';
export { buildResultsQuery, buildLatestResultsQuery } from './query/query-builder.js';
export type { SqlQuery } from './query/query-builder.js';
export { resolveLatest } from './query/latest-resolver.js';
export { matchesPredicates } from './query/predicate-matcher.js';

export { createResultStore, MemoryResultStore, PostgresResultStore } from './repositories/index.js';
export type { ResultStore } from './repositories/index.js';

export { ResultService, CatalogService, createServices, toPendingResult } from './services/index.js';
export type { Services, ResultSubmission } from './services/index.js';

export { createPublisher, DummyPublisher, RedisPublisher, ResultEventEmitter } from './messaging/index.js';
export type { ResultPublisher, ResultEvent } from './messaging/index.js';

export { Serializer } from './utils/serializers.js';
export type { SerializedResult, SerializedTestcase, SerializedGroup } from './utils/serializers.js';

export { runMigrations } from './db/migrate.js';

export { createLogger, getLogger, createModuleLogger, metrics, metricsRegistry } from './logging/index.js';
export type { LoggerConfig, StructuredLogger } from './logging/index.js';

export * from './errors/index.js';
