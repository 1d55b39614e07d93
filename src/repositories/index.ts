/**
 * Repository Module Exports
 * @module repositories
 *
 * Storage drivers and the factory choosing one from configuration.
 */

import type { AppConfig } from '../config/index.js';
import { closePool, getPool } from '../db/connection.js';
import { runMigrations } from '../db/migrate.js';
import type { ResultStore } from './interfaces.js';
import { MemoryResultStore } from './memory-store.js';
import { PostgresResultStore } from './postgres-store.js';

export type {
  ITestcaseRepository,
  IGroupRepository,
  IResultRepository,
  ResultListQuery,
  LatestResultQuery,
  ResultStore,
} from './interfaces.js';
export { toPage } from './interfaces.js';

export { BaseRepository, toCount } from './base-repository.js';
export type { QueryOptions } from './base-repository.js';
export { TestcaseRepository } from './testcase-repository.js';
export { GroupRepository } from './group-repository.js';
export { ResultRepository } from './result-repository.js';
export { PostgresResultStore } from './postgres-store.js';
export { MemoryResultStore } from './memory-store.js';

/**
 * Build the store selected by `storage.driver`, migrating first when
 * `database.autoMigrate` is set
 */
export async function createResultStore(config: Pick<AppConfig, 'storage' | 'database'>): Promise<ResultStore> {
  if (config.storage.driver === 'memory') {
    return new MemoryResultStore();
  }

  const pool = getPool(config.database);
  if (config.database.autoMigrate) {
    await runMigrations(pool);
  }
  return new PostgresResultStore(pool, closePool);
}
