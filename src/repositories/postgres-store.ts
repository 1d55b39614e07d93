/**
 * PostgreSQL Result Store
 * @module repositories/postgres-store
 */

import pg from 'pg';
import { checkConnection } from '../db/connection.js';
import { ResultStore } from './interfaces.js';
import { TestcaseRepository } from './testcase-repository.js';
import { GroupRepository } from './group-repository.js';
import { ResultRepository } from './result-repository.js';

export class PostgresResultStore implements ResultStore {
  readonly driver = 'postgres';
  readonly testcases: TestcaseRepository;
  readonly groups: GroupRepository;
  readonly results: ResultRepository;

  constructor(
    private readonly pool: pg.Pool,
    private readonly release: () => Promise<void> = () => pool.end()
  ) {
    this.testcases = new TestcaseRepository(pool);
    this.groups = new GroupRepository(pool);
    this.results = new ResultRepository(pool);
  }

  healthCheck(): Promise<boolean> {
    return checkConnection(this.pool);
  }

  close(): Promise<void> {
    return this.release();
  }
}
