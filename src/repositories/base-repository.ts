/**
 * Base Repository Implementation
 * @module repositories/base-repository
 *
 * Common PostgreSQL operations for all repositories: parameterized queries,
 * row helpers and transactions.
 */

import pg from 'pg';
import { createModuleLogger, StructuredLogger } from '../logging/logger.js';
import {
  ConnectionError,
  QueryError,
  TransactionError,
  getErrorMessage,
  isBaseError,
  toError,
} from '../errors/index.js';
import type { SqlQuery } from '../query/query-builder.js';

// ============================================================================
// Types
// ============================================================================

export interface QueryOptions {
  readonly client?: pg.PoolClient;
}

// ============================================================================
// Base Repository Class
// ============================================================================

/**
 * Base repository with common database operations
 */
export abstract class BaseRepository {
  protected readonly logger: StructuredLogger;

  constructor(
    protected readonly pool: pg.Pool,
    protected readonly tableName: string
  ) {
    this.logger = createModuleLogger(`repository:${tableName}`);
  }

  // ============================================================================
  // Query Execution
  // ============================================================================

  /**
   * Execute a parameterized query
   *
   * @throws QueryError wrapping the driver error
   */
  protected async query<T extends pg.QueryResultRow>(
    text: string,
    params?: unknown[],
    options?: QueryOptions
  ): Promise<pg.QueryResult<T>> {
    const start = Date.now();
    const client = options?.client;

    try {
      const result = client
        ? await client.query<T>(text, params)
        : await this.pool.query<T>(text, params);
      this.logger.debug(
        { durationMs: Date.now() - start, rows: result.rowCount, table: this.tableName },
        'Query executed'
      );
      return result;
    } catch (error) {
      this.logger.error({ err: error, table: this.tableName }, 'Query failed');
      throw new QueryError(getErrorMessage(error), text, { cause: toError(error) });
    }
  }

  /**
   * Execute a query and return first row or null
   */
  protected async queryOne<T extends pg.QueryResultRow>(
    text: string,
    params?: unknown[],
    options?: QueryOptions
  ): Promise<T | null> {
    const result = await this.query<T>(text, params, options);
    return result.rows[0] ?? null;
  }

  /**
   * Execute a query and return all rows
   */
  protected async queryAll<T extends pg.QueryResultRow>(
    text: string,
    params?: unknown[],
    options?: QueryOptions
  ): Promise<T[]> {
    const result = await this.query<T>(text, params, options);
    return result.rows;
  }

  /**
   * Run a built query
   */
  protected async queryBuilt<T extends pg.QueryResultRow>(
    built: SqlQuery,
    options?: QueryOptions
  ): Promise<T[]> {
    return this.queryAll<T>(built.text, built.values, options);
  }

  // ============================================================================
  // Transaction Support
  // ============================================================================

  /**
   * Execute operations in a transaction. Any failure rolls back everything
   * and surfaces as a TransactionError; a pool that cannot hand out a client
   * surfaces as a ConnectionError.
   */
  protected async withTransaction<T>(fn: (client: pg.PoolClient) => Promise<T>): Promise<T> {
    let client: pg.PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      this.logger.error({ err: error, table: this.tableName }, 'Could not acquire a client');
      throw new ConnectionError(getErrorMessage(error), { cause: toError(error) });
    }

    // Set when ROLLBACK fails; the client is then discarded instead of reused
    let brokenConnection: Error | undefined;
    try {
      await client.query('BEGIN');
      const result = await fn(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        brokenConnection = toError(rollbackError);
        this.logger.error({ err: rollbackError }, 'Rollback failed');
      });
      if (isBaseError(error) && error.isOperational) {
        throw error;
      }
      throw new TransactionError(`Transaction on ${this.tableName} rolled back: ${getErrorMessage(error)}`, {
        cause: toError(error),
      });
    } finally {
      client.release(brokenConnection);
    }
  }
}

// ============================================================================
// Row Helpers
// ============================================================================

/**
 * COUNT(*) arrives as a string (int8)
 */
export function toCount(value: string | number | null | undefined): number {
  return value === null || value === undefined ? 0 : Number(value);
}
