/**
 * PostgreSQL Database Connection Pool
 * @module db/connection
 */

import pg from 'pg';
import type { DatabaseConfig } from '../config/schema.js';
import { createModuleLogger } from '../logging/logger.js';

const { Pool } = pg;

const logger = createModuleLogger('db-connection');

/**
 * `timestamp without time zone`. Read back as text so microseconds survive.
 */
const TIMESTAMP_OID = 1114;
pg.types.setTypeParser(TIMESTAMP_OID, (value: string) => value);

/**
 * Pool options from the database configuration
 */
export function toPoolConfig(config: DatabaseConfig): pg.PoolConfig {
  const base: pg.PoolConfig = {
    max: config.poolMax,
    idleTimeoutMillis: config.idleTimeout,
    connectionTimeoutMillis: config.connectionTimeout,
    ssl: config.ssl ? { rejectUnauthorized: false } : undefined,
  };

  if (config.connectionString) {
    return { ...base, connectionString: config.connectionString };
  }
  return {
    ...base,
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.username,
    password: config.password,
  };
}

/**
 * PostgreSQL connection pool singleton
 */
let pool: pg.Pool | null = null;

/**
 * Create the pool on first use
 */
export function getPool(config: DatabaseConfig): pg.Pool {
  if (!pool) {
    pool = new Pool(toPoolConfig(config));

    pool.on('connect', () => {
      logger.debug('New client connected to pool');
    });

    pool.on('error', (err) => {
      logger.error({ err }, 'Unexpected pool error');
    });
  }

  return pool;
}

/**
 * Close the database connection pool
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info('Database pool closed');
  }
}

/**
 * Check database connectivity
 */
export async function checkConnection(target: pg.Pool): Promise<boolean> {
  try {
    const result = await target.query('SELECT 1 AS health_check');
    return result.rows.length > 0;
  } catch (error) {
    logger.error({ err: error }, 'Database health check failed');
    return false;
  }
}

export { Pool, pg };
