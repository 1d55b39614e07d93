/**
 * Migration Runner
 * @module db/migrate
 *
 * Applies pending migrations in version order, each in its own transaction,
 * and records them in `schema_migrations`.
 */

import pg from 'pg';
import { MIGRATIONS, Migration } from './migrations/index.js';
import { getLogger, withLogging } from '../logging/logger.js';
import { MigrationError, toError } from '../errors/index.js';

const CREATE_MIGRATIONS_TABLE = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    version TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    applied_at TIMESTAMP NOT NULL DEFAULT (NOW() AT TIME ZONE 'utc')
  )
`;

/**
 * Apply every migration not yet recorded
 *
 * @returns versions applied by this run
 */
export async function runMigrations(
  pool: pg.Pool,
  migrations: readonly Migration[] = MIGRATIONS
): Promise<string[]> {
  const logger = getLogger();
  await pool.query(CREATE_MIGRATIONS_TABLE);

  const applied = await pool.query<{ version: string }>('SELECT version FROM schema_migrations');
  const done = new Set(applied.rows.map((row) => row.version));
  const pending = [...migrations]
    .filter((migration) => !done.has(migration.version))
    .sort((a, b) => a.version.localeCompare(b.version));

  const appliedNow: string[] = [];
  for (const migration of pending) {
    const client = await pool.connect();
    try {
      await client.query('BEGIN');
      await withLogging(logger, `migration ${migration.version}`, () => migration.up(client));
      await client.query('INSERT INTO schema_migrations (version, name) VALUES ($1, $2)', [
        migration.version,
        migration.name,
      ]);
      await client.query('COMMIT');
      logger.migrationApplied(migration.version, migration.name);
      appliedNow.push(migration.version);
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        logger.error({ err: rollbackError }, 'Migration rollback failed');
      });
      throw new MigrationError(migration.version, { cause: toError(error) });
    } finally {
      client.release();
    }
  }

  if (appliedNow.length === 0) {
    logger.info('Database schema is up to date');
  }
  return appliedNow;
}
