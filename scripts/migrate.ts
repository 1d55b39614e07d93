#!/usr/bin/env npx tsx
/**
 * Apply pending database migrations
 * @module scripts/migrate
 *
 * Usage: npm run migrate
 */

import { loadConfig } from '../src/config/index.js';
import { closePool, getPool } from '../src/db/connection.js';
import { runMigrations } from '../src/db/migrate.js';
import { getLogger } from '../src/logging/logger.js';

async function main(): Promise<void> {
  const config = await loadConfig();
  const pool = getPool(config.database);
  try {
    const applied = await runMigrations(pool);
    getLogger().info({ applied }, `Applied ${applied.length} migration(s)`);
  } finally {
    await closePool();
  }
}

main().catch((error: unknown) => {
  getLogger().fatal({ err: error }, 'Migration failed');
  process.exitCode = 1;
});
