/**
 * Migration runner tests
 */

import { describe, it, expect, vi } from 'vitest';
import { runMigrations } from '../migrate.js';
import type { Migration } from '../migrations/index.js';
import { MigrationError } from '../../errors/index.js';
import { getLogger } from '../../logging/logger.js';
import { asPool, createMockPool, executedSql } from '../../../tests/mocks/index.js';

describe('runMigrations', () => {
  it('should apply pending migrations in a transaction and record them', async () => {
    const pool = createMockPool({ 'SELECT version FROM schema_migrations': [] });

    const applied = await runMigrations(asPool(pool));

    expect(applied).toEqual(['001']);
    const sql = executedSql(pool.client.query);
    expect(sql[0]).toBe('BEGIN');
    expect(sql[sql.length - 1]).toBe('COMMIT');
    expect(sql.some((text) => text.includes('CREATE TABLE IF NOT EXISTS result_data'))).toBe(true);
    const record = pool.client.query.mock.calls.find(([text]) => text.startsWith('INSERT INTO schema_migrations'));
    expect(record?.[1]).toEqual(['001', 'initial_schema']);
    expect(pool.client.release).toHaveBeenCalledTimes(1);
  });

  it('should time each migration step', async () => {
    const metric = vi.spyOn(getLogger(), 'performanceMetric');
    const pool = createMockPool({ 'SELECT version FROM schema_migrations': [] });

    await runMigrations(asPool(pool));

    expect(metric).toHaveBeenCalledWith('migration 001', expect.any(Number), { status: 'success' });
    metric.mockRestore();
  });

  it('should skip recorded migrations', async () => {
    const pool = createMockPool({ 'SELECT version FROM schema_migrations': [{ version: '001' }] });

    expect(await runMigrations(asPool(pool))).toEqual([]);
    expect(pool.connect).not.toHaveBeenCalled();
  });

  it('should roll back a failing migration', async () => {
    const pool = createMockPool({ 'SELECT version FROM schema_migrations': [{ version: '001' }] });
    const broken: Migration = {
      version: '002',
      name: 'broken',
      up: () => Promise.reject(new Error('syntax error at or near "TABLE"')),
      down: () => Promise.resolve(),
    };

    await expect(runMigrations(asPool(pool), [broken])).rejects.toBeInstanceOf(MigrationError);
    await expect(runMigrations(asPool(pool), [broken])).rejects.toThrow('Migration 002 failed');
    expect(executedSql(pool.client.query)).toEqual(['BEGIN', 'ROLLBACK', 'BEGIN', 'ROLLBACK']);
  });
});
