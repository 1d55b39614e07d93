/**
 * Database Migration: Initial Schema
 * @module db/migrations/001_initial_schema
 *
 * Creates testcases, groups, results and the two association relations
 * (result_data, results_groups).
 */

import pg from 'pg';

/**
 * Migration interface
 */
export interface Migration {
  readonly version: string;
  readonly name: string;
  up(client: pg.PoolClient): Promise<void>;
  down(client: pg.PoolClient): Promise<void>;
}

export const migration: Migration = {
  version: '001',
  name: 'initial_schema',

  async up(client: pg.PoolClient): Promise<void> {
    // ========================================================================
    // 1. Entities
    // ========================================================================
    await client.query(`
      CREATE TABLE IF NOT EXISTS testcases (
        name TEXT PRIMARY KEY,
        ref_url TEXT
      );

      CREATE TABLE IF NOT EXISTS groups (
        uuid TEXT PRIMARY KEY,
        description TEXT,
        ref_url TEXT
      );

      CREATE TABLE IF NOT EXISTS results (
        id SERIAL PRIMARY KEY,
        testcase_name TEXT NOT NULL REFERENCES testcases(name),
        outcome TEXT NOT NULL,
        submit_time TIMESTAMP NOT NULL,
        note TEXT,
        ref_url TEXT
      );
    `);

    // ========================================================================
    // 2. Associations
    // ========================================================================
    await client.query(`
      CREATE TABLE IF NOT EXISTS results_groups (
        result_id INTEGER NOT NULL REFERENCES results(id) ON DELETE CASCADE,
        group_uuid TEXT NOT NULL REFERENCES groups(uuid),
        position INTEGER NOT NULL DEFAULT 0,
        PRIMARY KEY (result_id, group_uuid)
      );

      -- Keys repeat; one row per value, id keeps insertion order
      CREATE TABLE IF NOT EXISTS result_data (
        id SERIAL PRIMARY KEY,
        result_id INTEGER NOT NULL REFERENCES results(id) ON DELETE CASCADE,
        key TEXT NOT NULL,
        value TEXT NOT NULL
      );
    `);

    // ========================================================================
    // 3. Indexes
    // ========================================================================
    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_results_submit_time
        ON results(submit_time DESC, id DESC);
      CREATE INDEX IF NOT EXISTS idx_results_testcase_submit_time
        ON results(testcase_name, submit_time DESC, id DESC);
      CREATE INDEX IF NOT EXISTS idx_results_outcome
        ON results(outcome);
      CREATE INDEX IF NOT EXISTS idx_result_data_key_value
        ON result_data(key, value);
      CREATE INDEX IF NOT EXISTS idx_result_data_result_id
        ON result_data(result_id);
      CREATE INDEX IF NOT EXISTS idx_results_groups_group_uuid
        ON results_groups(group_uuid);
      CREATE INDEX IF NOT EXISTS idx_testcases_name_pattern
        ON testcases(name text_pattern_ops);
    `);
  },

  async down(client: pg.PoolClient): Promise<void> {
    await client.query(`
      DROP TABLE IF EXISTS result_data;
      DROP TABLE IF EXISTS results_groups;
      DROP TABLE IF EXISTS results;
      DROP TABLE IF EXISTS groups;
      DROP TABLE IF EXISTS testcases;
    `);
  },
};

export default migration;
