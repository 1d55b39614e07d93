/**
 * Vitest Global Test Setup
 * @module tests/setup
 *
 * Environment shared by every test file: quiet logging and the in-memory
 * storage driver.
 */

import { afterEach } from 'vitest';
import { resetConfig } from '../src/config/index.js';

// ============================================================================
// Environment Setup
// ============================================================================

// Set test environment variables before any imports
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
process.env.LOG_PRETTY = 'false';
process.env.STORAGE_DRIVER = 'memory';
process.env.MESSAGING_PLUGIN = 'dummy';
process.env.DB_PASSWORD = 'test-secret';

afterEach(() => {
  resetConfig();
});
