/**
 * Registered migrations, in version order
 * @module db/migrations
 */

import initialSchema from './001_initial_schema.js';
import type { Migration } from './001_initial_schema.js';

export type { Migration };

export const MIGRATIONS: readonly Migration[] = [initialSchema];
