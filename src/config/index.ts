/**
 * Configuration Module
 * @module config
 */

import { ConfigLoader, ConfigLoaderOptions } from './loader.js';
import type { AppConfig } from './schema.js';

export * from './schema.js';
export {
  ConfigLoader,
  EnvironmentConfigSource,
  FileConfigSource,
  parseConfig,
  mergeConfigTrees,
  filterUndefined,
} from './loader.js';
export type { ConfigSource, ConfigTree, ConfigLoaderOptions } from './loader.js';

let cachedConfig: AppConfig | null = null;

/**
 * Load and cache the application configuration
 */
export async function loadConfig(options?: ConfigLoaderOptions): Promise<AppConfig> {
  cachedConfig = await new ConfigLoader(options).load();
  return cachedConfig;
}

/**
 * Cached configuration, loading it on first use
 */
export async function getConfig(): Promise<AppConfig> {
  return cachedConfig ?? loadConfig();
}

/**
 * Drop the cached configuration (primarily for testing)
 */
export function resetConfig(): void {
  cachedConfig = null;
}
