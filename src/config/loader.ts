/**
 * Configuration Loader
 * @module config/loader
 *
 * Multi-source configuration loading with validation.
 * Sources are merged in priority order and validated once with zod.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { AppConfig, AppConfigSchema } from './schema.js';
import { ConfigurationError, getErrorMessage } from '../errors/index.js';

/**
 * Raw configuration tree as produced by a source
 */
export type ConfigTree = { [key: string]: unknown };

// ============================================================================
// Configuration Source Interface
// ============================================================================

/**
 * Configuration source interface
 * Sources are loaded in order of priority (lowest first, highest overrides)
 */
export interface ConfigSource {
  name: string;
  priority: number;
  load(): Promise<ConfigTree>;
  isAvailable(): boolean;
}

function isConfigTree(value: unknown): value is ConfigTree {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Recursively remove undefined values and empty branches
 */
export function filterUndefined(tree: ConfigTree): ConfigTree {
  const result: ConfigTree = {};

  for (const [key, value] of Object.entries(tree)) {
    if (value === undefined) {
      continue;
    }
    if (isConfigTree(value)) {
      const filtered = filterUndefined(value);
      if (Object.keys(filtered).length > 0) {
        result[key] = filtered;
      }
    } else {
      result[key] = value;
    }
  }

  return result;
}

/**
 * Deep merge, later trees win
 */
export function mergeConfigTrees(base: ConfigTree, override: ConfigTree): ConfigTree {
  const result: ConfigTree = { ...base };

  for (const [key, value] of Object.entries(override)) {
    const existing = result[key];
    result[key] =
      isConfigTree(existing) && isConfigTree(value) ? mergeConfigTrees(existing, value) : value;
  }

  return result;
}

// ============================================================================
// Environment Variable Configuration Source
// ============================================================================

/**
 * Maps environment variables to the configuration structure
 */
export class EnvironmentConfigSource implements ConfigSource {
  public readonly name = 'environment';
  public readonly priority = 10;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  isAvailable(): boolean {
    return true;
  }

  async load(): Promise<ConfigTree> {
    const env = this.env;

    return filterUndefined({
      env: env.NODE_ENV,
      server: {
        host: env.HOST,
        port: env.PORT,
        publicUrl: env.PUBLIC_URL,
        cors: {
          origins: env.CORS_ORIGINS,
        },
        rateLimit: {
          enabled: env.RATE_LIMIT_ENABLED,
          windowMs: env.RATE_LIMIT_WINDOW_MS,
          max: env.RATE_LIMIT_MAX,
        },
        bodyLimit: env.BODY_LIMIT,
        trustProxy: env.TRUST_PROXY,
      },
      database: {
        connectionString: env.DATABASE_URL,
        host: env.DB_HOST,
        port: env.DB_PORT,
        database: env.DB_NAME,
        username: env.DB_USER,
        password: env.DB_PASSWORD,
        ssl: env.DB_SSL,
        poolMax: env.DB_POOL_MAX,
        idleTimeout: env.DB_IDLE_TIMEOUT,
        connectionTimeout: env.DB_CONNECTION_TIMEOUT,
        autoMigrate: env.DB_AUTO_MIGRATE,
      },
      storage: {
        driver: env.STORAGE_DRIVER,
      },
      results: {
        additionalOutcomes: env.RESULTS_ADDITIONAL_OUTCOMES,
        requireKnownOutcome: env.RESULTS_REQUIRE_KNOWN_OUTCOME,
        queryLimit: env.RESULTS_QUERY_LIMIT,
      },
      messaging: {
        enabled: env.MESSAGING_ENABLED,
        plugin: env.MESSAGING_PLUGIN,
        channel: env.MESSAGING_CHANNEL,
        redisUrl: env.REDIS_URL,
        retry: {
          maxAttempts: env.MESSAGING_RETRY_ATTEMPTS,
          delayMs: env.MESSAGING_RETRY_DELAY_MS,
        },
      },
      logging: {
        level: env.LOG_LEVEL,
        pretty: env.LOG_PRETTY,
      },
    });
  }
}

// ============================================================================
// File Configuration Source
// ============================================================================

/**
 * JSON file configuration source
 */
export class FileConfigSource implements ConfigSource {
  public readonly name: string;
  public readonly priority: number;
  private readonly filePath: string;

  constructor(filePath: string, priority = 5) {
    this.filePath = resolve(process.cwd(), filePath);
    this.name = `file:${filePath}`;
    this.priority = priority;
  }

  isAvailable(): boolean {
    return existsSync(this.filePath);
  }

  async load(): Promise<ConfigTree> {
    if (!this.isAvailable()) {
      throw new ConfigurationError(this.name, `Configuration file not found: ${this.filePath}`);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      throw new ConfigurationError(
        this.name,
        `Failed to load configuration file: ${getErrorMessage(error)}`
      );
    }

    if (!isConfigTree(parsed)) {
      throw new ConfigurationError(this.name, 'Configuration file must contain a JSON object');
    }
    return parsed;
  }
}

// ============================================================================
// Configuration Loader
// ============================================================================

/**
 * Validate a merged configuration tree
 *
 * @throws ConfigurationError listing every failing path
 */
export function parseConfig(tree: ConfigTree): AppConfig {
  const result = AppConfigSchema.safeParse(tree);
  if (!result.success) {
    const issues = result.error.errors.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigurationError(
      issues.map((issue) => issue.path).join(', '),
      `Configuration validation failed:\n${issues
        .map((issue) => `  - ${issue.path}: ${issue.message}`)
        .join('\n')}`,
      { details: { issues } }
    );
  }
  return result.data;
}

export interface ConfigLoaderOptions {
  /** Custom config sources; defaults to CONFIG_FILE (if set) and the environment */
  sources?: ConfigSource[];
  env?: NodeJS.ProcessEnv;
}

/**
 * Multi-source configuration loader with validation
 */
export class ConfigLoader {
  private readonly sources: ConfigSource[];

  constructor(options: ConfigLoaderOptions = {}) {
    const env = options.env ?? process.env;
    const sources = options.sources ?? ConfigLoader.defaultSources(env);
    this.sources = [...sources].sort((a, b) => a.priority - b.priority);
  }

  static defaultSources(env: NodeJS.ProcessEnv): ConfigSource[] {
    const sources: ConfigSource[] = [new EnvironmentConfigSource(env)];
    if (env.CONFIG_FILE) {
      sources.push(new FileConfigSource(env.CONFIG_FILE));
    }
    return sources;
  }

  async load(): Promise<AppConfig> {
    let merged: ConfigTree = {};
    for (const source of this.sources) {
      merged = mergeConfigTrees(merged, await source.load());
    }
    return parseConfig(merged);
  }
}
