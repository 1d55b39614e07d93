/**
 * Configuration Schema Definitions
 * @module config/schema
 *
 * Zod schemas for validating all application configuration.
 * Provides type-safe configuration with compile-time type inference.
 */

import { z } from 'zod';

// ============================================================================
// Shared Primitives
// ============================================================================

/**
 * Valid application environments
 */
export const Environment = z.enum(['development', 'staging', 'production', 'test']);
export type Environment = z.infer<typeof Environment>;

/**
 * Accepts real booleans as well as the strings environment variables carry
 */
export const Booleanish = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1');

/**
 * Accepts an array or a comma separated string
 */
export const StringList = z
  .union([z.array(z.string()), z.string()])
  .transform((value) =>
    (Array.isArray(value) ? value : value.split(','))
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

// ============================================================================
// Server Configuration
// ============================================================================

export const ServerConfigSchema = z.object({
  /** Host to bind to */
  host: z.string().default('0.0.0.0'),
  /** Port to listen on */
  port: z.coerce.number().int().min(1).max(65535).default(5001),
  /** Base URL used for `href` links; the request host is used when unset */
  publicUrl: z.string().url().optional(),
  cors: z
    .object({
      origins: StringList.default(['*']),
    })
    .default({}),
  rateLimit: z
    .object({
      enabled: Booleanish.default(true),
      /** Time window in milliseconds */
      windowMs: z.coerce.number().int().min(1000).default(60000),
      /** Maximum requests per window */
      max: z.coerce.number().int().min(1).default(1000),
    })
    .default({}),
  /** Maximum body size in bytes */
  bodyLimit: z.coerce.number().int().min(1024).default(1048576),
  trustProxy: Booleanish.default(false),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

// ============================================================================
// Database Configuration
// ============================================================================

export const DatabaseConfigSchema = z.object({
  /** Full connection string (overrides individual settings) */
  connectionString: z.string().optional(),
  host: z.string().default('localhost'),
  port: z.coerce.number().int().min(1).max(65535).default(5432),
  database: z.string().default('resultsdb'),
  username: z.string().default('resultsdb'),
  password: z.string().default(''),
  ssl: Booleanish.default(false),
  /** Maximum pool size */
  poolMax: z.coerce.number().int().min(1).default(10),
  /** Idle timeout in milliseconds */
  idleTimeout: z.coerce.number().int().min(1000).default(30000),
  /** Connection timeout in milliseconds */
  connectionTimeout: z.coerce.number().int().min(100).default(5000),
  /** Apply pending migrations on startup */
  autoMigrate: Booleanish.default(false),
});

export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;

// ============================================================================
// Storage Configuration
// ============================================================================

export const StorageDriver = z.enum(['postgres', 'memory']);
export type StorageDriver = z.infer<typeof StorageDriver>;

export const StorageConfigSchema = z.object({
  driver: StorageDriver.default('postgres'),
});

export type StorageConfig = z.infer<typeof StorageConfigSchema>;

// ============================================================================
// Results Configuration
// ============================================================================

export const DEFAULT_OUTCOMES = ['PASSED', 'INFO', 'FAILED', 'NEEDS_INSPECTION'] as const;

export const ResultsConfigSchema = z.object({
  /** Outcomes advertised in addition to the defaults */
  additionalOutcomes: StringList.default([]),
  /** Reject outcomes outside the advertised list at the HTTP layer */
  requireKnownOutcome: Booleanish.default(false),
  /** Default page size */
  queryLimit: z.coerce.number().int().min(1).default(20),
});

export type ResultsConfig = z.infer<typeof ResultsConfigSchema>;

// ============================================================================
// Messaging Configuration
// ============================================================================

export const MessagingPlugin = z.enum(['dummy', 'redis']);
export type MessagingPlugin = z.infer<typeof MessagingPlugin>;

export const MessagingConfigSchema = z.object({
  enabled: Booleanish.default(true),
  plugin: MessagingPlugin.default('dummy'),
  /** Channel new results are published on */
  channel: z.string().min(1).default('resultsdb.result.new'),
  redisUrl: z.string().default('redis://localhost:6379'),
  retry: z
    .object({
      maxAttempts: z.coerce.number().int().min(1).default(3),
      delayMs: z.coerce.number().int().min(0).default(100),
    })
    .default({}),
});

export type MessagingConfig = z.infer<typeof MessagingConfigSchema>;

// ============================================================================
// Logging Configuration
// ============================================================================

export const LogLevel = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevel>;

export const LoggingConfigSchema = z.object({
  level: LogLevel.default('info'),
  pretty: Booleanish.default(false),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// ============================================================================
// Application Configuration
// ============================================================================

export const AppConfigSchema = z.object({
  env: Environment.default('development'),
  server: ServerConfigSchema.default({}),
  database: DatabaseConfigSchema.default({}),
  storage: StorageConfigSchema.default({}),
  results: ResultsConfigSchema.default({}),
  messaging: MessagingConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Input accepted before defaults and coercion are applied
 */
export type AppConfigInput = z.input<typeof AppConfigSchema>;

/**
 * Every outcome the API advertises
 */
export function knownOutcomes(config: ResultsConfig): string[] {
  return [...DEFAULT_OUTCOMES, ...config.additionalOutcomes];
}
