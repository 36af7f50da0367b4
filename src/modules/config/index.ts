/**
 * Configuration Management System
 * Environment-based configuration for the API server and the run engine workers
 */

import { z } from 'zod';

// Environment variables are strings; booleans accept "true"/"false"/"1"/"0"
const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform(value => value === true || value === 'true' || value === '1');

// Configuration schema
const ConfigSchema = z.object({
  // Environment
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  ROLE: z.enum(['all', 'api', 'worker']).default('all'),

  // API Configuration
  PORT: z.coerce.number().int().positive().default(8080),
  API_KEY: z.string().min(1, 'API_KEY is required'),
  MAX_REQUEST_SIZE: z.coerce.number().default(10 * 1024 * 1024), // 10MB
  DEFAULT_OWNER_ID: z.string().default('default'),

  // Storage
  DATABASE_PATH: z.string().default('./data/assistants.db'),
  BLOB_DIR: z.string().default('./data/blobs'),
  MAX_FILE_SIZE: z.coerce.number().default(25 * 1024 * 1024), // 25MB
  CHUNK_SIZE: z.coerce.number().int().positive().default(1000),

  // Model provider
  OPENAI_API_KEY: z.string().default(''),
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  OPENAI_ORGANIZATION: z.string().optional(),
  // Anthropic through its OpenAI-compatible endpoint; registered only when a key is set
  ANTHROPIC_API_KEY: z.string().default(''),
  ANTHROPIC_BASE_URL: z.string().url().default('https://api.anthropic.com/v1/'),
  ANTHROPIC_MODEL_PREFIXES: z.string().default('claude'),
  MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  MODEL_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),

  // Run engine
  RUN_EXPIRES_AFTER_SECONDS: z.coerce.number().int().positive().default(600),
  ENGINE_MAX_ROUNDS: z.coerce.number().int().min(1).default(10),
  RETRY_INITIAL_BACKOFF_MS: z.coerce.number().int().min(0).default(500),
  RETRY_MAX_BACKOFF_MS: z.coerce.number().int().min(0).default(8000),

  // Queue
  WORKER_CONCURRENCY: z.coerce.number().int().min(1).default(4),
  QUEUE_LEASE_MS: z.coerce.number().int().positive().default(30000),
  QUEUE_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(250),
  QUEUE_WAIT_MS: z.coerce.number().int().positive().default(5000),
  SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(30000),

  // Tools
  RETRIEVAL_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  RETRIEVAL_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  RETRIEVAL_MAX_CHARS: z.coerce.number().int().positive().default(4000),
  SANDBOX_URL: z.string().url().default('http://localhost:8090'),
  SANDBOX_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  SANDBOX_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  SANDBOX_ALLOW_NETWORK: booleanFlag.default(false),
  ACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  ACTION_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_REQUESTS: booleanFlag.default(true),
  LOG_ERRORS: booleanFlag.default(true),

  // Feature Flags
  ENABLE_AUTH: booleanFlag.default(true),
  ENABLE_CORS: booleanFlag.default(true),
  CORS_ORIGINS: z.string().default('*'),

  // Error Handling
  EXPOSE_ERROR_DETAILS: booleanFlag.default(false),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const envVars: Record<string, string> = {};

  // Empty strings count as unset
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === 'string' && value !== '') {
      envVars[key] = value;
    }
  }

  const result = ConfigSchema.safeParse(envVars);
  if (!result.success) {
    const errorMessages = result.error.issues.map(issue =>
      `${issue.path.join('.')}: ${issue.message}`
    ).join(', ');

    throw new Error(`Configuration validation failed: ${errorMessages}`);
  }

  return result.data;
}

/**
 * Get default configuration for development and tests
 */
export function getDefaultConfig(overrides: Partial<Config> = {}): Config {
  return {
    ...ConfigSchema.parse({ API_KEY: 'dev-api-key' }),
    ...overrides,
  };
}

/**
 * Configuration utilities
 */
export const ConfigUtils = {
  /**
   * Get allowed origins as array
   */
  getAllowedOrigins(config: Config): string[] {
    if (config.CORS_ORIGINS === '*') {
      return ['*'];
    }
    return config.CORS_ORIGINS.split(',').map(origin => origin.trim());
  },

  getAnthropicModelPrefixes(config: Pick<Config, 'ANTHROPIC_MODEL_PREFIXES'>): string[] {
    return config.ANTHROPIC_MODEL_PREFIXES.split(',').map(prefix => prefix.trim()).filter(Boolean);
  },

  /**
   * Check if current environment is development
   */
  isDevelopment(config: Config): boolean {
    return config.NODE_ENV === 'development';
  },

  runsApi(config: Config): boolean {
    return config.ROLE === 'all' || config.ROLE === 'api';
  },

  runsWorkers(config: Config): boolean {
    return config.ROLE === 'all' || config.ROLE === 'worker';
  },
};

export default ConfigSchema;
