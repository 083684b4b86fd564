/**
 * Configuration Module
 *
 * Centralized, type-safe configuration with environment validation.
 * Settings are validated on first access so misconfiguration fails fast.
 */

import 'dotenv/config';
import { z } from 'zod';
import { configLogger } from './logger';

export const DEFAULT_EMBEDDING_CONCURRENCY = 4;

// default-on flags turn off only on 'false', default-off flags turn on only on 'true'
const booleanFlag = (fallback: 'true' | 'false') =>
  z.string()
    .default(fallback)
    .transform(val => (fallback === 'true' ? val !== 'false' : val === 'true'));

const integer = (fallback: number, min: number, max: number) =>
  z.coerce.number()
    .int()
    .min(min)
    .max(max)
    .default(fallback);

/**
 * Environment variable schema with validation
 */
const envSchema = z.object({
  // Embedding backend selection
  EMBEDDING_BACKEND: z.enum(['auto', 'openai-compatible', 'hashing'])
    .default('auto')
    .describe('Which embedding backend to use'),
  EMBEDDING_BASE_URL: z.string()
    .url()
    .default('http://localhost:1234/v1')
    .describe('Base URL of an OpenAI-compatible embeddings API'),
  EMBEDDING_API_KEY: z.string()
    .optional()
    .describe('API key for the embeddings API (local servers accept any value)'),
  EMBEDDING_MODEL: z.string()
    .min(1)
    .default('nomic-embed-text')
    .describe('Embedding model name'),
  EMBEDDING_TIMEOUT_MS: integer(30000, 1, 600000)
    .describe('Request timeout for the embeddings API'),
  EMBEDDING_MAX_RETRIES: integer(3, 0, 10)
    .describe('Retries performed by the HTTP client'),
  EMBEDDING_CONCURRENCY: integer(DEFAULT_EMBEDDING_CONCURRENCY, 1, 64)
    .describe('Maximum in-flight embedding calls per operation'),
  HASHING_DIMENSIONS: integer(256, 8, 8192)
    .describe('Vector length produced by the hashing backend'),

  // Logging Configuration
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'verbose'])
    .default('info')
    .describe('Logging level'),
  LOG_DIR: z.string()
    .default('.')
    .describe('Directory for log files'),
  LOG_TO_CONSOLE: booleanFlag('true')
    .describe('Whether to log to console'),
  LOG_TO_FILE: booleanFlag('false')
    .describe('Whether to write log files (off unless set to true)'),
});

export type EnvConfig = z.infer<typeof envSchema>;

let _config: EnvConfig | null = null;

/**
 * Get the validated configuration
 * Throws on first access if environment is invalid
 */
export const getConfig = (): EnvConfig => {
  if (_config) return _config;

  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.issues.map(issue =>
      `  - ${issue.path.join('.')}: ${issue.message}`
    ).join('\n');

    configLogger.error('Configuration validation failed:\n' + errors);
    throw new Error(`Invalid configuration:\n${errors}`);
  }

  _config = result.data;
  configLogger.debug('Configuration loaded successfully', {
    backend: _config.EMBEDDING_BACKEND,
    model: _config.EMBEDDING_MODEL,
  });

  return _config;
};

/**
 * Drop the memoised configuration so the next access re-reads the environment
 */
export const resetConfig = (): void => {
  _config = null;
};

export type EmbeddingBackendChoice = EnvConfig['EMBEDDING_BACKEND'];

export interface EmbeddingConfig {
  backend: EmbeddingBackendChoice;
  baseURL: string;
  apiKey: string;
  model: string;
  timeout: number;
  maxRetries: number;
  concurrency: number;
  hashingDimensions: number;
}

/**
 * Normalized embedding configuration
 */
export const getEmbeddingConfig = (): EmbeddingConfig => {
  const config = getConfig();

  return {
    backend: config.EMBEDDING_BACKEND,
    baseURL: config.EMBEDDING_BASE_URL,
    // the SDK refuses to start without a key; local servers ignore it
    apiKey: config.EMBEDDING_API_KEY || 'not-needed',
    model: config.EMBEDDING_MODEL,
    timeout: config.EMBEDDING_TIMEOUT_MS,
    maxRetries: config.EMBEDDING_MAX_RETRIES,
    concurrency: config.EMBEDDING_CONCURRENCY,
    hashingDimensions: config.HASHING_DIMENSIONS,
  };
};

export interface LogConfig {
  level: EnvConfig['LOG_LEVEL'];
  dir: string;
  toConsole: boolean;
  toFile: boolean;
}

export const getLogConfig = (): LogConfig => {
  const config = getConfig();
  return {
    level: config.LOG_LEVEL,
    dir: config.LOG_DIR,
    toConsole: config.LOG_TO_CONSOLE,
    toFile: config.LOG_TO_FILE,
  };
};

export default getConfig;
