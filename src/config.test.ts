/**
 * Tests for Configuration Module
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

const CONFIG_KEYS = [
  'EMBEDDING_BACKEND',
  'EMBEDDING_BASE_URL',
  'EMBEDDING_API_KEY',
  'EMBEDDING_MODEL',
  'EMBEDDING_TIMEOUT_MS',
  'EMBEDDING_MAX_RETRIES',
  'EMBEDDING_CONCURRENCY',
  'HASHING_DIMENSIONS',
  'LOG_LEVEL',
  'LOG_DIR',
  'LOG_TO_FILE',
];

describe('Config Module', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    // fresh module so the memoised config is rebuilt
    vi.resetModules();
    process.env = { ...originalEnv };
    for (const key of CONFIG_KEYS) {
      delete process.env[key];
    }
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  it('should use default values when env vars not set', async () => {
    const { getConfig } = await import('./config');
    const config = getConfig();

    expect(config.EMBEDDING_BACKEND).toBe('auto');
    expect(config.EMBEDDING_BASE_URL).toBe('http://localhost:1234/v1');
    expect(config.EMBEDDING_MODEL).toBe('nomic-embed-text');
    expect(config.EMBEDDING_TIMEOUT_MS).toBe(30000);
    expect(config.EMBEDDING_MAX_RETRIES).toBe(3);
    expect(config.EMBEDDING_CONCURRENCY).toBe(4);
    expect(config.HASHING_DIMENSIONS).toBe(256);
    expect(config.LOG_LEVEL).toBe('info');
    expect(config.LOG_TO_FILE).toBe(false);
  });

  it('should parse environment variables correctly', async () => {
    process.env.EMBEDDING_BACKEND = 'hashing';
    process.env.EMBEDDING_CONCURRENCY = '8';
    process.env.HASHING_DIMENSIONS = '512';
    process.env.LOG_LEVEL = 'debug';

    const { getConfig } = await import('./config');
    const config = getConfig();

    expect(config.EMBEDDING_BACKEND).toBe('hashing');
    expect(config.EMBEDDING_CONCURRENCY).toBe(8);
    expect(config.HASHING_DIMENSIONS).toBe(512);
    expect(config.LOG_LEVEL).toBe('debug');
  });

  it('should fill in a placeholder API key for local servers', async () => {
    const { getEmbeddingConfig } = await import('./config');

    expect(getEmbeddingConfig().apiKey).toBe('not-needed');
  });

  it('should normalize embedding settings', async () => {
    process.env.EMBEDDING_BASE_URL = 'http://localhost:11434/v1';
    process.env.EMBEDDING_API_KEY = 'test-key';
    process.env.EMBEDDING_MODEL = 'mxbai-embed-large';
    process.env.EMBEDDING_TIMEOUT_MS = '5000';

    const { getEmbeddingConfig } = await import('./config');

    expect(getEmbeddingConfig()).toEqual({
      backend: 'auto',
      baseURL: 'http://localhost:11434/v1',
      apiKey: 'test-key',
      model: 'mxbai-embed-large',
      timeout: 5000,
      maxRetries: 3,
      concurrency: 4,
      hashingDimensions: 256,
    });
  });

  it('should read logging flags', async () => {
    process.env.LOG_TO_CONSOLE = 'false';
    process.env.LOG_TO_FILE = 'true';
    process.env.LOG_DIR = 'logs';

    const { getLogConfig } = await import('./config');

    expect(getLogConfig()).toEqual({ level: 'info', dir: 'logs', toConsole: false, toFile: true });
  });

  it('should memoise until reset', async () => {
    const { getConfig, resetConfig } = await import('./config');

    expect(getConfig().EMBEDDING_MODEL).toBe('nomic-embed-text');
    process.env.EMBEDDING_MODEL = 'changed-model';
    expect(getConfig().EMBEDDING_MODEL).toBe('nomic-embed-text');

    resetConfig();
    expect(getConfig().EMBEDDING_MODEL).toBe('changed-model');
  });

  it('should throw on invalid backend', async () => {
    process.env.EMBEDDING_BACKEND = 'invalid-backend';

    const { getConfig } = await import('./config');

    expect(() => getConfig()).toThrow('Invalid configuration');
  });

  it('should throw on out-of-range concurrency', async () => {
    process.env.EMBEDDING_CONCURRENCY = '0';

    const { getConfig } = await import('./config');

    expect(() => getConfig()).toThrow('EMBEDDING_CONCURRENCY');
  });

  it('should throw on a malformed base URL', async () => {
    process.env.EMBEDDING_BASE_URL = 'not a url';

    const { getConfig } = await import('./config');

    expect(() => getConfig()).toThrow('EMBEDDING_BASE_URL');
  });

  it('should throw on invalid log level', async () => {
    process.env.LOG_LEVEL = 'invalid';

    const { getConfig } = await import('./config');

    expect(() => getConfig()).toThrow();
  });
});
