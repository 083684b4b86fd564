export * from './semantic';
export * from './errors';
export { getConfig, getEmbeddingConfig, getLogConfig, resetConfig } from './config';
export type { EmbeddingConfig, EnvConfig, LogConfig } from './config';
