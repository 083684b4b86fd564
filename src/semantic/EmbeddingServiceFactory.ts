import { EmbeddingService } from './EmbeddingService';
import { HashingEmbeddingBackend } from './HashingEmbeddingBackend';
import { OpenAICompatibleEmbeddingBackend } from './OpenAICompatibleEmbeddingBackend';
import type { EmbeddingsClient } from './OpenAICompatibleEmbeddingBackend';
import type { EmbeddingBackendConfig, EmbeddingBackendName } from './types';
import { getEmbeddingConfig } from '../config';
import type { EmbeddingConfig } from '../config';
import { EmbeddingBackendError } from '../errors';
import { embeddingLogger } from '../logger';

export interface EmbeddingServiceFactoryOptions {
  /** Overrides the client the OpenAI-compatible backend would construct */
  openAIClient?: EmbeddingsClient;
}

/**
 * Builds embedding backends from configuration and picks the one to use
 */
export class EmbeddingServiceFactory {
  private readonly config: EmbeddingConfig;
  private readonly options: EmbeddingServiceFactoryOptions;
  private backends: Map<EmbeddingBackendName, EmbeddingService> = new Map();
  private activeBackend: EmbeddingService | null = null;
  private initializationPromise: Promise<EmbeddingService> | null = null;

  constructor(config: EmbeddingConfig = getEmbeddingConfig(), options: EmbeddingServiceFactoryOptions = {}) {
    this.config = config;
    this.options = options;

    for (const backendConfig of this.backendConfigs()) {
      this.backends.set(backendConfig.name, this.createBackend(backendConfig));
    }
  }

  /**
   * Initialize the configured backend, or in `auto` mode the first healthy one
   */
  async initialize(): Promise<EmbeddingService> {
    if (this.initializationPromise) {
      return this.initializationPromise;
    }

    this.initializationPromise = this.detectBestBackend().catch((error: unknown) => {
      this.initializationPromise = null;
      throw error;
    });
    return this.initializationPromise;
  }

  /**
   * Backend configurations in priority order; disabled unless `auto` or explicitly chosen
   */
  private backendConfigs(): EmbeddingBackendConfig[] {
    const { backend } = this.config;
    const enabled = (name: EmbeddingBackendName) => backend === 'auto' || backend === name;

    return [
      {
        name: 'openai-compatible',
        enabled: enabled('openai-compatible'),
        priority: 100,
        settings: {
          baseURL: this.config.baseURL,
          apiKey: this.config.apiKey,
          model: this.config.model,
          timeout: this.config.timeout,
          maxRetries: this.config.maxRetries,
        },
      },
      {
        name: 'hashing',
        enabled: enabled('hashing'),
        priority: 1,
        settings: { dimensions: this.config.hashingDimensions },
      },
    ];
  }

  private createBackend(config: EmbeddingBackendConfig): EmbeddingService {
    switch (config.name) {
      case 'openai-compatible':
        return new OpenAICompatibleEmbeddingBackend(config, this.options.openAIClient);
      case 'hashing':
        return new HashingEmbeddingBackend(config);
    }
  }

  /**
   * Try enabled backends by descending priority and keep the first that initializes
   */
  private async detectBestBackend(): Promise<EmbeddingService> {
    const candidates = Array.from(this.backends.values())
      .sort((a, b) => b.getPriority() - a.getPriority());

    const failures: string[] = [];
    for (const backend of candidates) {
      const name = backend.getName();
      if (!backend.isEnabled()) {
        embeddingLogger.debug(`Skipping disabled backend: ${name}`);
        continue;
      }

      try {
        embeddingLogger.info(`Attempting to initialize backend: ${name}`);
        // initialize() already proves the backend works, so no second health probe
        await backend.initialize();

        this.activeBackend = backend;
        embeddingLogger.info(`Selected embedding backend: ${name}`);
        return backend;
      } catch (error) {
        failures.push(`${name}: ${error instanceof Error ? error.message : String(error)}`);
        embeddingLogger.error(`Backend ${name} initialization failed`, error);
      }
    }

    throw new EmbeddingBackendError(
      this.config.backend,
      `No embedding backend could be initialized (${failures.join('; ') || 'none enabled'})`
    );
  }

  /**
   * Get the currently active backend
   */
  getActiveBackend(): EmbeddingService {
    if (!this.activeBackend) {
      throw new EmbeddingBackendError(this.config.backend, 'No active embedding backend. Call initialize() first.');
    }
    return this.activeBackend;
  }

  getBackend(name: EmbeddingBackendName): EmbeddingService | undefined {
    return this.backends.get(name);
  }

  /**
   * Status of all backends, highest priority first
   */
  async getBackendStatus(): Promise<Array<{
    name: string;
    enabled: boolean;
    initialized: boolean;
    healthy: boolean;
    priority: number;
    isActive: boolean;
  }>> {
    const status = [];

    for (const [name, backend] of this.backends) {
      const healthy = backend.getInitialized() ? await backend.healthCheck() : false;

      status.push({
        name,
        enabled: backend.isEnabled(),
        initialized: backend.getInitialized(),
        healthy,
        priority: backend.getPriority(),
        isActive: this.activeBackend === backend,
      });
    }

    return status.sort((a, b) => b.priority - a.priority);
  }
}

/**
 * Convenience function returning an initialized embedding service
 */
export async function getEmbeddingService(
  config: EmbeddingConfig = getEmbeddingConfig(),
  options: EmbeddingServiceFactoryOptions = {}
): Promise<EmbeddingService> {
  return new EmbeddingServiceFactory(config, options).initialize();
}
