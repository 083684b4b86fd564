import OpenAI from 'openai';
import { z } from 'zod';
import { EmbeddingService } from './EmbeddingService';
import type { EmbeddingBackendConfig, EmbeddingRequest, EmbeddingResponse } from './types';
import { EmbeddingBackendError } from '../errors';
import { embeddingLogger } from '../logger';

type OpenAICompatibleConfig = Extract<EmbeddingBackendConfig, { name: 'openai-compatible' }>;

/**
 * The slice of the OpenAI SDK this backend talks to
 */
export interface EmbeddingsClient {
  embeddings: {
    create(body: { model: string; input: string[]; encoding_format: 'float' }): Promise<unknown>;
  };
}

const embeddingsResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      embedding: z.array(z.number().finite()).nonempty(),
    })
  ),
});

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Embedding backend for any OpenAI-compatible `/embeddings` endpoint
 * (LM Studio, Ollama, vLLM, OpenAI itself)
 */
export class OpenAICompatibleEmbeddingBackend extends EmbeddingService<OpenAICompatibleConfig> {
  private client: EmbeddingsClient | null;
  private initializationPromise: Promise<void> | null = null;

  constructor(config: OpenAICompatibleConfig, client?: EmbeddingsClient) {
    super(config);
    this.client = client ?? null;
  }

  async initialize(): Promise<void> {
    if (this.initializationPromise) {
      return this.initializationPromise;
    }

    this.initializationPromise = this.doInitialize();
    return this.initializationPromise;
  }

  private async doInitialize(): Promise<void> {
    const { baseURL, apiKey, timeout, maxRetries, model } = this.config.settings;

    try {
      embeddingLogger.info(`Initializing OpenAI-compatible backend at ${baseURL}...`);

      if (!this.client) {
        this.client = new OpenAI({ baseURL, apiKey, timeout, maxRetries });
      }

      const dimension = await this.testConnection();

      this.isInitialized = true;
      embeddingLogger.info(`OpenAI-compatible backend initialized with model ${model}`, { dimension });
    } catch (error) {
      this.isInitialized = false;
      this.initializationPromise = null;
      embeddingLogger.error('Failed to initialize OpenAI-compatible backend', error);
      throw new EmbeddingBackendError(
        this.getName(),
        `Initialization failed: ${describeError(error)}`,
        { cause: error }
      );
    }
  }

  async embedBatch(request: EmbeddingRequest): Promise<EmbeddingResponse> {
    if (!this.isInitialized || !this.client) {
      throw new EmbeddingBackendError(this.getName(), 'Backend not initialized');
    }

    const startTime = Date.now();
    embeddingLogger.debug(`Embedding ${request.texts.length} texts`, { requestId: request.requestId });

    const vectors = await this.request(this.client, request.texts);
    const processingTime = Date.now() - startTime;

    embeddingLogger.debug(`Embeddings generated in ${processingTime}ms`);

    return {
      embeddings: vectors.map(vector => ({ vector, dimension: vector.length })),
      processingTime,
      backend: this.getName(),
    };
  }

  async healthCheck(): Promise<boolean> {
    if (!this.isInitialized || !this.client) {
      return false;
    }

    try {
      await this.testConnection();
      return true;
    } catch (error) {
      embeddingLogger.warn('OpenAI-compatible health check failed', { error: describeError(error) });
      return false;
    }
  }

  /**
   * Embed a probe text and return the vector length the model produces
   */
  private async testConnection(): Promise<number> {
    if (!this.client) {
      throw new Error('Client not initialized');
    }
    const [probe] = await this.request(this.client, ['test']);
    return probe.length;
  }

  /**
   * Send one request and return the vectors in input order.
   * Transport errors from the SDK are rethrown as they are.
   */
  private async request(client: EmbeddingsClient, texts: string[]): Promise<number[][]> {
    const raw = await client.embeddings.create({
      model: this.config.settings.model,
      input: texts,
      encoding_format: 'float',
    });

    const parsed = embeddingsResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new EmbeddingBackendError(
        this.getName(),
        `Malformed embeddings response: ${parsed.error.issues.map(issue => issue.message).join('; ')}`
      );
    }

    const vectors = new Array<number[] | undefined>(texts.length);
    for (const item of parsed.data.data) {
      if (item.index < texts.length) {
        vectors[item.index] = item.embedding;
      }
    }

    const ordered: number[][] = [];
    for (let i = 0; i < texts.length; i++) {
      const vector = vectors[i];
      if (!vector) {
        throw new EmbeddingBackendError(this.getName(), `Response is missing the embedding for input ${i}`);
      }
      ordered.push(vector);
    }
    return ordered;
  }
}
