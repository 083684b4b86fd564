import { EmbeddingBackendError } from '../errors';
import type {
  Embedding,
  EmbeddingBackendConfig,
  EmbeddingMapper,
  EmbeddingRequest,
  EmbeddingResponse,
} from './types';

/**
 * Abstract base class for embedding backends
 */
export abstract class EmbeddingService<C extends EmbeddingBackendConfig = EmbeddingBackendConfig>
  implements EmbeddingMapper
{
  protected config: C;
  protected isInitialized: boolean = false;

  constructor(config: C) {
    this.config = config;
  }

  /**
   * Initialize the embedding service
   */
  abstract initialize(): Promise<void>;

  /**
   * Generate embeddings for the given texts, in request order
   */
  abstract embedBatch(request: EmbeddingRequest): Promise<EmbeddingResponse>;

  /**
   * Check if the service is healthy and available
   */
  abstract healthCheck(): Promise<boolean>;

  /**
   * Embed a single text
   */
  async embed(text: string): Promise<Embedding> {
    const response = await this.embedBatch({ texts: [text] });
    const [first] = response.embeddings;
    if (!first) {
      throw new EmbeddingBackendError(this.getName(), 'Backend returned no embedding');
    }
    return first.vector;
  }

  getName(): string {
    return this.config.name;
  }

  /**
   * Get the service priority (higher = preferred)
   */
  getPriority(): number {
    return this.config.priority;
  }

  isEnabled(): boolean {
    return this.config.enabled;
  }

  getInitialized(): boolean {
    return this.isInitialized;
  }
}
