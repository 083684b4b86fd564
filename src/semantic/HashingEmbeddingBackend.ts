import { EmbeddingService } from './EmbeddingService';
import type { EmbeddingBackendConfig, EmbeddingRequest, EmbeddingResponse } from './types';
import { embeddingLogger } from '../logger';

type HashingBackendConfig = Extract<EmbeddingBackendConfig, { name: 'hashing' }>;

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;
const SIGN_SEED = 0x9e3779b9;
const BIGRAM_WEIGHT = 0.5;

/**
 * Offline backend producing deterministic feature-hashing vectors.
 *
 * Words and adjacent word pairs are hashed into signed buckets and the result
 * is normalised to unit length, so texts sharing vocabulary score higher.
 * It knows nothing about meaning; it exists for development and tests, and as
 * the last resort when no model server is reachable.
 */
export class HashingEmbeddingBackend extends EmbeddingService<HashingBackendConfig> {
  constructor(config: HashingBackendConfig) {
    super(config);
  }

  async initialize(): Promise<void> {
    this.isInitialized = true;
    embeddingLogger.info(`Hashing backend ready (${this.config.settings.dimensions} dimensions)`);
  }

  async embedBatch(request: EmbeddingRequest): Promise<EmbeddingResponse> {
    const startTime = Date.now();
    const dimension = this.config.settings.dimensions;

    const embeddings = request.texts.map(text => ({
      vector: this.hashText(text),
      dimension,
    }));

    return {
      embeddings,
      processingTime: Date.now() - startTime,
      backend: this.getName(),
    };
  }

  async healthCheck(): Promise<boolean> {
    return this.isInitialized;
  }

  private hashText(text: string): number[] {
    const dimensions = this.config.settings.dimensions;
    const vector = new Array<number>(dimensions).fill(0);
    const words = tokenize(text);

    if (words.length === 0) {
      // constant direction, so blank text never produces a zero-norm vector
      vector[0] = 1;
      return vector;
    }

    const addFeature = (feature: string, weight: number) => {
      const bucket = fnv1a(feature, FNV_OFFSET) % dimensions;
      const sign = fnv1a(feature, SIGN_SEED) & 1 ? 1 : -1;
      vector[bucket] += sign * weight;
    };

    for (let i = 0; i < words.length; i++) {
      addFeature(words[i], 1);
      if (i + 1 < words.length) {
        addFeature(`${words[i]} ${words[i + 1]}`, BIGRAM_WEIGHT);
      }
    }

    const norm = Math.sqrt(vector.reduce((sum, val) => sum + val * val, 0));
    if (norm === 0) {
      // every feature cancelled out in the same bucket
      vector[0] = 1;
      return vector;
    }
    return vector.map(val => val / norm);
  }
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .split(/\s+/)
    .filter(word => word.length > 0);
}

function fnv1a(text: string, seed: number): number {
  let hash = seed;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME) >>> 0;
  }
  return hash;
}
