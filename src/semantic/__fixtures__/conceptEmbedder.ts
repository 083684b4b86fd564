import { vi } from 'vitest';
import fixture from './conceptEmbeddings.json';
import type { Embedding, EmbeddingMapper } from '../types';

const vectors: Record<string, number[]> = fixture.vectors;

/**
 * Embedder over a fixed table of hand-built vectors, one axis per topic.
 * Unknown text rejects, standing in for a failing model server.
 */
export const createConceptEmbedder = () => {
  const embed = vi.fn(async (text: string): Promise<Embedding> => {
    const vector = vectors[text];
    if (!vector) {
      throw new Error(`No fixture embedding for "${text}"`);
    }
    return vector;
  });

  const embedder: EmbeddingMapper = { embed };
  return { embedder, embed };
};
