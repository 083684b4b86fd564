import { DegenerateVectorError, DimensionMismatchError } from '../errors';
import type { Embedding } from './types';

/**
 * Calculate cosine similarity between two vectors.
 *
 * Dot product and both squared norms are accumulated in one pass.
 * Throws DimensionMismatchError for unequal lengths and
 * DegenerateVectorError when either vector has zero norm.
 */
export const cosineSimilarity = (vecA: Embedding, vecB: Embedding): number => {
  if (vecA.length !== vecB.length) {
    throw new DimensionMismatchError(vecA.length, vecB.length);
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < vecA.length; i++) {
    const a = vecA[i];
    const b = vecB[i];
    dotProduct += a * b;
    normA += a * a;
    normB += b * b;
  }

  if (normA === 0 || normB === 0) {
    throw new DegenerateVectorError();
  }

  return dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
};
