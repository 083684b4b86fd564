import type { LimitFunction } from 'p-limit';
import { embeddingLogger } from '../logger';
import type { Embedding, EmbeddingMapper, Projection } from './types';

/**
 * Embeddings keyed by projected text, scoped to a single operation.
 *
 * Deduplication is by string content: two different items that project to
 * the same text share one embedding and therefore score identically.
 */
export type EmbeddingStore = ReadonlyMap<string, Embedding>;

/**
 * Embed every distinct projection of `items` exactly once.
 *
 * Calls go through `limit`, so one limiter shared by every store of an
 * operation caps that operation as a whole. A rejection from the embedder
 * rejects the whole build with that same error.
 */
export async function buildEmbeddingStore<T>(
  items: Iterable<T>,
  projection: Projection<T>,
  embedder: EmbeddingMapper,
  limit: LimitFunction
): Promise<EmbeddingStore> {
  const texts = new Set<string>();
  for (const item of items) {
    texts.add(projection(item));
  }

  const entries = await Promise.all(
    Array.from(texts, text =>
      limit(async (): Promise<[string, Embedding]> => [text, await embedder.embed(text)])
    )
  );

  embeddingLogger.debug('Embedding store built', { distinctTexts: texts.size });
  return new Map(entries);
}

/**
 * Look up the embedding for an item; the item must have been part of the build.
 */
export function lookupEmbedding<T>(store: EmbeddingStore, projection: Projection<T>, item: T): Embedding {
  const text = projection(item);
  const embedding = store.get(text);
  if (embedding === undefined) {
    // only reachable when a projection is not a pure function of its item
    throw new Error(`No embedding stored for "${text}"`);
  }
  return embedding;
}
