import pLimit from 'p-limit';
import { DEFAULT_EMBEDDING_CONCURRENCY, getEmbeddingConfig } from '../config';
import type { EmbeddingConfig } from '../config';
import { InputError, InvalidScoreError, SolverInvariantError } from '../errors';
import { matcherLogger, searchLogger } from '../logger';
import { buildEmbeddingStore, lookupEmbedding } from './embeddingStore';
import { getEmbeddingService } from './EmbeddingServiceFactory';
import type { EmbeddingServiceFactoryOptions } from './EmbeddingServiceFactory';
import { solveAssignment } from './hungarian';
import { cosineSimilarity } from './similarity';
import type {
  Embedding,
  EmbeddingMapper,
  Projection,
  ScoredItem,
  SemanticSearchOptions,
  SimilarityMeasure,
} from './types';

/**
 * Ranks and pairs items by the similarity of their embedded text.
 *
 * Items are embedded through their projection, and identical projections are
 * embedded once per call. Nothing is cached between calls. Each call keeps at
 * most `concurrency` embedding requests in flight, query included.
 */
export class SemanticSearch {
  private readonly embedder: EmbeddingMapper;
  private readonly similarity: SimilarityMeasure;
  private readonly concurrency: number;

  constructor(embedder: EmbeddingMapper, options: SemanticSearchOptions = {}) {
    this.embedder = embedder;
    this.similarity = options.similarity ?? cosineSimilarity;
    this.concurrency = options.concurrency ?? DEFAULT_EMBEDDING_CONCURRENCY;

    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new InputError(`Concurrency must be a positive integer, got ${this.concurrency}`);
    }
  }

  /**
   * Find the item most similar to the query.
   * Among equal scores the earliest item in `items` wins.
   */
  async findMostSimilar<T>(
    query: string,
    items: readonly T[],
    projection: Projection<T>
  ): Promise<ScoredItem<T>> {
    if (items.length === 0) {
      throw new InputError('Items must not be empty');
    }

    const scored = await this.scoreAll(query, items, projection);

    let best = scored[0];
    for (let i = 1; i < scored.length; i++) {
      if (scored[i].score > best.score) {
        best = scored[i];
      }
    }

    searchLogger.debug('Most similar item found', { candidates: items.length, score: best.score });
    return best;
  }

  /**
   * Order items by similarity to the query, most similar first.
   * Ties keep their input order; an empty input gives an empty result.
   */
  async orderBySimilarity<T>(
    query: string,
    items: readonly T[],
    projection: Projection<T>
  ): Promise<ScoredItem<T>[]> {
    if (items.length === 0) {
      return [];
    }

    const scored = await this.scoreAll(query, items, projection);
    // Array.prototype.sort is stable
    return scored.sort((a, b) => b.score - a.score);
  }

  /**
   * Pair two equally sized groups so that total similarity is maximal.
   * Items are projected with `String(item)`.
   */
  pairBySimilarity<T, U>(group1: readonly T[], group2: readonly U[]): Promise<Map<T, U>>;
  /**
   * Pair two equally sized groups so that total similarity is maximal.
   *
   * The result is keyed by group-1 items, so those must be pairwise distinct.
   */
  pairBySimilarity<T, U>(
    group1: readonly T[],
    projection1: Projection<T>,
    group2: readonly U[],
    projection2: Projection<U>
  ): Promise<Map<T, U>>;
  pairBySimilarity<T, U>(
    group1: readonly T[],
    second: readonly U[] | Projection<T>,
    group2?: readonly U[],
    projection2?: Projection<U>
  ): Promise<Map<T, U>> {
    if (typeof second === 'function') {
      if (group2 === undefined || projection2 === undefined) {
        return Promise.reject(new InputError('Both groups and both projections are required'));
      }
      return this.pair(group1, second, group2, projection2);
    }
    return this.pair(group1, String, second, String);
  }

  private async pair<T, U>(
    group1: readonly T[],
    projection1: Projection<T>,
    group2: readonly U[],
    projection2: Projection<U>
  ): Promise<Map<T, U>> {
    if (group1.length !== group2.length) {
      throw new InputError(`Groups must be of the same size (got ${group1.length} and ${group2.length})`);
    }
    if (new Set(group1).size !== group1.length) {
      throw new InputError('Items of the first group must be distinct');
    }

    const limit = pLimit(this.concurrency);
    const [store1, store2] = await Promise.all([
      buildEmbeddingStore(group1, projection1, this.embedder, limit),
      buildEmbeddingStore(group2, projection2, this.embedder, limit),
    ]);

    const columns = group2.map(item => lookupEmbedding(store2, projection2, item));
    // cost = -similarity, so the minimum-cost assignment has maximum similarity
    const costMatrix = group1.map(item => {
      const rowEmbedding = lookupEmbedding(store1, projection1, item);
      return columns.map(columnEmbedding => -this.score(rowEmbedding, columnEmbedding));
    });

    const started = Date.now();
    const { assignment, totalCost } = solveAssignment(costMatrix);
    matcherLogger.debug('Assignment solved', {
      size: group1.length,
      totalSimilarity: -totalCost,
      elapsedMs: Date.now() - started,
    });

    const result = new Map<T, U>();
    assignment.forEach((col, row) => {
      if (col === -1) {
        throw new SolverInvariantError(`Row ${row} was left unassigned in a square ${group1.length}x${group2.length} problem`);
      }
      result.set(group1[row], group2[col]);
    });
    return result;
  }

  private async scoreAll<T>(
    query: string,
    items: readonly T[],
    projection: Projection<T>
  ): Promise<ScoredItem<T>[]> {
    const limit = pLimit(this.concurrency);
    const [queryEmbedding, store] = await Promise.all([
      limit(() => this.embedder.embed(query)),
      buildEmbeddingStore(items, projection, this.embedder, limit),
    ]);

    return items.map(item => ({
      item,
      score: this.score(queryEmbedding, lookupEmbedding(store, projection, item)),
    }));
  }

  private score(v1: Embedding, v2: Embedding): number {
    const score = this.similarity(v1, v2);
    if (Number.isNaN(score)) {
      throw new InvalidScoreError();
    }
    return score;
  }
}

/**
 * Build a SemanticSearch over the configured embedding backend
 */
export async function createSemanticSearch(
  overrides: Partial<EmbeddingConfig> = {},
  options: SemanticSearchOptions & EmbeddingServiceFactoryOptions = {}
): Promise<SemanticSearch> {
  const config = { ...getEmbeddingConfig(), ...overrides };
  const embedder = await getEmbeddingService(config, { openAIClient: options.openAIClient });
  return new SemanticSearch(embedder, {
    similarity: options.similarity,
    concurrency: options.concurrency ?? config.concurrency,
  });
}
