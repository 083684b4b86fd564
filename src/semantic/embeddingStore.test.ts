import { describe, it, expect, vi } from 'vitest';
import { buildEmbeddingStore, lookupEmbedding } from './embeddingStore';
import pLimit from 'p-limit';
import type { Embedding, EmbeddingMapper } from './types';

interface Card {
  id: number;
  title: string;
}

const cards: Card[] = [
  { id: 1, title: 'alpha' },
  { id: 2, title: 'beta' },
  { id: 3, title: 'alpha' },
];

const lengthEmbedder = () => {
  const embed = vi.fn(async (text: string): Promise<Embedding> => [text.length, 1]);
  const embedder: EmbeddingMapper = { embed };
  return { embedder, embed };
};

describe('buildEmbeddingStore', () => {
  it('should embed each distinct projection once', async () => {
    const { embedder, embed } = lengthEmbedder();

    const store = await buildEmbeddingStore(cards, card => card.title, embedder, pLimit(4));

    expect(embed).toHaveBeenCalledTimes(2);
    expect(embed.mock.calls.map(([text]) => text).sort()).toEqual(['alpha', 'beta']);
    expect(store.size).toBe(2);
    expect(store.get('alpha')).toEqual([5, 1]);
    expect(store.get('beta')).toEqual([4, 1]);
  });

  it('should give items with equal projections the same embedding', async () => {
    const { embedder } = lengthEmbedder();
    const projection = (card: Card) => card.title;

    const store = await buildEmbeddingStore(cards, projection, embedder, pLimit(4));

    expect(lookupEmbedding(store, projection, cards[0])).toBe(lookupEmbedding(store, projection, cards[2]));
  });

  it('should keep at most `concurrency` embedding calls in flight', async () => {
    let inFlight = 0;
    let peak = 0;
    const embedder: EmbeddingMapper = {
      embed: async text => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise(resolve => setImmediate(resolve));
        inFlight--;
        return [text.length, 1];
      },
    };

    const words = ['one', 'two', 'three', 'four', 'five', 'six'];
    const store = await buildEmbeddingStore(words, word => word, embedder, pLimit(2));

    expect(store.size).toBe(6);
    expect(peak).toBe(2);
  });

  it('should share one limiter across stores built together', async () => {
    let inFlight = 0;
    let peak = 0;
    const embedder: EmbeddingMapper = {
      embed: async text => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await new Promise(resolve => setImmediate(resolve));
        inFlight--;
        return [text.length, 1];
      },
    };
    const limit = pLimit(1);

    await Promise.all([
      buildEmbeddingStore(['a', 'bb', 'ccc'], word => word, embedder, limit),
      buildEmbeddingStore(['x', 'yy', 'zzz'], word => word, embedder, limit),
    ]);

    expect(peak).toBe(1);
  });

  it('should pass embedder failures through unchanged', async () => {
    const failure = new Error('model server unavailable');
    const embedder: EmbeddingMapper = {
      embed: vi.fn(async () => {
        throw failure;
      }),
    };

    await expect(buildEmbeddingStore(['a'], text => text, embedder, pLimit(1))).rejects.toBe(failure);
  });

  it('should return an empty store for no items', async () => {
    const { embedder, embed } = lengthEmbedder();

    const store = await buildEmbeddingStore([], (text: string) => text, embedder, pLimit(1));

    expect(store.size).toBe(0);
    expect(embed).not.toHaveBeenCalled();
  });
});

describe('lookupEmbedding', () => {
  it('should throw when the projection was never embedded', () => {
    const store = new Map<string, Embedding>([['alpha', [1]]]);

    expect(() => lookupEmbedding(store, (text: string) => text, 'gamma')).toThrow('No embedding stored for "gamma"');
  });
});
