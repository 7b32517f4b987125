/**
 * Tests for candidate retrieval.
 */

import { describe, it, expect, vi } from 'vitest';
import { CandidateRetriever, assertThreshold, rankBySimilarity } from '../../src/retrieval/retriever.js';
import { RetrievalError } from '../../src/utils/errors.js';
import type { Item, ItemSource } from '../../src/storage/types.js';

function item(id: string, embedding: number[]): Item {
  return { id, content: id, embedding, attributes: {} };
}

// Similarities against [1, 0]: a = 1, b ≈ 0.894, c ≈ 0.707, d = 0, e = 0 (clamped)
const items = [
  item('c', [1, 1]),
  item('a', [1, 0]),
  item('d', [0, 1]),
  item('b', [2, 1]),
  item('e', [-1, 0]),
];

function source(all: Item[] = items): ItemSource {
  return { getAll: async () => all };
}

describe('CandidateRetriever', () => {
  it('returns items above the threshold, closest first', async () => {
    const retriever = new CandidateRetriever(source());
    const results = await retriever.retrieve([1, 0], 10, 0.5);

    expect(results.map((r) => r.item.id)).toEqual(['a', 'b', 'c']);
    expect(results[0].similarity).toBe(1);
    expect(results[0].score).toBe(1);
  });

  it('truncates to topK', async () => {
    const retriever = new CandidateRetriever(source());
    const results = await retriever.retrieve([1, 0], 2, 0);

    expect(results.map((r) => r.item.id)).toEqual(['a', 'b']);
  });

  it('includes items exactly at the threshold', async () => {
    const retriever = new CandidateRetriever(source([item('x', [1, 0])]));
    const results = await retriever.retrieve([1, 0], 5, 1);

    expect(results).toHaveLength(1);
  });

  it('threshold 0 admits orthogonal and opposite items', async () => {
    const retriever = new CandidateRetriever(source());
    const results = await retriever.retrieve([1, 0], 10, 0);

    expect(results.map((r) => r.item.id)).toEqual(['a', 'b', 'c', 'd', 'e']);
  });

  it('returns an empty list for an empty store', async () => {
    const retriever = new CandidateRetriever(source([]));
    expect(await retriever.retrieve([1, 0], 5, 0.5)).toEqual([]);
  });

  it('keeps store order for equal similarities', async () => {
    const retriever = new CandidateRetriever(
      source([item('first', [1, 0]), item('second', [2, 0]), item('third', [3, 0])]),
    );
    const results = await retriever.retrieve([1, 0], 3, 0);

    expect(results.map((r) => r.item.id)).toEqual(['first', 'second', 'third']);
  });

  it('uses findNearest when the store offers it, still applying the threshold', async () => {
    const getAll = vi.fn(async () => items);
    const findNearest = vi.fn(async () => [
      { item: item('a', [1, 0]), similarity: 0.9 },
      { item: item('z', [0, 1]), similarity: 0.2 },
    ]);
    const retriever = new CandidateRetriever({ getAll, findNearest });

    const results = await retriever.retrieve([1, 0], 4, 0.5);

    expect(findNearest).toHaveBeenCalledWith([1, 0], 4);
    expect(getAll).not.toHaveBeenCalled();
    expect(results.map((r) => r.item.id)).toEqual(['a']);
  });

  it('rejects invalid arguments before touching the store', async () => {
    const getAll = vi.fn(async () => items);
    const retriever = new CandidateRetriever({ getAll });

    await expect(retriever.retrieve([1, 0], 0, 0.5)).rejects.toMatchObject({ code: 'INVALID_TOP_K' });
    await expect(retriever.retrieve([1, 0], 5, 1.5)).rejects.toMatchObject({ code: 'INVALID_THRESHOLD' });
    await expect(retriever.retrieve([], 5, 0.5)).rejects.toMatchObject({ code: 'INVALID_VECTOR' });
    await expect(retriever.retrieve([Number.NaN], 5, 0.5)).rejects.toMatchObject({ code: 'INVALID_VECTOR' });
    expect(getAll).not.toHaveBeenCalled();
  });

  it('reports a dimension mismatch', async () => {
    const retriever = new CandidateRetriever(source([item('x', [1, 0, 0])]));
    await expect(retriever.retrieve([1, 0], 5, 0)).rejects.toMatchObject({
      code: 'DIMENSION_MISMATCH',
      message: 'item x has 3 dimensions, query has 2',
    });
  });

  it('wraps store failures as retryable RETRIEVAL_UNAVAILABLE', async () => {
    const retriever = new CandidateRetriever({
      getAll: async () => {
        throw new Error('connection refused');
      },
    });

    const error = await retriever.retrieve([1, 0], 5, 0).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetrievalError);
    expect(error).toMatchObject({
      code: 'RETRIEVAL_UNAVAILABLE',
      message: 'Item store unavailable: connection refused',
      retryable: true,
    });
  });

  it('times out a slow store with RETRIEVAL_TIMEOUT', async () => {
    vi.useFakeTimers();
    try {
      const retriever = new CandidateRetriever({ getAll: () => new Promise<Item[]>(() => {}) });
      const result = retriever.retrieve([1, 0], 5, 0, { timeoutMs: 100 });
      const assertion = expect(result).rejects.toMatchObject({
        code: 'RETRIEVAL_TIMEOUT',
        message: 'Item store did not respond within 100ms',
      });
      await vi.advanceTimersByTimeAsync(100);
      await assertion;
    } finally {
      vi.useRealTimers();
    }
  });
});

describe('assertThreshold', () => {
  it('accepts the closed unit interval', () => {
    expect(() => assertThreshold(0)).not.toThrow();
    expect(() => assertThreshold(1)).not.toThrow();
  });

  it('rejects values outside it', () => {
    expect(() => assertThreshold(-0.1)).toThrow('similarityThreshold must be within [0, 1], got -0.1');
    expect(() => assertThreshold(Number.NaN)).toThrow(expect.objectContaining({ code: 'INVALID_THRESHOLD' }));
  });
});

describe('rankBySimilarity', () => {
  it('scores and sorts every item', () => {
    const ranked = rankBySimilarity([1, 0], [item('d', [0, 1]), item('a', [1, 0])]);
    expect(ranked.map((r) => [r.item.id, r.similarity])).toEqual([
      ['a', 1],
      ['d', 0],
    ]);
  });
});
