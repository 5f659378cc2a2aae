/**
 * Unit tests for InMemoryVectorIndex
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryVectorIndex, cosineSimilarity } from '../../src/services/vector-index/in-memory-index.js';
import { VectorIndexError, VectorIndexUnavailableError } from '../../src/services/vector-index/index-interface.js';

describe('cosineSimilarity', () => {
  it('should score identical directions 1 and orthogonal ones 0', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('should score a zero vector 0', () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });
});

describe('InMemoryVectorIndex', () => {
  let index: InMemoryVectorIndex;

  beforeEach(async () => {
    index = new InMemoryVectorIndex();
    await index.upsert([
      { id: 'a', vector: [1, 0], metadata: { user_id: 'u1', ingredient: 'salt' } },
      { id: 'b', vector: [1, 1], metadata: { user_id: 'u1', ingredient: 'sugar' } },
      { id: 'c', vector: [0, 1], metadata: { user_id: 'u2', ingredient: 'salt' } },
    ]);
  });

  it('should rank matches by descending similarity within the filter', async () => {
    const result = await index.query({ vector: [1, 0], topK: 5, filter: { user_id: 'u1' } });
    const matches = result._unsafeUnwrap();

    expect(matches.map((m) => m.id)).toEqual(['a', 'b']);
    expect(matches[0]?.score).toBeCloseTo(1);
    expect(matches[1]?.score).toBeCloseTo(Math.SQRT1_2);
  });

  it('should honour $and filters and topK', async () => {
    const filtered = await index.query({
      vector: [0, 1],
      topK: 5,
      filter: { $and: [{ user_id: 'u1' }, { ingredient: 'salt' }] },
    });
    const limited = await index.query({ vector: [0, 1], topK: 1 });

    expect(filtered._unsafeUnwrap().map((m) => m.id)).toEqual(['a']);
    expect(limited._unsafeUnwrap().map((m) => m.id)).toEqual(['c']);
  });

  it('should replace entries by id', async () => {
    await index.upsert([{ id: 'a', vector: [0, 1], metadata: { user_id: 'u1', ingredient: 'pepper' } }]);

    expect((await index.count())._unsafeUnwrap()).toBe(3);
    expect((await index.fetch('a'))._unsafeUnwrap()).toEqual({
      id: 'a',
      vector: [0, 1],
      metadata: { user_id: 'u1', ingredient: 'pepper' },
    });
  });

  it('should keep namespaces apart', async () => {
    await index.upsert([{ id: 'a', vector: [1, 0], metadata: { user_id: 'u1' } }], 'staging');

    expect((await index.count('staging'))._unsafeUnwrap()).toBe(1);
    expect((await index.query({ vector: [1, 0], topK: 5, namespace: 'other' }))._unsafeUnwrap()).toEqual([]);
    expect((await index.fetch('b', 'staging'))._unsafeUnwrap()).toBeNull();
  });

  it('should reject vectors whose length differs from the first write', async () => {
    const written = await index.upsert([{ id: 'd', vector: [1, 0, 0], metadata: {} }]);
    const queried = await index.query({ vector: [1], topK: 5 });

    expect(written._unsafeUnwrapErr().message).toBe('Vector dimension mismatch for entry d: expected 2, got 3');
    expect(queried._unsafeUnwrapErr().message).toBe('Vector dimension mismatch for query vector: expected 2, got 1');
    expect(queried._unsafeUnwrapErr().retryable).toBe(false);
    expect((await index.count())._unsafeUnwrap()).toBe(3);
  });

  it('should enforce configured dimensions before any write', async () => {
    const sized = new InMemoryVectorIndex({ dimensions: 3 });

    const written = await sized.upsert([
      { id: 'x', vector: [1, 0, 0], metadata: {} },
      { id: 'y', vector: [1, 0], metadata: {} },
    ]);

    expect(written._unsafeUnwrapErr()).toBeInstanceOf(VectorIndexError);
    expect((await sized.count())._unsafeUnwrap()).toBe(0);
  });

  it('should reject invalid filter field names', async () => {
    const result = await index.query({ vector: [1, 0], topK: 5, filter: { 'bad field': 'x' } });

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(VectorIndexError);
  });

  it('should report an unavailable error once closed', async () => {
    index.close();
    const result = await index.query({ vector: [1, 0], topK: 5 });

    expect(result._unsafeUnwrapErr()).toBeInstanceOf(VectorIndexUnavailableError);
    expect(result._unsafeUnwrapErr().retryable).toBe(false);
  });
});
