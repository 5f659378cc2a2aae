/**
 * Unit tests for FeedbackEngine
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { FeedbackEngine, adjustAmount } from '../../src/services/feedback-engine.js';
import { RetrievalEngine } from '../../src/services/retrieval-engine.js';
import { TasteRecordCodec, renderDerivedText } from '../../src/services/taste-codec.js';
import {
  TasteNotFoundError,
  TasteValidationError,
  TransientExternalError,
  ServiceUnavailableError,
} from '../../src/lib/errors/TasteStoreErrors.js';
import { VectorIndexUnavailableError } from '../../src/services/vector-index/index-interface.js';
import { createSilentLogger } from '../../src/lib/logger.js';
import type { RawTasteFields } from '../../src/models/taste-record.js';
import { HashingEmbedding, type HashingEmbeddingOptions } from '../helpers/hashing-embedding.js';
import { RecordingIndex } from '../helpers/recording-index.js';
import { tasteDocument } from '../helpers/taste-fixtures.js';

describe('FeedbackEngine', () => {
  let embedder: HashingEmbedding;
  let index: RecordingIndex;
  let codec: TasteRecordCodec;
  let engine: FeedbackEngine;

  function build(options: HashingEmbeddingOptions = {}): void {
    embedder = new HashingEmbedding(options);
    index = new RecordingIndex();
    codec = new TasteRecordCodec(embedder);
    const logger = createSilentLogger();
    const retrieval = new RetrievalEngine(index, codec, logger);
    engine = new FeedbackEngine(embedder, retrieval, index, codec, logger, 5);
  }

  async function seed(...documents: RawTasteFields[]): Promise<void> {
    for (const document of documents) {
      const entry = (await codec.encode(document))._unsafeUnwrap();
      await index.upsert([{ id: entry.id, vector: entry.vector, metadata: entry.metadata }]);
    }
    index.upsertCalls.length = 0;
    embedder.calls.length = 0;
  }

  beforeEach(async () => {
    build();
    await seed(tasteDocument({ amount: 100 }));
  });

  it('should scale the amount up on more and down on less', async () => {
    const more = (await engine.applyFeedback('u1', 'salt', 'italian', 'more'))._unsafeUnwrap();
    expect(more.record.amount).toBeCloseTo(110);

    const less = (await engine.applyFeedback('u1', 'salt', 'italian', 'less'))._unsafeUnwrap();
    expect(less.previous.amount).toBeCloseTo(110);
    expect(less.record.amount).toBeCloseTo(99);
    expect(less.record.feedbackWeight).toBe(1);
  });

  it('should rewrite derived text and vector together under the same id', async () => {
    const update = (await engine.applyFeedback('u1', 'salt', 'italian', 'more'))._unsafeUnwrap();
    const expectedText = renderDerivedText({
      ingredient: 'salt',
      amount: 100 * 1.1,
      unit: 'g',
      servings: 4,
      cuisine: 'italian',
    });

    expect(update.id).toBe('r1');
    expect(expectedText).toBe('salt 110g for 4 servings in italian cuisine');
    expect(update.record.derivedText).toBe(expectedText);

    const stored = (await index.fetch('r1'))._unsafeUnwrap();
    expect(stored?.metadata['original_text']).toBe(expectedText);
    expect(stored?.vector).toEqual(embedder.vectorFor(expectedText));
    expect((await index.count())._unsafeUnwrap()).toBe(1);
  });

  it('should embed the ingredient alone as the lookup probe', async () => {
    await engine.applyFeedback('u1', 'salt', 'italian', 'perfect');

    expect(embedder.calls[0]).toBe('salt');
    expect(index.queryCalls[0]?.filter).toEqual({ user_id: 'u1' });
    expect(index.queryCalls[0]?.topK).toBe(5);
  });

  it('should add 1 to the weight per perfect and leave the amount alone', async () => {
    for (let i = 0; i < 3; i++) {
      (await engine.applyFeedback('u1', 'salt', 'italian', 'perfect'))._unsafeUnwrap();
    }

    const stored = (await index.fetch('r1'))._unsafeUnwrap();
    expect(stored?.metadata['feedback_weight']).toBe(4);
    expect(stored?.metadata['amount']).toBe(100);
  });

  it('should target the candidate with the highest feedback weight', async () => {
    await seed(tasteDocument({ _id: 'r2', ingredient: 'sea salt', amount: 8, feedback_weight: 3 }));

    const update = (await engine.applyFeedback('u1', 'salt', 'italian', 'more'))._unsafeUnwrap();

    expect(update.id).toBe('r2');
    expect(update.previous.ingredient).toBe('sea salt');
    expect(update.record.ingredient).toBe('salt');
  });

  it('should restrict the lookup to the exact ingredient and cuisine when asked', async () => {
    await seed(tasteDocument({ _id: 'r2', ingredient: 'sea salt', amount: 8, feedback_weight: 3 }));

    const update = (
      await engine.applyFeedback('u1', 'salt', 'italian', 'more', { exactMatch: true })
    )._unsafeUnwrap();

    expect(update.id).toBe('r1');
    expect(index.queryCalls[0]?.filter).toEqual({
      $and: [{ user_id: 'u1' }, { ingredient: 'salt', cuisine: 'italian' }],
    });
  });

  it('should write the call arguments over the stored identity fields', async () => {
    const update = (await engine.applyFeedback('u1', 'salt', 'tuscan', 'perfect'))._unsafeUnwrap();

    expect(update.previous.cuisine).toBe('italian');
    expect(update.record.cuisine).toBe('tuscan');
    expect(update.record.derivedText).toBe('salt 100g for 4 servings in tuscan cuisine');
  });

  it('should report not found when the user has no records', async () => {
    const error = (await engine.applyFeedback('u2', 'salt', 'italian', 'more'))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(TasteNotFoundError);
    expect(error.message).toBe("No taste preference found for user 'u2' and ingredient 'salt'");
    expect(index.upsertCalls).toEqual([]);
  });

  it('should reject an unknown feedback keyword before any external call', async () => {
    const error = (await engine.applyFeedback('u1', 'salt', 'italian', 'spicier'))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(TasteValidationError);
    expect(embedder.calls).toEqual([]);
    expect(index.queryCalls).toEqual([]);
  });

  it('should refuse to scale a non-numeric amount', async () => {
    build();
    await seed(tasteDocument({ amount: 'a pinch' }));

    const error = (await engine.applyFeedback('u1', 'salt', 'italian', 'less'))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(TasteValidationError);
    expect(index.upsertCalls).toEqual([]);
  });

  it('should not write when re-embedding fails', async () => {
    build({ failOn: (text) => text.includes(' servings ') && text.includes('110') });
    await seed(tasteDocument({ amount: 100 }));

    const error = (await engine.applyFeedback('u1', 'salt', 'italian', 'more'))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(TransientExternalError);
    expect(error.retryable).toBe(true);
    expect(index.upsertCalls).toEqual([]);
    expect((await index.fetch('r1'))._unsafeUnwrap()?.metadata['amount']).toBe(100);
  });

  it('should treat a zero-count upsert as a transient failure', async () => {
    index.upsertCount = 0;

    const error = (await engine.applyFeedback('u1', 'salt', 'italian', 'more'))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(TransientExternalError);
    expect(error.message).toBe('upsert failed: index reported no write for record r1');
  });

  it('should surface a closed index as service unavailable', async () => {
    index.upsertError = new VectorIndexUnavailableError('Vector index is closed');

    const error = (await engine.applyFeedback('u1', 'salt', 'italian', 'perfect'))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(ServiceUnavailableError);
  });
});

describe('adjustAmount', () => {
  it('should apply the feedback factors', () => {
    expect(adjustAmount(100, 'more')._unsafeUnwrap()).toBeCloseTo(110);
    expect(adjustAmount(100, 'less')._unsafeUnwrap()).toBeCloseTo(90);
    expect(adjustAmount('a pinch', 'perfect')._unsafeUnwrap()).toBe('a pinch');
  });

  it('should reject zero amounts for more and less', () => {
    expect(adjustAmount(0, 'more').isErr()).toBe(true);
  });
});
