/**
 * Unit tests for TasteRecordCodec
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { TasteRecordCodec, renderDerivedText, isRejection } from '../../src/services/taste-codec.js';
import { EmbeddingRequestError } from '../../src/services/embedding/adapter-interface.js';
import { HashingEmbedding } from '../helpers/hashing-embedding.js';
import { tasteDocument } from '../helpers/taste-fixtures.js';

describe('TasteRecordCodec', () => {
  let embedder: HashingEmbedding;
  let codec: TasteRecordCodec;

  beforeEach(() => {
    embedder = new HashingEmbedding({ dimensions: 32 });
    codec = new TasteRecordCodec(embedder);
  });

  describe('renderDerivedText', () => {
    it('should render the canonical template', () => {
      expect(
        renderDerivedText({ ingredient: 'salt', amount: 5, unit: 'g', servings: 4, cuisine: 'italian' })
      ).toBe('salt 5g for 4 servings in italian cuisine');
    });

    it('should render an empty unit as nothing', () => {
      expect(
        renderDerivedText({ ingredient: 'eggs', amount: 2, unit: '', servings: 2, cuisine: 'french' })
      ).toBe('eggs 2 for 2 servings in french cuisine');
    });

    it('should render numbers at display precision', () => {
      expect(
        renderDerivedText({ ingredient: 'salt', amount: 100 * 1.1, unit: 'g', servings: 4, cuisine: 'italian' })
      ).toBe('salt 110g for 4 servings in italian cuisine');
      expect(
        renderDerivedText({ ingredient: 'salt', amount: 'a pinch', unit: '', servings: 2.5, cuisine: 'thai' })
      ).toBe('salt a pinch for 2.5 servings in thai cuisine');
    });
  });

  describe('encode', () => {
    it('should coerce fields and embed the derived text', async () => {
      const result = await codec.encode(tasteDocument({ amount: '5', servings: '4' }));

      expect(result.isOk()).toBe(true);
      const entry = result._unsafeUnwrap();
      expect(entry.id).toBe('r1');
      expect(entry.metadata).toEqual({
        user_id: 'u1',
        ingredient: 'salt',
        amount: 5,
        unit: 'g',
        servings: 4,
        cuisine: 'italian',
        feedback_weight: 1,
        original_text: 'salt 5g for 4 servings in italian cuisine',
      });
      expect(entry.warnings).toEqual([]);
      expect(entry.vector).toEqual(embedder.vectorFor('salt 5g for 4 servings in italian cuisine'));
      expect(embedder.calls).toEqual(['salt 5g for 4 servings in italian cuisine']);
    });

    it('should round-trip through decode', async () => {
      const entry = (await codec.encode(tasteDocument({ feedback_weight: '2.5' })))._unsafeUnwrap();
      const record = codec.decode(entry);

      expect(record).toEqual({
        id: 'r1',
        userId: 'u1',
        ingredient: 'salt',
        amount: 10,
        unit: 'g',
        servings: 4,
        cuisine: 'italian',
        feedbackWeight: 2.5,
        derivedText: 'salt 10g for 4 servings in italian cuisine',
        embedding: entry.vector,
      });
    });

    it('should prefer id over _id and stringify ids and user ids', async () => {
      const entry = (await codec.encode(tasteDocument({ id: 7, _id: 'ignored', user_id: 42 })))._unsafeUnwrap();

      expect(entry.id).toBe('7');
      expect(entry.metadata.user_id).toBe('42');
    });

    it('should accept extended-JSON object ids', async () => {
      const entry = (await codec.encode(tasteDocument({ _id: { $oid: '65f0c0ffee' } })))._unsafeUnwrap();

      expect(entry.id).toBe('65f0c0ffee');
    });

    it('should default unit to empty and keep zero amounts', async () => {
      const entry = (await codec.encode(tasteDocument({ unit: undefined, amount: 0 })))._unsafeUnwrap();

      expect(entry.metadata.unit).toBe('');
      expect(entry.metadata.amount).toBe(0);
      expect(entry.metadata.original_text).toBe('salt 0 for 4 servings in italian cuisine');
    });

    it('should keep a non-numeric amount as text with a warning', async () => {
      const entry = (await codec.encode(tasteDocument({ amount: 'a pinch', unit: '' })))._unsafeUnwrap();

      expect(entry.metadata.amount).toBe('a pinch');
      expect(entry.warnings).toEqual(['amount "a pinch" is not numeric; stored as text']);
      expect(entry.metadata.original_text).toBe('salt a pinch for 4 servings in italian cuisine');
    });

    it('should fall back to weight 1 for an invalid or negative feedback_weight', async () => {
      const invalid = (await codec.encode(tasteDocument({ feedback_weight: 'heavy' })))._unsafeUnwrap();
      const negative = (await codec.encode(tasteDocument({ feedback_weight: -2 })))._unsafeUnwrap();

      expect(invalid.metadata.feedback_weight).toBe(1);
      expect(invalid.warnings).toEqual(['feedback_weight "heavy" is invalid; using 1']);
      expect(negative.metadata.feedback_weight).toBe(1);
      expect(negative.warnings).toEqual(['feedback_weight "-2" is invalid; using 1']);
    });

    it('should reject documents missing required fields without embedding', async () => {
      const result = await codec.encode(tasteDocument({ amount: null, cuisine: '' }));

      expect(result.isErr()).toBe(true);
      const error = result._unsafeUnwrapErr();
      expect(isRejection(error)).toBe(true);
      expect(error).toEqual({ kind: 'rejected', missingFields: ['amount', 'cuisine'], id: 'r1' });
      expect(embedder.calls).toEqual([]);
    });

    it('should reject documents without any id', async () => {
      const result = await codec.encode(tasteDocument({ _id: undefined }));

      expect(result._unsafeUnwrapErr()).toEqual({ kind: 'rejected', missingFields: ['id'], id: undefined });
    });

    it('should pass embedding failures through', async () => {
      const failing = new TasteRecordCodec(new HashingEmbedding({ failOn: () => true }));
      const result = await failing.encode(tasteDocument());

      expect(result._unsafeUnwrapErr()).toBeInstanceOf(EmbeddingRequestError);
    });
  });

  describe('decode', () => {
    it('should apply safe defaults for missing metadata', () => {
      expect(codec.decode({ id: 'x', metadata: {} })).toEqual({
        id: 'x',
        userId: '',
        ingredient: '',
        amount: '',
        unit: '',
        servings: '',
        cuisine: '',
        feedbackWeight: 1,
        derivedText: '',
      });
    });
  });
});
