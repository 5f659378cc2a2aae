/**
 * Unit tests for the metadata filter grammar
 */

import { describe, it, expect } from 'vitest';
import {
  andFilters,
  flattenFilter,
  isAndFilter,
  matchesConditions,
} from '../../src/services/vector-index/metadata-filter.js';
import type { MetadataFilter } from '../../src/models/vector-index.js';

describe('metadata filter', () => {
  describe('andFilters', () => {
    it('should return a single filter unchanged', () => {
      expect(andFilters({ user_id: 'u1' }, undefined)).toEqual({ user_id: 'u1' });
    });

    it('should conjoin several filters with $and', () => {
      expect(andFilters({ user_id: 'u1' }, undefined, { ingredient: 'salt' })).toEqual({
        $and: [{ user_id: 'u1' }, { ingredient: 'salt' }],
      });
    });
  });

  describe('flattenFilter', () => {
    it('should return no conditions for an absent filter', () => {
      expect(flattenFilter(undefined)._unsafeUnwrap()).toEqual([]);
    });

    it('should flatten nested conjunctions in order', () => {
      const filter: MetadataFilter = {
        $and: [{ user_id: 'u1', cuisine: 'thai' }, { $and: [{ ingredient: 'chili' }, { vegan: true }] }],
      };

      expect(isAndFilter(filter)).toBe(true);
      expect(flattenFilter(filter)._unsafeUnwrap()).toEqual([
        { field: 'user_id', value: 'u1' },
        { field: 'cuisine', value: 'thai' },
        { field: 'ingredient', value: 'chili' },
        { field: 'vegan', value: true },
      ]);
    });

    it('should reject field names that are not identifiers', () => {
      const result = flattenFilter({ $and: [{ user_id: 'u1' }, { "a.b') OR 1=1 --": 'x' }] });

      expect(result.isErr()).toBe(true);
      expect(result._unsafeUnwrapErr().message).toBe('Invalid filter field name: "a.b\') OR 1=1 --"');
    });
  });

  describe('matchesConditions', () => {
    const metadata = { user_id: 'u1', ingredient: 'salt', servings: 4 };

    it('should match when every condition holds', () => {
      expect(
        matchesConditions(metadata, [
          { field: 'user_id', value: 'u1' },
          { field: 'servings', value: 4 },
        ])
      ).toBe(true);
    });

    it('should not match on a differing or absent field', () => {
      expect(matchesConditions(metadata, [{ field: 'servings', value: '4' }])).toBe(false);
      expect(matchesConditions(metadata, [{ field: 'cuisine', value: 'thai' }])).toBe(false);
    });
  });
});
