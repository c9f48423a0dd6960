import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { diversityRerank, primaryCategoryOf } from '../diversity-reranker.js';
import type { ScoredPlace } from '../../types.js';
import { place } from '../../../../__tests__/support/places.js';

function scored(id: string, score: number, category: string, primaryCategory?: string): ScoredPlace {
  return {
    place: place(id, 100, [category], primaryCategory ? { primaryCategory } : {}),
    distanceMeters: 100,
    score,
    reasons: [],
    matchedPreferences: [],
    noveltyScore: 0.5,
    contextualReasons: []
  };
}

const ranked = (): ScoredPlace[] => [
  scored('a', 0.9, 'restaurant'),
  scored('b', 0.8, 'restaurant'),
  scored('c', 0.7, 'museum')
];

describe('diversityRerank', () => {
  it('keeps the score order when the factor is 0', () => {
    assert.deepEqual(diversityRerank(ranked(), 0, 10).map(s => s.place.id), ['a', 'b', 'c']);
  });

  it('pulls a different category ahead of a repeated one at full diversity', () => {
    // b: 0.8 * 0.85 = 0.68 < 0.7
    assert.deepEqual(diversityRerank(ranked(), 1, 10).map(s => s.place.id), ['a', 'c', 'b']);
  });

  it('leaves the order alone when the penalty is too small to matter', () => {
    // b: 0.8 * 0.925 = 0.74 > 0.7
    assert.deepEqual(diversityRerank(ranked(), 0.5, 10).map(s => s.place.id), ['a', 'b', 'c']);
  });

  it('respects the limit', () => {
    assert.deepEqual(diversityRerank(ranked(), 1, 2).map(s => s.place.id), ['a', 'c']);
    assert.deepEqual(diversityRerank(ranked(), 0, 2).map(s => s.place.id), ['a', 'b']);
  });

  it('reports the hybrid score unchanged', () => {
    const result = diversityRerank(ranked(), 1, 10);
    assert.deepEqual(result.map(s => s.score), [0.9, 0.7, 0.8]);
  });

  it('groups by the primary category when present', () => {
    assert.equal(primaryCategoryOf(scored('x', 0.5, 'Italian Restaurant')), 'italian_restaurant');
    assert.equal(primaryCategoryOf(scored('y', 0.5, 'restaurant', 'Ramen Bar')), 'ramen_bar');
  });
});
