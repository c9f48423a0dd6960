import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SuggestionPolicy, isActivityPlace, isFoodCategory, isFoodPlace } from '../suggestion-policy.js';
import { SUGGESTION_INTENTS } from '../../types.js';
import { ORIGIN, mixedCatalogue, place } from '../../../../__tests__/support/places.js';

const policy = new SuggestionPolicy();
const validLocation = { latitude: 40.7, longitude: -74 };

describe('SuggestionPolicy.validateRequest', () => {
  it('accepts a valid non-route request', () => {
    assert.deepEqual(policy.validateRequest('QUICK', validLocation, 3000, undefined), []);
  });

  it('requires a walking distance for route planning', () => {
    const errors = policy.validateRequest('ROUTE_PLANNING', validLocation, 3000, undefined);
    assert.deepEqual(errors, ['Route planning requires a walking distance of at least 500 meters']);
    assert.deepEqual(policy.validateRequest('ROUTE_PLANNING', validLocation, 3000, 3000), []);
  });

  it('rejects a short route walking distance', () => {
    assert.deepEqual(policy.validateRequest('ROUTE_PLANNING', validLocation, 3000, 300), [
      'Route planning requires a walking distance of at least 500 meters'
    ]);
  });

  it('collects every violation in order', () => {
    const errors = policy.validateRequest('ROUTE_PLANNING', { latitude: 91, longitude: -181 }, 50, 12_000);
    assert.deepEqual(errors, [
      'Latitude must be between -90 and 90',
      'Longitude must be between -180 and 180',
      'Radius must be between 100 and 50,000 meters',
      'Walking distance cannot exceed 10,000 meters (10 km)'
    ]);
  });

  it('treats non-finite coordinates as out of range', () => {
    const errors = policy.validateRequest('QUICK', { latitude: Number.NaN, longitude: 0 }, 3000, undefined);
    assert.deepEqual(errors, ['Latitude must be between -90 and 90']);
  });

  it('applies the walking distance floor to every intent when given', () => {
    assert.deepEqual(policy.validateRequest('QUICK', validLocation, 3000, 300), [
      'Walking distance must be at least 500 meters'
    ]);
    assert.deepEqual(policy.validateRequest('FOOD_ONLY', validLocation, 3000, 500), []);
  });
});

describe('SuggestionPolicy.validateBounds', () => {
  it('checks only the fields it is given', () => {
    assert.deepEqual(policy.validateBounds({}), []);
    assert.deepEqual(policy.validateBounds({ latitude: 999, radiusMeters: 3000 }), [
      'Latitude must be between -90 and 90'
    ]);
  });

  it('requires a walking distance only once the intent is known', () => {
    assert.deepEqual(policy.validateBounds({ intent: 'ROUTE_PLANNING' }), [
      'Route planning requires a walking distance of at least 500 meters'
    ]);
    assert.deepEqual(policy.validateBounds({ walkingDistanceMeters: 200 }), [
      'Walking distance must be at least 500 meters'
    ]);
  });
});

describe('SuggestionPolicy.validateFilters', () => {
  it('limits list sizes', () => {
    const errors = policy.validateFilters({
      includeCategories: Array.from({ length: 11 }, (_, i) => `c${i}`),
      dietaryRestrictions: ['a', 'b', 'c', 'd', 'e', 'f']
    });
    assert.deepEqual(errors, [
      'At most 10 included categories are allowed',
      'At most 5 dietary restrictions are allowed'
    ]);
  });
});

describe('SuggestionPolicy.applyIntentFilter', () => {
  const candidates = [
    ...mixedCatalogue(),
    place('trattoria', 500, ['italian_restaurant']),
    place('roastery', 500, ['coffee_shop']),
    place('club', 500, ['night_club'])
  ];

  it('keeps only food for FOOD_ONLY', () => {
    const result = policy.applyIntentFilter('FOOD_ONLY', candidates, new Set());
    assert.equal(result.length, 14);
    assert.ok(result.every(isFoodPlace));
  });

  it('treats shop-style food types as food', () => {
    const shops = [place('gelato', 400, ['ice_cream_shop']), place('subs', 400, ['sandwich_shop']), place('museum', 400, ['museum'])];
    assert.deepEqual(policy.applyIntentFilter('FOOD_ONLY', shops, new Set()).map(p => p.id), ['gelato', 'subs']);
    assert.deepEqual(policy.applyIntentFilter('ACTIVITY_ONLY', shops, new Set()).map(p => p.id), ['museum']);
  });

  it('keeps no food for ACTIVITY_ONLY', () => {
    const result = policy.applyIntentFilter('ACTIVITY_ONLY', candidates, new Set());
    assert.deepEqual(result.map(p => p.id), ['museum-1', 'park-1', 'gallery-1', 'club']);
    assert.ok(result.every(p => !isFoodPlace(p)));
  });

  it('removes user exclusions for every intent', () => {
    const excluded = new Set(['food-1', 'museum-1']);
    for (const intent of SUGGESTION_INTENTS) {
      const result = policy.applyIntentFilter(intent, candidates, excluded);
      assert.ok(result.every(p => !excluded.has(p.id)), intent);
    }
    assert.equal(policy.applyIntentFilter('QUICK', candidates, excluded).length, candidates.length - 2);
  });
});

describe('SuggestionPolicy.applyRequestFilters', () => {
  const candidates = [
    place('cheap', 100, ['restaurant'], { priceLevel: 1 }),
    place('fancy', 100, ['restaurant'], { priceLevel: 4 }),
    place('unpriced', 100, ['cafe']),
    place('museum', 100, ['museum'], { priceLevel: 2 })
  ];

  it('applies the budget ceiling, keeping unpriced places', () => {
    const result = policy.applyRequestFilters(candidates, { budgetLevel: 'MODERATE' });
    assert.deepEqual(result.map(p => p.id), ['cheap', 'unpriced', 'museum']);
  });

  it('applies include and exclude lists', () => {
    assert.deepEqual(policy.applyRequestFilters(candidates, { includeCategories: ['Cafe', 'museum'] }).map(p => p.id), ['unpriced', 'museum']);
    assert.deepEqual(policy.applyRequestFilters(candidates, { excludeCategories: ['restaurant'] }).map(p => p.id), ['unpriced', 'museum']);
  });
});

describe('SuggestionPolicy decisions', () => {
  it('builds routes only for ROUTE_PLANNING', () => {
    for (const intent of SUGGESTION_INTENTS) {
      assert.equal(policy.shouldBuildRoute(intent), intent === 'ROUTE_PLANNING');
    }
  });

  it('maps intents to diversity factors', () => {
    assert.equal(policy.getDiversityFactor('QUICK'), 0.3);
    assert.equal(policy.getDiversityFactor('TRY_SOMETHING_NEW'), 1);
  });

  it('prefers the caller walking distance when valid', () => {
    assert.equal(policy.getMaxWalkingDistance('ROUTE_PLANNING', 2500), 2500);
    assert.equal(policy.getMaxWalkingDistance('ROUTE_PLANNING', undefined), 5000);
    assert.equal(policy.getMaxWalkingDistance('FOOD_ONLY', 20_000), 2000);
  });
});

describe('SuggestionPolicy.generateReasons', () => {
  it('orders distance, rating, preferences, novelty, context', () => {
    const reasons = policy.generateReasons(
      'TRY_SOMETHING_NEW',
      place('p', 300, ['museum'], { rating: 4.6 }),
      ORIGIN,
      ['culture'],
      0.9,
      ['Good fit for the morning']
    );
    assert.deepEqual(reasons, [
      'Very close to you (walking distance)',
      'Highly rated (4.5+ stars)',
      'Matches your interest in culture',
      'A new experience for you',
      'Good fit for the morning'
    ]);
  });

  it('never returns more than five reasons', () => {
    const reasons = policy.generateReasons(
      'TRY_SOMETHING_NEW',
      place('p', 1200, ['museum'], { rating: 4.1 }),
      ORIGIN,
      ['culture', 'art', 'food', 'nature'],
      0.95,
      ['Indoor spot', 'Good fit for the evening', 'A good pick for winter']
    );
    assert.equal(reasons.length, 5);
    assert.deepEqual(reasons.slice(0, 4), [
      'Close to your location',
      'Well-rated',
      'Matches your interest in culture',
      'Matches your interest in art'
    ]);
    assert.equal(reasons[4], 'A new experience for you');
  });

  it('mentions novelty only for TRY_SOMETHING_NEW', () => {
    const reasons = policy.generateReasons('QUICK', place('p', 3000, ['park']), ORIGIN, [], 0.95, []);
    assert.deepEqual(reasons, []);
  });
});

describe('category helpers', () => {
  it('detects food through category tokens', () => {
    assert.equal(isFoodCategory('italian_restaurant'), true);
    assert.equal(isFoodCategory('Coffee Shop'), true);
    assert.equal(isFoodCategory('night_club'), false);
    assert.equal(isFoodCategory('ice_cream_shop'), true);
    assert.equal(isFoodCategory('sandwich_shop'), true);
    assert.equal(isFoodCategory('Juice Shop'), true);
    assert.equal(isActivityPlace(place('m', 1, ['Museum'])), true);
  });
});
