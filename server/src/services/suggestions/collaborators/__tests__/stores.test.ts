import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { InMemoryExclusionStore } from '../exclusion-store.js';
import { InMemoryUserProfileStore } from '../user-profile-store.js';
import { StaticPlacesProvider } from '../static-places.provider.js';
import { NEUTRAL_WEIGHT } from '../../profile/taste-profile.js';
import { ORIGIN, place } from '../../../../__tests__/support/places.js';

describe('InMemoryExclusionStore', () => {
  it('expires timed exclusions and keeps permanent ones', async () => {
    let now = 1_000;
    const store = new InMemoryExclusionStore(() => now);
    store.exclude('u1', 'p1');
    store.exclude('u1', 'p2', 5_000);

    assert.deepEqual([...await store.getActiveExclusions('u1')].sort(), ['p1', 'p2']);
    now = 6_001;
    assert.deepEqual([...await store.getActiveExclusions('u1')], ['p1']);
    assert.equal((await store.getActiveExclusions('u2')).size, 0);
  });

  it('keeps suggestion history most recent first without duplicates', async () => {
    const store = new InMemoryExclusionStore();
    await store.recordSuggestions('u1', ['a', 'b', 'c']);
    await store.recordSuggestions('u1', ['d', 'a']);

    assert.deepEqual(await store.getRecentSuggestions('u1', 10), ['d', 'a', 'b', 'c']);
    assert.deepEqual(await store.getRecentSuggestions('u1', 2), ['d', 'a']);
    assert.deepEqual(await store.getRecentSuggestions('u1', 0), []);
    assert.deepEqual(await store.getRecentSuggestions('u2', 5), []);
  });
});

describe('InMemoryUserProfileStore', () => {
  it('returns null for unknown users', async () => {
    const store = new InMemoryUserProfileStore();
    assert.equal(await store.getTasteProfile('nobody'), null);
    assert.equal(await store.getImplicitPreferences('nobody'), null);
  });

  it('saves quiz weights and applies bounded feedback', async () => {
    const store = new InMemoryUserProfileStore();
    store.saveQuizWeights('u1', { culture: 0.9 });
    store.applyFeedback('u1', { culture: 0.5, food: -0.5 });

    const profile = await store.getTasteProfile('u1');
    assert.ok(profile);
    assert.ok(Math.abs(profile.interests.culture - 0.95) < 1e-9);
    assert.ok(Math.abs(profile.interests.food - (NEUTRAL_WEIGHT - 0.05)) < 1e-9);
    assert.equal(profile.interests.nature, NEUTRAL_WEIGHT);
  });
});

describe('StaticPlacesProvider', () => {
  it('returns places within the radius', async () => {
    const provider = new StaticPlacesProvider([place('near', 500, ['cafe']), place('far', 5000, ['park'])]);
    const found = await provider.search(ORIGIN, 1000, {});
    assert.deepEqual(found.map(p => p.id), ['near']);
    assert.equal(provider.calls, 1);
  });

  it('honours maxResults and cancellation', async () => {
    const provider = new StaticPlacesProvider([place('a', 100, ['cafe']), place('b', 200, ['cafe'])]);
    assert.equal((await provider.search(ORIGIN, 1000, { maxResults: 1 })).length, 1);

    const controller = new AbortController();
    controller.abort();
    await assert.rejects(provider.search(ORIGIN, 1000, {}, controller.signal));
  });
});
