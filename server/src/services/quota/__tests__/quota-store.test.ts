/**
 * Quota Store contract tests
 * Both backends run the same concurrency scenarios.
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import type { Redis } from 'ioredis';
import { InMemoryQuotaStore } from '../inmemory-quota.store.js';
import { CONSUME_SCRIPT, RedisQuotaStore, QUOTA_KEY_PREFIX } from '../redis-quota.store.js';
import { InvalidQuotaArgumentError, type QuotaStore } from '../quota-store.interface.js';
import { MockRedis } from '../../../__tests__/support/mock-redis.js';

async function consumeConcurrently(store: QuotaStore, userId: string, callers: number): Promise<boolean[]> {
  return Promise.all(Array.from({ length: callers }, () => store.compareExchangeConsume(userId, 1)));
}

const backends: Array<{ name: string; create: () => QuotaStore }> = [
  { name: 'InMemoryQuotaStore', create: () => new InMemoryQuotaStore() },
  { name: 'RedisQuotaStore', create: () => new RedisQuotaStore(new MockRedis() as unknown as Redis) }
];

for (const backend of backends) {
  describe(`${backend.name} - contract`, () => {
    let store: QuotaStore;

    beforeEach(() => {
      store = backend.create();
    });

    it('returns null for an unknown user', async () => {
      assert.equal(await store.get('nobody'), null);
    });

    it('fails to consume when no record exists', async () => {
      assert.equal(await store.compareExchangeConsume('nobody', 1), false);
      assert.equal(await store.get('nobody'), null);
    });

    it('decrements when credits suffice and leaves state unchanged otherwise', async () => {
      await store.set('u1', 3);

      assert.equal(await store.compareExchangeConsume('u1', 2), true);
      assert.equal(await store.get('u1'), 1);

      assert.equal(await store.compareExchangeConsume('u1', 2), false);
      assert.equal(await store.get('u1'), 1);
    });

    it('set overwrites idempotently', async () => {
      await store.set('u1', 4);
      await store.set('u1', 4);
      assert.equal(await store.get('u1'), 4);
      await store.set('u1', 0);
      assert.equal(await store.get('u1'), 0);
    });

    it('rejects non-positive consume amounts and negative values', async () => {
      await store.set('u1', 5);
      await assert.rejects(() => store.compareExchangeConsume('u1', 0), InvalidQuotaArgumentError);
      await assert.rejects(() => store.compareExchangeConsume('u1', -1), InvalidQuotaArgumentError);
      await assert.rejects(() => store.set('u1', -1), InvalidQuotaArgumentError);
      assert.equal(await store.get('u1'), 5);
    });

    it('K=5, N=20 concurrent consumers: exactly 5 succeed, 0 remain', async () => {
      await store.set('contended', 5);

      const results = await consumeConcurrently(store, 'contended', 20);

      assert.equal(results.filter(Boolean).length, 5);
      assert.equal(await store.get('contended'), 0);
    });

    it('K=10, N=10 concurrent consumers: all succeed, 0 remain', async () => {
      await store.set('exact', 10);

      const results = await consumeConcurrently(store, 'exact', 10);

      assert.equal(results.filter(Boolean).length, 10);
      assert.equal(await store.get('exact'), 0);
    });

    it('concurrent users do not affect each other', async () => {
      await store.set('a', 2);
      await store.set('b', 3);

      const [a, b] = await Promise.all([
        consumeConcurrently(store, 'a', 6),
        consumeConcurrently(store, 'b', 6)
      ]);

      assert.equal(a.filter(Boolean).length, 2);
      assert.equal(b.filter(Boolean).length, 3);
      assert.equal(await store.get('a'), 0);
      assert.equal(await store.get('b'), 0);
    });

    it('lists every user holding a record', async () => {
      await store.set('x', 1);
      await store.set('y', 2);
      assert.deepEqual((await store.listUserIds()).sort(), ['x', 'y']);
    });
  });
}

describe('InMemoryQuotaStore - records', () => {
  it('keeps createdAt and bumps lastUpdatedAt on change', async () => {
    let clock = 1_000;
    const store = new InMemoryQuotaStore(() => clock);

    await store.set('u1', 5);
    clock = 2_000;
    await store.compareExchangeConsume('u1', 1);

    assert.deepEqual(store.getRecord('u1'), {
      userId: 'u1',
      remainingCredits: 4,
      createdAt: 1_000,
      lastUpdatedAt: 2_000
    });
    assert.equal(store.getRecord('missing'), null);
  });
});

// MockRedis reimplements the consume script in JS, so its Lua text is checked here
describe('RedisQuotaStore - consume script', () => {
  const script = CONSUME_SCRIPT.replace(/\s+/g, ' ').trim();

  it('reads the key and denies when it is absent', () => {
    assert.match(script, /^local current = redis\.call\('GET', KEYS\[1\]\) if current == false then return 0 end/);
    assert.match(script, /local amount = tonumber\(ARGV\[1\]\)/);
  });

  it('decrements only after the compare succeeds', () => {
    assert.match(script, /if current >= amount then redis\.call\('DECRBY', KEYS\[1\], amount\) return 1 end return 0$/);
    assert.equal(script.match(/redis\.call\(/g)?.length, 2);
  });
});

describe('RedisQuotaStore - backend failures', () => {
  let redis: MockRedis;
  let store: RedisQuotaStore;

  beforeEach(() => {
    redis = new MockRedis();
    store = new RedisQuotaStore(redis as unknown as Redis);
  });

  it('stores quota under quota:<userId>', async () => {
    await store.set('u1', 7);
    assert.equal(redis.raw(`${QUOTA_KEY_PREFIX}u1`), '7');
  });

  it('denies when the consume script fails', async () => {
    await store.set('u1', 5);
    redis.failOn('eval');

    assert.equal(await store.compareExchangeConsume('u1', 1), false);

    redis.recover();
    assert.equal(await store.get('u1'), 5);
  });

  it('reports absent when GET fails', async () => {
    await store.set('u1', 5);
    redis.failOn('get');
    assert.equal(await store.get('u1'), null);
  });

  it('propagates SET failures', async () => {
    redis.failOn('set');
    await assert.rejects(() => store.set('u1', 5), /ECONNRESET during SET/);
  });

  it('pages through SCAN results', async () => {
    for (let i = 0; i < 450; i++) {
      await store.set(`user-${i}`, 1);
    }
    const ids = await store.listUserIds();
    assert.equal(ids.length, 450);
    assert.equal(new Set(ids).size, 450);
  });
});
