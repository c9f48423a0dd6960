import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { QuotaResetJob, msUntilNextReset } from '../quota-reset.job.js';
import { QuotaService } from '../quota.service.js';
import { InMemoryQuotaStore } from '../inmemory-quota.store.js';
import type { EntitlementOracle } from '../entitlement.service.js';
import { TestLogger } from '../../../__tests__/support/test-logger.js';

const freeTier: EntitlementOracle = { isPremium: async () => false };

describe('msUntilNextReset', () => {
  it('targets later today when the time has not passed', () => {
    const now = new Date(Date.UTC(2026, 4, 1, 22, 30));
    assert.equal(msUntilNextReset('23:00', now), 30 * 60_000);
  });

  it('rolls to tomorrow when the time has passed or is now', () => {
    const now = new Date(Date.UTC(2026, 4, 1, 0, 0));
    assert.equal(msUntilNextReset('00:00', now), 24 * 60 * 60_000);
  });
});

describe('QuotaResetJob', () => {
  function setup(batchSize: number) {
    const logger = new TestLogger();
    const store = new InMemoryQuotaStore();
    const quota = new QuotaService(store, freeTier, { defaultFreeQuota: 5, operationTimeoutMs: 1000 }, logger.log);
    const job = new QuotaResetJob(store, quota, { resetAtUtc: '00:00', batchSize }, logger.log);
    return { logger, store, quota, job };
  }

  it('restores every known user to the default allotment', async () => {
    const { store, job } = setup(2);
    await store.set('a', 0);
    await store.set('b', 3);
    await store.set('c', 1);

    const summary = await job.runOnce();

    assert.deepEqual(summary, { total: 3, reset: 3, failed: 0, aborted: false });
    assert.equal(await store.get('a'), 5);
    assert.equal(await store.get('b'), 5);
    assert.equal(await store.get('c'), 5);
  });

  it('stops between batches once aborted', async () => {
    const { store, job } = setup(1);
    await store.set('a', 0);
    await store.set('b', 0);

    const controller = new AbortController();
    controller.abort();
    const summary = await job.runOnce(controller.signal);

    assert.deepEqual(summary, { total: 2, reset: 0, failed: 0, aborted: true });
    assert.equal(await store.get('a'), 0);
  });

  it('start and stop leave no pending timer', () => {
    const { job } = setup(10);
    job.start();
    job.stop();
    job.start();
  });
});
