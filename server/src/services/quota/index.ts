/**
 * Quota Store Factory
 * Backend chosen once at wiring time from config
 */

import type { Redis } from 'ioredis';
import type { AppConfig } from '../../config/env.js';
import { logger } from '../../lib/logger/structured-logger.js';
import { InMemoryQuotaStore } from './inmemory-quota.store.js';
import type { QuotaStore } from './quota-store.interface.js';
import { RedisQuotaStore } from './redis-quota.store.js';

/**
 * Build the configured quota store.
 * Production with QUOTA_BACKEND=redis refuses to fall back to memory:
 * a per-process counter would multiply every user's allotment by the instance count.
 */
export function createQuotaStore(config: Pick<AppConfig, 'env' | 'quotaBackend'>, redis: Redis | null): QuotaStore {
  if (config.quotaBackend === 'redis') {
    if (redis) {
      return new RedisQuotaStore(redis);
    }

    if (config.env === 'production') {
      throw new Error('QUOTA_BACKEND=redis but Redis is unavailable; refusing in-memory fallback in production');
    }

    logger.warn({ event: 'quota_store_fallback', env: config.env }, '[QuotaStore] Redis unavailable, falling back to InMemory');
  }

  return new InMemoryQuotaStore();
}

export type { QuotaStore } from './quota-store.interface.js';
export { InvalidQuotaArgumentError } from './quota-store.interface.js';
export { InMemoryQuotaStore } from './inmemory-quota.store.js';
export { RedisQuotaStore } from './redis-quota.store.js';
export { QuotaService, type AdmissionDecision, type QuotaSnapshot, type QuotaStatus } from './quota.service.js';
export { EntitlementService, InMemorySubscriptionLookup, type EntitlementClaims, type EntitlementOracle } from './entitlement.service.js';
export { QuotaResetJob } from './quota-reset.job.js';
