/**
 * In-Memory Quota Store
 * Process-local map. Each operation runs to completion within one event-loop
 * turn, which makes the conditional decrement linearizable per process.
 */

import { logger } from '../../lib/logger/structured-logger.js';
import {
  assertConsumeAmount,
  assertQuotaValue,
  type QuotaStore
} from './quota-store.interface.js';

export interface UserQuota {
  userId: string;
  remainingCredits: number;
  createdAt: number;
  lastUpdatedAt: number;
}

export class InMemoryQuotaStore implements QuotaStore {
  readonly backend = 'memory' as const;
  private quotas = new Map<string, UserQuota>();

  constructor(private readonly now: () => number = Date.now) {
    logger.info({ event: 'quota_store_initialized', backend: this.backend }, '[QuotaStore] Initialized');
  }

  async get(userId: string): Promise<number | null> {
    return this.quotas.get(userId)?.remainingCredits ?? null;
  }

  async compareExchangeConsume(userId: string, amount: number): Promise<boolean> {
    assertConsumeAmount(amount);

    const quota = this.quotas.get(userId);
    if (!quota || quota.remainingCredits < amount) {
      return false;
    }

    quota.remainingCredits -= amount;
    quota.lastUpdatedAt = this.now();
    return true;
  }

  async set(userId: string, value: number): Promise<void> {
    assertQuotaValue(value);

    const timestamp = this.now();
    const existing = this.quotas.get(userId);
    if (existing) {
      existing.remainingCredits = value;
      existing.lastUpdatedAt = timestamp;
      return;
    }

    this.quotas.set(userId, {
      userId,
      remainingCredits: value,
      createdAt: timestamp,
      lastUpdatedAt: timestamp
    });
  }

  async listUserIds(): Promise<string[]> {
    return [...this.quotas.keys()];
  }

  /**
   * Full record for a user (timestamps included)
   */
  getRecord(userId: string): UserQuota | null {
    const quota = this.quotas.get(userId);
    return quota ? { ...quota } : null;
  }
}
