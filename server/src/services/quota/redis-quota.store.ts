/**
 * Redis-backed Quota Store
 * The conditional decrement runs as one Lua script, so it is linearizable
 * across every process sharing the Redis instance.
 */

import type { Redis } from 'ioredis';
import { logger } from '../../lib/logger/structured-logger.js';
import {
  assertConsumeAmount,
  assertQuotaValue,
  type QuotaStore
} from './quota-store.interface.js';

export const QUOTA_KEY_PREFIX = 'quota:';

/**
 * KEYS[1] quota key, ARGV[1] amount.
 * Returns 1 when the decrement happened, 0 otherwise.
 * Store tests run against MockRedis, which mirrors this script in JS; only the
 * script's GET/compare/DECRBY structure is asserted on the Lua text itself.
 */
export const CONSUME_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if current == false then
  return 0
end
current = tonumber(current)
local amount = tonumber(ARGV[1])
if current >= amount then
  redis.call('DECRBY', KEYS[1], amount)
  return 1
end
return 0
`;

const SCAN_BATCH = 200;

export class RedisQuotaStore implements QuotaStore {
  readonly backend = 'redis' as const;

  constructor(private readonly redis: Redis) {
    logger.info({ event: 'quota_store_initialized', backend: this.backend }, '[QuotaStore] Initialized with shared Redis client');
  }

  private key(userId: string): string {
    return `${QUOTA_KEY_PREFIX}${userId}`;
  }

  async get(userId: string): Promise<number | null> {
    try {
      const raw = await this.redis.get(this.key(userId));
      if (raw === null) return null;

      const value = Number.parseInt(raw, 10);
      if (Number.isNaN(value)) {
        logger.warn({ event: 'quota_value_corrupt', userId }, '[QuotaStore] Non-numeric quota value');
        return null;
      }
      return value;
    } catch (err) {
      logger.warn({
        event: 'quota_get_failed',
        userId,
        error: err instanceof Error ? err.message : String(err)
      }, '[QuotaStore] Redis GET failed');
      return null;
    }
  }

  async compareExchangeConsume(userId: string, amount: number): Promise<boolean> {
    assertConsumeAmount(amount);

    try {
      const result = await this.redis.eval(CONSUME_SCRIPT, 1, this.key(userId), amount);
      return result === 1;
    } catch (err) {
      logger.error({
        event: 'quota_consume_failed',
        userId,
        amount,
        error: err instanceof Error ? err.message : String(err)
      }, '[QuotaStore] Redis consume script failed, denying');
      return false;
    }
  }

  async set(userId: string, value: number): Promise<void> {
    assertQuotaValue(value);

    try {
      await this.redis.set(this.key(userId), String(value));
    } catch (err) {
      logger.error({
        event: 'quota_set_failed',
        userId,
        error: err instanceof Error ? err.message : String(err)
      }, '[QuotaStore] Redis SET failed');
      throw err;
    }
  }

  async listUserIds(): Promise<string[]> {
    const ids: string[] = [];
    let cursor = '0';
    do {
      const [next, keys] = await this.redis.scan(cursor, 'MATCH', `${QUOTA_KEY_PREFIX}*`, 'COUNT', SCAN_BATCH);
      cursor = next;
      for (const key of keys) {
        ids.push(key.slice(QUOTA_KEY_PREFIX.length));
      }
    } while (cursor !== '0');
    return ids;
  }
}
