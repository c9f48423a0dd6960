/**
 * Shared Redis Client Factory
 * One Redis client per process, reused by the quota store and the rate limiter
 */

import { Redis } from 'ioredis';
import { logger } from '../logger/structured-logger.js';

let redisClientInstance: Redis | null = null;
let redisInitialized = false;

export interface RedisClientOptions {
  url: string;
  maxRetriesPerRequest?: number;
  connectTimeout?: number;
  commandTimeout?: number;
  enableOfflineQueue?: boolean;
}

function maskUrl(url: string): string {
  return url.replace(/:[^:@]+@/, ':****@');
}

/**
 * Get or create the shared Redis client
 * @returns Redis client, or null if the connection attempt failed
 */
export async function getRedisClient(options: RedisClientOptions): Promise<Redis | null> {
  if (redisClientInstance || redisInitialized) {
    return redisClientInstance;
  }
  redisInitialized = true;

  const {
    url,
    maxRetriesPerRequest = 2,
    connectTimeout = 2000,
    commandTimeout = 2000,
    enableOfflineQueue = false
  } = options;
  const useTls = url.startsWith('rediss://');

  logger.info({
    event: 'redis_init_attempt',
    redisUrl: maskUrl(url),
    useTls,
    connectTimeout,
    commandTimeout
  }, '[Redis] Attempting connection to shared client');

  const redis = new Redis(url, {
    maxRetriesPerRequest,
    connectTimeout,
    commandTimeout,
    retryStrategy: (times: number) => {
      if (times > maxRetriesPerRequest) return null;
      return Math.min(times * 100, 500);
    },
    lazyConnect: true,
    enableOfflineQueue,
    enableReadyCheck: true,
    ...(useTls && { tls: { rejectUnauthorized: false } })
  });

  redis.on('error', (err: Error) => {
    logger.warn({ event: 'redis_connection_error', error: err.message }, '[Redis] Connection error');
  });

  try {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new Error(`Connection timeout after ${connectTimeout}ms`)), connectTimeout);
    });
    await Promise.race([redis.connect(), timeout]).finally(() => clearTimeout(timer));

    const pong = await redis.ping();
    if (pong !== 'PONG') {
      throw new Error('PING test failed');
    }

    logger.info({ event: 'redis_connected', redisUrl: maskUrl(url) }, '[Redis] Shared client connected');
    redisClientInstance = redis;
    return redis;
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.warn({
      event: 'redis_connection_failed',
      error: error.message,
      useTls
    }, '[Redis] Failed to connect');
    redis.disconnect();
    return null;
  }
}

/**
 * Close the Redis connection (graceful shutdown)
 */
export async function closeRedisClient(): Promise<void> {
  if (redisClientInstance) {
    await redisClientInstance.quit();
    logger.info({ event: 'redis_closed' }, '[Redis] Client connection closed');
  }
  redisClientInstance = null;
  redisInitialized = false;
}
