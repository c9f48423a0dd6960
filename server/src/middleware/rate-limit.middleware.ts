/**
 * Rate Limiting Middleware
 * Fixed-window limit per client IP for anonymous suggestion traffic.
 * Authenticated callers are governed by their quota instead and pass through.
 *
 * Redis-backed (INCR + PEXPIRE) when a client is available, in-memory otherwise.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { Redis } from 'ioredis';
import type { Logger } from '../lib/logger/structured-logger.js';

export interface WindowCount {
  count: number;
  resetTime: number;
}

export interface RateLimitStore {
  readonly kind: 'memory' | 'redis';
  increment(key: string, windowMs: number): Promise<WindowCount>;
}

const CLEANUP_EVERY = 1000;

export class MemoryRateLimitStore implements RateLimitStore {
  readonly kind = 'memory';
  private readonly windows = new Map<string, WindowCount>();
  private operations = 0;

  constructor(private readonly now: () => number = Date.now) {}

  async increment(key: string, windowMs: number): Promise<WindowCount> {
    const now = this.now();
    if (++this.operations % CLEANUP_EVERY === 0) {
      this.cleanup(now);
    }

    const entry = this.windows.get(key);
    if (!entry || entry.resetTime <= now) {
      const fresh = { count: 1, resetTime: now + windowMs };
      this.windows.set(key, fresh);
      return { ...fresh };
    }

    entry.count++;
    return { ...entry };
  }

  get size(): number {
    return this.windows.size;
  }

  private cleanup(now: number): void {
    for (const [key, entry] of this.windows) {
      if (entry.resetTime <= now) {
        this.windows.delete(key);
      }
    }
  }
}

export class RedisRateLimitStore implements RateLimitStore {
  readonly kind = 'redis';

  constructor(
    private readonly redis: Redis,
    private readonly fallback: MemoryRateLimitStore,
    private readonly log: Logger,
    private readonly now: () => number = Date.now
  ) {}

  async increment(key: string, windowMs: number): Promise<WindowCount> {
    try {
      const count = await this.redis.incr(key);
      let ttl = await this.redis.pttl(key);

      // -1: key exists without expiry (first hit, or an earlier PEXPIRE was lost)
      if (ttl < 0) {
        await this.redis.pexpire(key, windowMs);
        ttl = windowMs;
      }

      return { count, resetTime: this.now() + ttl };
    } catch (error) {
      this.log.warn({
        event: 'rate_limit_store_error',
        key,
        error: error instanceof Error ? error.message : 'unknown'
      }, '[RateLimit] Redis error, falling back to memory store');
      return this.fallback.increment(key, windowMs);
    }
  }
}

/**
 * First X-Forwarded-For hop, else the socket address
 */
export function getClientIp(req: Request): string {
  const forwarded = req.headers['x-forwarded-for'];
  const chain = Array.isArray(forwarded) ? forwarded[0] : forwarded;
  const firstIp = chain?.split(',')[0]?.trim();
  if (firstIp) return firstIp;
  return req.socket.remoteAddress || 'unknown';
}

export interface AnonymousRateLimitConfig {
  windowMs: number;
  maxRequests: number;
  store: RateLimitStore;
  keyPrefix?: string;
  now?: () => number;
}

export function createAnonymousRateLimiter(config: AnonymousRateLimitConfig): RequestHandler {
  const { windowMs, maxRequests, store, keyPrefix = 'rl:anon', now = Date.now } = config;

  const handle = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    if (req.principal?.userId) {
      next();
      return;
    }

    const ip = getClientIp(req);
    const result = await store.increment(`${keyPrefix}:${ip}`, windowMs);
    const remaining = Math.max(0, maxRequests - result.count);

    res.setHeader('X-RateLimit-Limit', maxRequests.toString());
    res.setHeader('X-RateLimit-Remaining', remaining.toString());
    res.setHeader('X-RateLimit-Reset', Math.floor(result.resetTime / 1000).toString());

    if (result.count > maxRequests) {
      const retryAfter = Math.max(1, Math.ceil((result.resetTime - now()) / 1000));

      req.log.warn({
        event: 'rate_limited',
        ip,
        path: req.path,
        count: result.count,
        limit: maxRequests,
        retryAfter
      }, '[RateLimit] Request blocked - limit exceeded');

      res.setHeader('Retry-After', retryAfter.toString());
      res.status(429).json({
        error: 'Too many requests',
        code: 'RATE_LIMITED',
        traceId: req.traceId,
        retryAfter
      });
      return;
    }

    next();
  };

  return (req, res, next) => {
    handle(req, res, next).catch(next);
  };
}
