import type { HttpBindings } from '@hono/node-server';
import { getConnInfo } from '@hono/node-server/conninfo';
import type { Context, MiddlewareHandler } from 'hono';

/**
 * Rate limiter configuration
 */
export interface RateLimiterConfig {
  /**
   * Maximum number of requests allowed in the window
   */
  limit: number;

  /**
   * Time window in seconds
   */
  windowSec: number;

  /**
   * Key generator function - defaults to client IP
   */
  keyGenerator?: (context: Context) => string;

  /**
   * Skip rate limiting for certain requests
   */
  skip?: (context: Context) => boolean;

  /**
   * Counter storage; each limiter gets its own unless one is shared
   */
  store?: RateLimitStore;
}

export interface RateLimitEntry {
  count: number;
  resetAt: number;
}

/**
 * Fixed-window counters for one process.
 * Expired windows are swept when the map grows past maxEntries.
 */
export class RateLimitStore {
  private entries = new Map<string, RateLimitEntry>();

  constructor(private readonly maxEntries = 10000) {}

  /**
   * Count one request for key and return its current window
   */
  hit(key: string, windowMs: number, now: number = Date.now()): RateLimitEntry {
    if (this.entries.size > this.maxEntries) {
      this.cleanup(now);
    }

    let entry = this.entries.get(key);
    if (!entry || entry.resetAt <= now) {
      entry = { count: 0, resetAt: now + windowMs };
    }

    entry.count++;
    this.entries.set(key, entry);
    return entry;
  }

  cleanup(now: number = Date.now()): void {
    for (const [rateLimitKey, rateLimitEntry] of this.entries.entries()) {
      if (rateLimitEntry.resetAt <= now) {
        this.entries.delete(rateLimitKey);
      }
    }
  }

  get size(): number {
    return this.entries.size;
  }
}

const hasNodeBindings = (env: unknown): env is HttpBindings =>
  typeof env === 'object' && env !== null && 'incoming' in env;

/**
 * Get client IP from proxy headers, then from the socket when served by Node
 */
export const getClientIp = (context: Context): string => {
  const forwardedFor = context.req.header('x-forwarded-for');
  if (forwardedFor) return forwardedFor.split(',')[0].trim();

  const realIp = context.req.header('x-real-ip');
  if (realIp) return realIp;

  if (hasNodeBindings(context.env)) {
    const address = getConnInfo(context).remote.address;
    if (address) return address;
  }

  return 'unknown';
};

/**
 * Rate limiter middleware using fixed window algorithm
 */
export const rateLimiter = (config: RateLimiterConfig): MiddlewareHandler => {
  const { limit, windowSec, keyGenerator, skip } = config;
  const store = config.store ?? new RateLimitStore();
  const windowMs = windowSec * 1000;

  return async (context, next) => {
    if (skip?.(context)) {
      await next();
      return;
    }

    const key = keyGenerator ? keyGenerator(context) : getClientIp(context);
    const now = Date.now();
    const entry = store.hit(key, windowMs, now);

    const remaining = Math.max(0, limit - entry.count);
    const resetSeconds = Math.ceil((entry.resetAt - now) / 1000);

    context.header('X-RateLimit-Limit', limit.toString());
    context.header('X-RateLimit-Remaining', remaining.toString());
    context.header('X-RateLimit-Reset', String(Math.floor(entry.resetAt / 1000)));

    if (entry.count > limit) {
      console.log(`⚠️ [RateLimit] Exceeded for ${key}: ${entry.count}/${limit}`);

      context.header('Retry-After', resetSeconds.toString());

      return context.json(
        {
          status: 'error',
          code: 'RATE_LIMIT_EXCEEDED',
          message: 'Too many requests. Please try again later.',
          error: `Rate limit of ${limit} requests per ${windowSec}s exceeded`,
        },
        429
      );
    }

    await next();
  };
};
