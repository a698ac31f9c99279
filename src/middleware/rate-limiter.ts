import type { NextFunction, Request, RequestHandler, Response } from 'express';

import type {
  RateLimitBucket,
  RateLimitTier,
  TierQuotas,
} from '../config/types.js';

import { RateLimitError } from '../errors/app-error.js';

import { getClientKey } from '../http/client-key.js';

import { logDebug, logWarn } from '../services/logger.js';

export type Clock = () => number;

export type RateLimitDecision =
  | {
      allowed: true;
      limit: number;
      remaining: number;
      resetAt: number;
    }
  | {
      allowed: false;
      limit: number;
      retryAfterSeconds: number;
      resetAt: number;
    };

export interface RateLimiterOptions {
  tiers: TierQuotas;
  cleanupIntervalMs: number;
  clock?: Clock;
}

// Validation bounds for options
const MIN_CLEANUP_INTERVAL_MS = 1000;

/**
 * Fixed-window limiter keyed by client and tier. `check` is synchronous, so
 * the read and the increment for one key can never interleave with another
 * request.
 */
export class RateLimiter {
  private readonly store = new Map<string, RateLimitBucket>();
  private readonly tiers: TierQuotas;
  private readonly clock: Clock;
  private cleanupInterval: ReturnType<typeof setInterval> | null = null;

  constructor(options: RateLimiterOptions) {
    this.tiers = options.tiers;
    this.clock = options.clock ?? Date.now;

    this.cleanupInterval = setInterval(
      () => this.sweep(),
      Math.max(options.cleanupIntervalMs, MIN_CLEANUP_INTERVAL_MS)
    );
    // Ensure interval doesn't prevent process exit
    this.cleanupInterval.unref();
  }

  get size(): number {
    return this.store.size;
  }

  /**
   * Counts the request against the client's bucket for `tier`. Denied
   * requests are not counted.
   */
  check(clientKey: string, tier: RateLimitTier): RateLimitDecision {
    const quota = this.tiers[tier];
    const now = this.clock();
    const key = `${tier}:${clientKey}`;

    let bucket = this.store.get(key);
    if (!bucket || now >= bucket.windowStart + quota.windowMs) {
      bucket = { clientKey, tier, windowStart: now, count: 0 };
      this.store.set(key, bucket);
    }

    const resetAt = bucket.windowStart + quota.windowMs;

    if (bucket.count >= quota.maxRequests) {
      return {
        allowed: false,
        limit: quota.maxRequests,
        retryAfterSeconds: Math.max(1, Math.ceil((resetAt - now) / 1000)),
        resetAt,
      };
    }

    bucket.count++;
    return {
      allowed: true,
      limit: quota.maxRequests,
      remaining: quota.maxRequests - bucket.count,
      resetAt,
    };
  }

  /**
   * Removes buckets whose window has ended. Returns how many were removed.
   */
  sweep(): number {
    const now = this.clock();
    let removed = 0;
    for (const [key, bucket] of this.store) {
      if (now >= bucket.windowStart + this.tiers[bucket.tier].windowMs) {
        this.store.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      logDebug('Rate limit buckets swept', { removed, remaining: this.size });
    }
    return removed;
  }

  /**
   * Destroys the rate limiter and cleans up resources
   */
  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.store.clear();
  }

  middleware(tier: RateLimitTier): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
      const clientKey = getClientKey(req);
      const decision = this.check(clientKey, tier);

      res.set('X-RateLimit-Limit', String(decision.limit));
      res.set('X-RateLimit-Reset', String(Math.ceil(decision.resetAt / 1000)));

      if (!decision.allowed) {
        res.set('X-RateLimit-Remaining', '0');
        logWarn('Rate limit exceeded', {
          tier,
          clientKey,
          retryAfter: decision.retryAfterSeconds,
        });
        next(new RateLimitError(decision.retryAfterSeconds));
        return;
      }

      res.set('X-RateLimit-Remaining', String(decision.remaining));
      next();
    };
  }
}
