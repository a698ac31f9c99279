import type { NextFunction } from 'express';
import { afterEach, describe, expect, test, vi } from 'vitest';

import type { TierQuotas } from '../src/config/types.js';
import { RateLimitError } from '../src/errors/app-error.js';
import { RateLimiter } from '../src/middleware/rate-limiter.js';

const tiers: TierQuotas = {
  metadata: { maxRequests: 3, windowMs: 60_000 },
  download: { maxRequests: 2, windowMs: 300_000 },
  health: { maxRequests: 100, windowMs: 60_000 },
};

let now = 1_000_000;
const limiters: RateLimiter[] = [];

function createLimiter(): RateLimiter {
  const limiter = new RateLimiter({
    tiers,
    cleanupIntervalMs: 60_000,
    clock: () => now,
  });
  limiters.push(limiter);
  return limiter;
}

afterEach(() => {
  for (const limiter of limiters.splice(0)) limiter.destroy();
  now = 1_000_000;
});

describe('RateLimiter', () => {
  describe('check', () => {
    test('allows up to the quota and reports the remainder', () => {
      const limiter = createLimiter();

      expect(limiter.check('1.1.1.1', 'download')).toEqual({
        allowed: true,
        limit: 2,
        remaining: 1,
        resetAt: 1_300_000,
      });
      expect(limiter.check('1.1.1.1', 'download')).toMatchObject({
        allowed: true,
        remaining: 0,
      });
    });

    test('denies the request after the quota', () => {
      const limiter = createLimiter();
      limiter.check('1.1.1.1', 'download');
      limiter.check('1.1.1.1', 'download');

      now += 100_000;
      expect(limiter.check('1.1.1.1', 'download')).toEqual({
        allowed: false,
        limit: 2,
        retryAfterSeconds: 200,
        resetAt: 1_300_000,
      });
    });

    test('keeps clients independent', () => {
      const limiter = createLimiter();
      limiter.check('1.1.1.1', 'download');
      limiter.check('1.1.1.1', 'download');

      expect(limiter.check('1.1.1.1', 'download').allowed).toBe(false);
      expect(limiter.check('2.2.2.2', 'download').allowed).toBe(true);
    });

    test('keeps tiers independent', () => {
      const limiter = createLimiter();
      limiter.check('1.1.1.1', 'download');
      limiter.check('1.1.1.1', 'download');

      expect(limiter.check('1.1.1.1', 'metadata').allowed).toBe(true);
    });

    test('does not count denied requests', () => {
      const limiter = createLimiter();
      for (let i = 0; i < 10; i++) limiter.check('1.1.1.1', 'download');

      now += 300_000;
      expect(limiter.check('1.1.1.1', 'download')).toMatchObject({
        allowed: true,
        remaining: 1,
      });
    });

    test('starts a new window once the old one elapses', () => {
      const limiter = createLimiter();
      limiter.check('1.1.1.1', 'download');
      limiter.check('1.1.1.1', 'download');

      now += 299_999;
      expect(limiter.check('1.1.1.1', 'download').allowed).toBe(false);
      now += 1;
      expect(limiter.check('1.1.1.1', 'download')).toMatchObject({
        allowed: true,
        resetAt: 1_600_000,
      });
    });

    test('rounds retry-after up to at least one second', () => {
      const limiter = createLimiter();
      limiter.check('1.1.1.1', 'download');
      limiter.check('1.1.1.1', 'download');

      now += 299_900;
      expect(limiter.check('1.1.1.1', 'download')).toMatchObject({
        allowed: false,
        retryAfterSeconds: 1,
      });
    });
  });

  describe('sweep', () => {
    test('removes only expired buckets', () => {
      const limiter = createLimiter();
      limiter.check('1.1.1.1', 'metadata');
      limiter.check('1.1.1.1', 'download');
      expect(limiter.size).toBe(2);

      now += 60_000;
      expect(limiter.sweep()).toBe(1);
      expect(limiter.size).toBe(1);
    });

    test('destroy clears every bucket', () => {
      const limiter = createLimiter();
      limiter.check('1.1.1.1', 'metadata');

      limiter.destroy();
      expect(limiter.size).toBe(0);
    });
  });

  describe('middleware', () => {
    function invoke(
      limiter: RateLimiter,
      ip: string
    ): { headers: Record<string, string>; next: NextFunction } {
      const headers: Record<string, string> = {};
      const res = {
        set: (key: string, value: string) => {
          headers[key] = value;
          return res;
        },
      };
      const req = { ip, socket: {} };
      const next = vi.fn<(err?: unknown) => void>();

      limiter.middleware('download')(
        req as never,
        res as never,
        next
      );
      return { headers, next };
    }

    test('sets rate limit headers on allowed requests', () => {
      const limiter = createLimiter();
      const { headers, next } = invoke(limiter, '203.0.113.9');

      expect(headers).toEqual({
        'X-RateLimit-Limit': '2',
        'X-RateLimit-Remaining': '1',
        'X-RateLimit-Reset': '1300',
      });
      expect(next).toHaveBeenCalledWith();
    });

    test('forwards a RateLimitError once the quota is spent', () => {
      const limiter = createLimiter();
      invoke(limiter, '203.0.113.9');
      invoke(limiter, '203.0.113.9');
      const { next } = invoke(limiter, '203.0.113.9');

      const [error] = vi.mocked(next).mock.calls[0] ?? [];
      expect(error).toBeInstanceOf(RateLimitError);
      expect(error).toHaveProperty('retryAfter', 300);
    });

    test('strips non-IP characters from the client key', () => {
      const limiter = createLimiter();
      invoke(limiter, '203.0.113.9<script>');

      expect(limiter.check('203.0.113.9c', 'download')).toMatchObject({
        allowed: true,
        remaining: 0,
      });
    });
  });
});
