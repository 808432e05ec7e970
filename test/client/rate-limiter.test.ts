/**
 * Tests for the token-bucket rate limiter
 */

import { describe, it, expect, vi } from 'vitest';
import { RateLimiter } from '../../src/client/rate-limiter.js';
import { ValidationError } from '../../src/lib/errors.js';

/** Manual clock whose sleep advances time instantly */
function createClock() {
  let now = 0;
  const sleeps: number[] = [];
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
    sleeps,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      now += ms;
    },
  };
}

describe('RateLimiter', () => {
  describe('constructor', () => {
    it('should use the documented defaults', () => {
      const limiter = new RateLimiter();
      expect(limiter.capacity).toBe(10);
      expect(limiter.refillRate).toBe(50);
    });

    it('should reject a capacity below one token', () => {
      expect(() => new RateLimiter({ capacity: 0 })).toThrow(ValidationError);
    });

    it('should reject a non-positive refill rate', () => {
      expect(() => new RateLimiter({ refillRate: 0 })).toThrow(ValidationError);
      expect(() => new RateLimiter({ refillRate: -1 })).toThrow(ValidationError);
    });
  });

  describe('tryAcquire', () => {
    it('should start with a full bucket', () => {
      const clock = createClock();
      const limiter = new RateLimiter({ capacity: 3, refillRate: 10, now: clock.now });

      expect(limiter.tryAcquire()).toBe(true);
      expect(limiter.tryAcquire()).toBe(true);
      expect(limiter.tryAcquire()).toBe(true);
      expect(limiter.tryAcquire()).toBe(false);
    });

    it('should refill in proportion to elapsed time', () => {
      const clock = createClock();
      const limiter = new RateLimiter({ capacity: 3, refillRate: 10, now: clock.now });
      for (let i = 0; i < 3; i++) limiter.tryAcquire();

      clock.advance(100);
      expect(limiter.tryAcquire()).toBe(true);
      expect(limiter.tryAcquire()).toBe(false);
    });

    it('should never hold more than capacity tokens', () => {
      const clock = createClock();
      const limiter = new RateLimiter({ capacity: 5, refillRate: 50, now: clock.now });

      clock.advance(60_000);
      expect(limiter.available()).toBe(5);
    });

    it('should never go negative', () => {
      const clock = createClock();
      const limiter = new RateLimiter({ capacity: 1, refillRate: 1, now: clock.now });

      limiter.tryAcquire();
      limiter.tryAcquire();
      limiter.tryAcquire();
      expect(limiter.available()).toBe(0);
    });
  });

  describe('acquire', () => {
    it('should return immediately while tokens remain', async () => {
      const clock = createClock();
      const limiter = new RateLimiter({ capacity: 2, refillRate: 1, now: clock.now, sleep: clock.sleep });

      await limiter.acquire();
      await limiter.acquire();
      expect(clock.sleeps).toEqual([]);
    });

    it('should wait (1 - tokens) / refillRate seconds for the next token', async () => {
      const clock = createClock();
      const limiter = new RateLimiter({ capacity: 1, refillRate: 2, now: clock.now, sleep: clock.sleep });

      await limiter.acquire();
      await limiter.acquire();
      expect(clock.sleeps).toEqual([500]);
    });

    it('should serve concurrent waiters in arrival order', async () => {
      const clock = createClock();
      const limiter = new RateLimiter({ capacity: 1, refillRate: 1, now: clock.now, sleep: clock.sleep });
      const order: number[] = [];

      await Promise.all(
        [1, 2, 3].map((n) => limiter.acquire().then(() => order.push(n)))
      );

      expect(order).toEqual([1, 2, 3]);
      expect(clock.sleeps).toEqual([1000, 1000]);
    });

    it('should bound throughput to capacity plus refill', async () => {
      const clock = createClock();
      const limiter = new RateLimiter({ capacity: 10, refillRate: 50, now: clock.now, sleep: clock.sleep });

      await Promise.all(Array.from({ length: 60 }, () => limiter.acquire()));

      // 10 from the full bucket, the remaining 50 at 50 per second
      expect(clock.now()).toBeCloseTo(1000, 6);
    });

    it('should keep serving later waiters after one wait fails', async () => {
      const clock = createClock();
      const sleep = vi
        .fn<(ms: number) => Promise<void>>()
        .mockRejectedValueOnce(new Error('interrupted'))
        .mockImplementation(clock.sleep);
      const limiter = new RateLimiter({ capacity: 1, refillRate: 1, now: clock.now, sleep });

      await limiter.acquire();
      const failed = limiter.acquire();
      const next = limiter.acquire();

      await expect(failed).rejects.toThrow('interrupted');
      await expect(next).resolves.toBeUndefined();
    });
  });
});
