/**
 * Token-bucket rate limiter
 *
 * Admission control for every physical request. A transport owns one limiter
 * unless the caller injects a shared instance; nothing here is module-global.
 */

import {
  DEFAULT_RATE_LIMIT_CAPACITY,
  DEFAULT_RATE_LIMIT_REFILL_RATE,
} from '../lib/constants.js';
import { ValidationError } from '../lib/errors.js';

/** Rate limiter configuration */
export interface RateLimiterConfig {
  /** Maximum tokens in the bucket (default: 10) */
  capacity?: number;
  /** Tokens added per second (default: 50) */
  refillRate?: number;
  /** Monotonic clock in milliseconds (default: performance.now) */
  now?: () => number;
  /** Suspension used while waiting for a token */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Resolve after `ms` milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RateLimiter {
  readonly capacity: number;
  readonly refillRate: number;

  private tokens: number;
  private lastRefill: number;
  private readonly now: () => number;
  private readonly sleepFn: (ms: number) => Promise<void>;
  /** Tail of the FIFO chain serialising async waiters */
  private tail: Promise<void> = Promise.resolve();

  constructor(config: RateLimiterConfig = {}) {
    this.capacity = config.capacity ?? DEFAULT_RATE_LIMIT_CAPACITY;
    this.refillRate = config.refillRate ?? DEFAULT_RATE_LIMIT_REFILL_RATE;

    if (!(this.capacity >= 1)) {
      throw new ValidationError(`Rate limiter capacity must be at least 1, got ${this.capacity}`);
    }
    if (!(this.refillRate > 0)) {
      throw new ValidationError(`Rate limiter refill rate must be positive, got ${this.refillRate}`);
    }

    this.now = config.now ?? (() => performance.now());
    this.sleepFn = config.sleep ?? sleep;
    this.tokens = this.capacity;
    this.lastRefill = this.now();
  }

  private refill(): void {
    const now = this.now();
    const elapsedSeconds = Math.max(0, now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.capacity, this.tokens + elapsedSeconds * this.refillRate);
    this.lastRefill = now;
  }

  /**
   * Take a token if one is available right now
   *
   * Never suspends. Returns false when the bucket holds less than one token.
   */
  tryAcquire(): boolean {
    this.refill();
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }
    return false;
  }

  /**
   * Wait until a token is available, then take it
   *
   * Waiters are served in arrival order; only one of them touches the bucket
   * at a time.
   */
  acquire(): Promise<void> {
    const turn = this.tail.then(() => this.waitForToken());
    // Keep the chain alive for later waiters; the rejection still reaches this caller
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  private async waitForToken(): Promise<void> {
    for (;;) {
      if (this.tryAcquire()) {
        return;
      }
      const waitMs = ((1 - this.tokens) / this.refillRate) * 1000;
      await this.sleepFn(waitMs);
    }
  }

  /**
   * Current token count after a refill (diagnostics)
   */
  available(): number {
    this.refill();
    return this.tokens;
  }
}
