/**
 * Token bucket limiting how fast requests reach the terminal
 */

import { ConfigurationError } from '../utils/errors.js';

/**
 * Holds up to `capacity` tokens and refills at `rate` tokens per second.
 * Starts full.
 */
export class TokenBucket {
  readonly rate: number;
  readonly capacity: number;
  private tokens: number;
  private lastRefill: number;

  constructor(rate: number, capacity: number, private readonly now: () => number = Date.now) {
    if (!Number.isFinite(rate) || rate <= 0) {
      throw ConfigurationError.invalid('server.rateLimit', 'must be a positive number', rate);
    }
    if (!Number.isFinite(capacity) || capacity < 1) {
      throw ConfigurationError.invalid('server.rateBurst', 'must be at least 1', capacity);
    }
    this.rate = rate;
    this.capacity = capacity;
    this.tokens = capacity;
    this.lastRefill = now();
  }

  /**
   * Take one token if one is available
   */
  tryAcquire(): boolean {
    this.refill();
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return true;
    }
    return false;
  }

  /** Tokens currently in the bucket */
  get available(): number {
    this.refill();
    return this.tokens;
  }

  private refill(): void {
    const now = this.now();
    const elapsed = Math.max(0, now - this.lastRefill);
    this.tokens = Math.min(this.capacity, this.tokens + (elapsed / 1000) * this.rate);
    this.lastRefill = now;
  }
}
