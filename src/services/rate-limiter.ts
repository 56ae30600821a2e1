import { systemClock, type Clock } from '../types/clock.js';

export type RateDecision = { allowed: true } | { allowed: false; retryAfterMs: number };

export interface RateLimiterOptions {
  /** Requests admitted per key inside one window. */
  limit: number;
  windowMs: number;
  now?: Clock;
}

/**
 * Sliding-window request counter per key. Check and record happen in one
 * synchronous step, so concurrent requests for a key cannot both slip in
 * under the limit.
 */
export class SlidingWindowRateLimiter {
  private readonly hits = new Map<string, number[]>();
  private readonly limit: number;
  private readonly windowMs: number;
  private readonly now: Clock;

  constructor(options: RateLimiterOptions) {
    this.limit = options.limit;
    this.windowMs = options.windowMs;
    this.now = options.now ?? systemClock;
  }

  tryAcquire(key: string): RateDecision {
    const now = this.now().getTime();
    const threshold = now - this.windowMs;
    const recent = (this.hits.get(key) ?? []).filter((at) => at > threshold);

    if (recent.length >= this.limit) {
      this.hits.set(key, recent);
      return { allowed: false, retryAfterMs: recent[0] + this.windowMs - now };
    }

    recent.push(now);
    this.hits.set(key, recent);
    this.prune(threshold);
    return { allowed: true };
  }

  /** Keys currently tracked. */
  get size(): number {
    return this.hits.size;
  }

  // Drops keys whose newest hit has left the window.
  private prune(threshold: number): void {
    for (const [key, times] of this.hits) {
      if (times[times.length - 1] <= threshold) {
        this.hits.delete(key);
      }
    }
  }
}
