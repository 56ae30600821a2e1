import { systemClock, type Clock } from '../types/clock.js';

export interface WebhookDedupOptions {
  /** How long an update id is remembered. */
  horizonMs: number;
  /** Hard cap on remembered ids; the oldest are dropped first. */
  maxEntries: number;
  now?: Clock;
}

/**
 * Remembers recently seen update ids so redelivered webhooks are processed
 * once. An id older than the horizon may be processed again; an id inside
 * the horizon never is.
 */
export class WebhookDedupGuard {
  // Insertion order is arrival order, so the first entries are the oldest.
  private readonly seen = new Map<string, number>();
  private readonly horizonMs: number;
  private readonly maxEntries: number;
  private readonly now: Clock;

  constructor(options: WebhookDedupOptions) {
    this.horizonMs = options.horizonMs;
    this.maxEntries = options.maxEntries;
    this.now = options.now ?? systemClock;
  }

  /** True the first time `updateId` is seen inside the horizon. */
  admit(updateId: string | number, now: Date = this.now()): boolean {
    const at = now.getTime();
    this.evictExpired(at);

    const key = String(updateId);
    if (this.seen.has(key)) {
      return false;
    }

    this.seen.set(key, at);
    while (this.seen.size > this.maxEntries) {
      const oldest = this.seen.keys().next();
      if (oldest.done) break;
      this.seen.delete(oldest.value);
    }
    return true;
  }

  get size(): number {
    return this.seen.size;
  }

  private evictExpired(at: number): void {
    const threshold = at - this.horizonMs;
    for (const [key, seenAt] of this.seen) {
      if (seenAt >= threshold) break;
      this.seen.delete(key);
    }
  }
}
