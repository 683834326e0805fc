interface Bucket {
  tokens: number;
  last: number;
}

/**
 * Token buckets keyed by credential id. Capacity equals the per-minute limit
 * and refills continuously at `rpm / 60` tokens per second. A limit of zero or
 * below means unlimited.
 */
export class RateLimiter {
  private buckets = new Map<string, Bucket>();

  constructor(private readonly now: () => number = Date.now) {}

  tryTake(key: string, rpm: number): boolean {
    if (!(rpm > 0)) return true; // unlimited

    const now = this.now();
    const b = this.refill(key, rpm, now);

    if (b.tokens >= 1) {
      b.tokens -= 1;
      this.buckets.set(key, b);
      return true;
    }

    this.buckets.set(key, b);
    return false;
  }

  /** Tokens currently available, without consuming one. */
  available(key: string, rpm: number): number {
    if (!(rpm > 0)) return Number.POSITIVE_INFINITY;
    const b = this.refill(key, rpm, this.now());
    this.buckets.set(key, b);
    return b.tokens;
  }

  private refill(key: string, rpm: number, now: number): Bucket {
    const b = this.buckets.get(key) ?? { tokens: rpm, last: now };
    const elapsed = Math.max(0, now - b.last) / 1000;
    b.tokens = Math.min(rpm, b.tokens + (elapsed * rpm) / 60);
    b.last = now;
    return b;
  }
}
