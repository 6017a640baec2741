const EPSILON = 1e-9;

/**
 * Interval-refilled token bucket. Capacity equals the per-second rate (at least one
 * token) and `rate * intervalMs / 1000` tokens are added at each interval boundary.
 */
export class TokenBucket {
  private tokens: number;
  private lastRefillAt: number;
  private readonly capacity: number;
  private readonly perInterval: number;

  constructor(
    requestsPerSecond: number,
    private readonly intervalMs: number,
    now: number
  ) {
    this.capacity = Math.max(1, requestsPerSecond);
    this.perInterval = (requestsPerSecond * intervalMs) / 1000;
    this.tokens = this.capacity;
    this.lastRefillAt = now;
  }

  available(now: number): number {
    this.refill(now);
    return this.tokens;
  }

  tryTake(now: number): boolean {
    this.refill(now);
    if (this.tokens + EPSILON < 1) return false;
    this.tokens = Math.max(0, this.tokens - 1);
    return true;
  }

  msUntilToken(now: number): number {
    this.refill(now);
    if (this.tokens + EPSILON >= 1) return 0;
    const intervalsNeeded = Math.ceil((1 - this.tokens - EPSILON) / this.perInterval);
    return Math.max(0, this.lastRefillAt + intervalsNeeded * this.intervalMs - now);
  }

  private refill(now: number): void {
    const intervals = Math.floor((now - this.lastRefillAt) / this.intervalMs);
    if (intervals <= 0) return;
    this.tokens = Math.min(this.capacity, this.tokens + intervals * this.perInterval);
    this.lastRefillAt += intervals * this.intervalMs;
  }
}
