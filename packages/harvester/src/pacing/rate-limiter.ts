type RateLimiterConfig = {
  /** 0 disables pacing */
  requestsPerMinute: number;
  now: () => number;
  sleep: (ms: number) => Promise<void>;
};

const DEFAULT_CONFIG: RateLimiterConfig = {
  requestsPerMinute: 600,
  now: () => performance.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/**
 * Single-token bucket: consecutive acquisitions are spaced at least
 * `60_000 / requestsPerMinute` ms apart, with no burst allowance.
 */
export class RateLimiter {
  private readonly intervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private tokens: number;
  private lastRefillTime: number;

  constructor(config?: Partial<RateLimiterConfig>) {
    const merged = { ...DEFAULT_CONFIG, ...config };
    this.intervalMs =
      merged.requestsPerMinute > 0 ? 60_000 / merged.requestsPerMinute : 0;
    this.now = merged.now;
    this.sleep = merged.sleep;
    this.tokens = 1;
    this.lastRefillTime = this.now();
  }

  get minIntervalMs(): number {
    return this.intervalMs;
  }

  async acquire(): Promise<void> {
    if (this.intervalMs === 0) {
      return;
    }

    this.refill();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return;
    }

    const waitMs = this.intervalMs * (1 - this.tokens);
    await this.sleep(waitMs);

    this.refill();
    this.tokens = Math.max(0, this.tokens - 1);
  }

  private refill(): void {
    const now = this.now();
    const elapsed = now - this.lastRefillTime;

    this.tokens = Math.min(1, this.tokens + elapsed / this.intervalMs);
    this.lastRefillTime = now;
  }
}

export type { RateLimiterConfig };
