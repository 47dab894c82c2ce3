type DurationStats = {
  count: number;
  min: number;
  max: number;
  total: number;
};

type DurationSummary = DurationStats & { avg: number };

type RunMetricsSnapshot = {
  processed: number;
  elapsedSeconds: number;
  /** Committed URLs per second since the run started. */
  ratePerSecond: number;
  renderSeconds: DurationSummary;
};

function emptyStats(): DurationStats {
  return { count: 0, min: 0, max: 0, total: 0 };
}

/**
 * Throughput of the current process. Counts only URLs committed by this run,
 * never inherited progress, so rate and ETA reflect what the process is
 * actually doing.
 */
export class RunMetrics {
  private readonly now: () => number;
  private startedAt: number;
  private processed: number;
  private renderSeconds: DurationStats;

  constructor(now: () => number = Date.now) {
    this.now = now;
    this.startedAt = now();
    this.processed = 0;
    this.renderSeconds = emptyStats();
  }

  start(): void {
    this.startedAt = this.now();
    this.processed = 0;
    this.renderSeconds = emptyStats();
  }

  recordCommit(renderSeconds: number): void {
    this.processed += 1;

    const stats = this.renderSeconds;
    stats.min = stats.count === 0 ? renderSeconds : Math.min(stats.min, renderSeconds);
    stats.max = stats.count === 0 ? renderSeconds : Math.max(stats.max, renderSeconds);
    stats.count += 1;
    stats.total += renderSeconds;
  }

  get elapsedSeconds(): number {
    return Math.max(0, (this.now() - this.startedAt) / 1000);
  }

  get ratePerSecond(): number {
    const elapsed = this.elapsedSeconds;
    return elapsed > 0 ? this.processed / elapsed : 0;
  }

  /** Seconds left for `remaining` URLs at the current rate, or null before any progress. */
  etaSeconds(remaining: number): number | null {
    const rate = this.ratePerSecond;
    if (rate <= 0) {
      return null;
    }
    return Math.max(0, remaining) / rate;
  }

  snapshot(): RunMetricsSnapshot {
    const { count, min, max, total } = this.renderSeconds;

    return {
      processed: this.processed,
      elapsedSeconds: this.elapsedSeconds,
      ratePerSecond: this.ratePerSecond,
      renderSeconds: { count, min, max, avg: count > 0 ? total / count : 0, total },
    };
  }
}

export type { RunMetricsSnapshot, DurationSummary };
