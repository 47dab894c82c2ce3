import { createLogger, type Log } from '@workspace/logger';
import { successRate } from '../pipeline/run-counters.js';
import type { RunCounters, StopReason } from '../pipeline/types.js';
import type { RunMetrics } from './run-metrics.js';

type ProgressReporterConfig = {
  totalInputs: number;
  /** Report every N committed indices; 0 disables periodic lines. */
  interval: number;
  logger: Log;
};

type RunOutcomeSummary = {
  status: StopReason;
  resumeOffset: number;
  processedThisRun: number;
  counters: RunCounters;
  lastProcessedIndex: number;
};

const DEFAULT_CONFIG: ProgressReporterConfig = {
  totalInputs: 0,
  interval: 100,
  logger: createLogger('progress'),
};

export function formatDuration(seconds: number): string {
  const whole = Math.max(0, Math.round(seconds));
  const hours = Math.floor(whole / 3600);
  const minutes = Math.floor((whole % 3600) / 60);
  const secs = whole % 60;
  const pad = (value: number) => String(value).padStart(2, '0');

  if (hours > 0) {
    return `${hours}h ${pad(minutes)}m ${pad(secs)}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${pad(secs)}s`;
  }
  return `${secs}s`;
}

/**
 * Human-facing progress lines: periodic position, rate, ETA and tally, plus
 * the closing summary of a run.
 */
export class ProgressReporter {
  private readonly config: ProgressReporterConfig;
  private readonly metrics: RunMetrics;

  constructor(metrics: RunMetrics, config?: Partial<ProgressReporterConfig>) {
    this.metrics = metrics;
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  shouldReport(index: number): boolean {
    return this.config.interval > 0 && (index + 1) % this.config.interval === 0;
  }

  /** Logs a progress line when `index` lands on the reporting interval. */
  maybeReport(index: number, counters: RunCounters): boolean {
    if (!this.shouldReport(index)) {
      return false;
    }

    this.config.logger.info(this.formatProgress(index, counters));
    return true;
  }

  formatProgress(index: number, counters: RunCounters): string {
    const done = index + 1;
    const total = this.config.totalInputs;
    const percent = total > 0 ? (done / total) * 100 : 0;
    const eta = this.metrics.etaSeconds(total - done);

    return [
      `Progress: ${done}/${total} (${percent.toFixed(1)}%)`,
      `${this.metrics.ratePerSecond.toFixed(2)} URL/s`,
      `ETA ${eta === null ? 'unknown' : formatDuration(eta)}`,
      `✅ ${counters.succeeded} ❌ ${counters.failed}`,
    ].join(' | ');
  }

  formatSummary(summary: RunOutcomeSummary): string[] {
    const { counters } = summary;
    const byOutcome = Object.entries(counters.byOutcome)
      .filter(([, count]) => count > 0)
      .map(([outcome, count]) => `${outcome}=${count}`)
      .join(', ');

    const headline =
      summary.status === 'completed'
        ? `Run completed: all ${this.config.totalInputs} inputs processed`
        : `Run stopped early (${summary.status}), resumable at index ${summary.lastProcessedIndex + 1}`;

    const { renderSeconds } = this.metrics.snapshot();
    const lines = [
      headline,
      `This run: ${summary.processedThisRun} URLs from index ${summary.resumeOffset} in ${formatDuration(this.metrics.elapsedSeconds)}`,
    ];

    if (renderSeconds.count > 0) {
      lines.push(
        `Render time: avg ${renderSeconds.avg.toFixed(2)}s, min ${renderSeconds.min.toFixed(2)}s, max ${renderSeconds.max.toFixed(2)}s`,
      );
    }

    lines.push(
      `Total: ${counters.totalProcessed} processed, ✅ ${counters.succeeded} ❌ ${counters.failed} (${successRate(counters).toFixed(1)}% success)`,
      `Outcomes: ${byOutcome === '' ? 'none' : byOutcome}`,
      `Session recoveries: ${counters.sessionRecoveries}, proactive refreshes: ${counters.sessionRefreshes}`,
    );
    return lines;
  }

  reportSummary(summary: RunOutcomeSummary): void {
    const lines = this.formatSummary(summary);
    const write = summary.status === 'completed' ? this.config.logger.info : this.config.logger.warn;
    for (const line of lines) {
      write(line);
    }
  }
}

export type { ProgressReporterConfig, RunOutcomeSummary };
