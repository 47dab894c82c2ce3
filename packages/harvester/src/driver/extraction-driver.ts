import { createLogger } from '@workspace/logger';
import {
  CheckpointSaveError,
  CorruptCheckpointError,
  RenderFailure,
  errorMessage,
} from '../errors.js';
import { RunMetrics } from '../observability/run-metrics.js';
import { ProgressReporter } from '../observability/progress-reporter.js';
import {
  createRunCounters,
  recordOutcome,
  snapshotCounters,
} from '../pipeline/run-counters.js';
import type {
  CheckpointState,
  InputEntry,
  Outcome,
  RunCounters,
  SignalBundle,
  StopReason,
} from '../pipeline/types.js';
import type {
  DriverConfig,
  DriverDeps,
  DriverState,
  RunSummary,
  Sleep,
} from './types.js';

const log = createLogger('driver');

type RenderAttempt = {
  outcome: Outcome;
  signals: SignalBundle;
  message: string;
};

type EntryResult = 'committed' | 'session-exhausted' | 'interrupted';

type RecoveryResult = 'recovered' | 'exhausted' | 'interrupted';

const DEFAULT_CONFIG: DriverConfig = {
  timeoutSeconds: 15,
  checkpointInterval: 100,
  sessionRefreshInterval: 500,
  progressInterval: 100,
  maxUrlRetriesAfterSessionLoss: 1,
  handleSignals: true,
};

const NO_SIGNALS: SignalBundle = {};

const abortableSleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }

    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });

/**
 * Walks the input list once, committing exactly one result row per index in
 * order, and leaves a checkpoint from which a later process continues.
 *
 * The output file is the source of truth for progress: a run resumes at the
 * number of rows already written, whatever the checkpoint claims.
 */
export class ExtractionDriver {
  private readonly config: DriverConfig;
  private readonly deps: DriverDeps;
  private readonly metrics: RunMetrics;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly shutdown: AbortController;
  private state: DriverState;
  private counters: RunCounters;
  private lastProcessedIndex: number;
  private processedThisRun: number;
  private inheritedSeconds: number;
  private totalInputs: number;
  private sessionRecoveryAttempts: number;

  constructor(deps: DriverDeps, config?: Partial<DriverConfig>) {
    this.deps = deps;
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.now = deps.now ?? Date.now;
    this.metrics = deps.metrics ?? new RunMetrics(this.now);
    this.sleep = deps.sleep ?? abortableSleep;
    this.shutdown = new AbortController();
    this.state = 'initializing';
    this.counters = createRunCounters();
    this.lastProcessedIndex = -1;
    this.processedThisRun = 0;
    this.inheritedSeconds = 0;
    this.totalInputs = 0;
    this.sessionRecoveryAttempts = 0;
  }

  get currentState(): DriverState {
    return this.state;
  }

  get shutdownRequested(): boolean {
    return this.shutdown.signal.aborted;
  }

  /**
   * Asks the run to stop after the URL in flight is committed. Backoff waits
   * end immediately.
   */
  requestShutdown(reason = 'shutdown requested'): void {
    if (this.shutdownRequested) {
      return;
    }

    log.warn(`${reason}; finishing the current URL before stopping`);
    this.shutdown.abort();
  }

  async run(inputs: readonly InputEntry[]): Promise<RunSummary> {
    const { sink } = this.deps;
    this.totalInputs = inputs.length;

    this.transition('initializing');
    let resumeOffset: number;
    try {
      resumeOffset = this.initialize();
    } catch (error) {
      sink.close();
      throw error;
    }

    this.transition('resuming');
    if (resumeOffset > 0) {
      log.info(
        `Resuming at index ${resumeOffset} of ${inputs.length}: ✅ ${this.counters.succeeded} ❌ ${this.counters.failed} inherited`,
      );
    } else {
      log.info(`Starting fresh run over ${inputs.length} inputs`);
    }
    if (resumeOffset > inputs.length) {
      log.warn(
        `Output already holds ${resumeOffset} rows but the input has only ${inputs.length}; nothing to do`,
      );
    }

    const onSignal = (signal: NodeJS.Signals) => {
      this.requestShutdown(`Received ${signal}`);
    };
    if (this.config.handleSignals) {
      process.on('SIGINT', onSignal);
      process.on('SIGTERM', onSignal);
    }

    const progress = new ProgressReporter(this.metrics, {
      totalInputs: inputs.length,
      interval: this.config.progressInterval,
    });

    let status: StopReason = 'crashed';
    let crash: unknown;

    try {
      this.transition('processing');
      this.metrics.start();
      status = await this.processFrom(inputs, resumeOffset, progress);
    } catch (error) {
      crash = error;
      log.fatal('Run crashed:', error);
    } finally {
      if (this.config.handleSignals) {
        process.removeListener('SIGINT', onSignal);
        process.removeListener('SIGTERM', onSignal);
      }

      this.transition('shutting-down');
      this.saveCheckpoint(status);
      await this.closeResources();
    }

    this.transition('terminated');
    const summary: RunSummary = {
      status,
      exitCode: status === 'completed' ? 0 : 1,
      resumeOffset,
      processedThisRun: this.processedThisRun,
      lastProcessedIndex: this.lastProcessedIndex,
      counters: snapshotCounters(this.counters),
    };
    progress.reportSummary(summary);

    if (crash !== undefined) {
      throw crash;
    }

    return summary;
  }

  /**
   * Opens the sink and reconciles it with the checkpoint. Returns the resume
   * offset, which is always the sink's row count.
   */
  private initialize(): number {
    const { sink, client } = this.deps;
    const rows = sink.open(client.signalNames);
    const checkpoint = this.loadCheckpoint();

    this.lastProcessedIndex = rows - 1;
    this.inheritedSeconds = checkpoint?.elapsedRunSeconds ?? 0;

    if (!checkpoint) {
      if (rows > 0) {
        log.info(`No usable checkpoint; recounting ${rows} rows from ${sink.path}`);
      }
      this.counters = sink.tallyOutcomes();
      return rows;
    }

    const claimed = checkpoint.lastProcessedIndex + 1;
    const base = checkpoint.counters;

    if (claimed > rows) {
      log.warn(
        `Checkpoint claims ${claimed} processed but output holds ${rows} rows; resuming from the output`,
      );
      this.counters = sink.tallyOutcomes(base);
    } else if (claimed < rows || base.totalProcessed !== rows) {
      log.info(`Checkpoint is behind the output (${claimed} < ${rows}); recounting from the output`);
      this.counters = sink.tallyOutcomes(base);
    } else {
      this.counters = snapshotCounters(base);
    }

    return rows;
  }

  private loadCheckpoint(): CheckpointState | null {
    try {
      return this.deps.store.load();
    } catch (error) {
      if (error instanceof CorruptCheckpointError) {
        log.warn(`Ignoring corrupt checkpoint: ${error.message}`);
        return null;
      }
      throw error;
    }
  }

  private async processFrom(
    inputs: readonly InputEntry[],
    offset: number,
    progress: ProgressReporter,
  ): Promise<StopReason> {
    for (let position = offset; position < inputs.length; position++) {
      if (this.shutdownRequested) {
        return 'interrupted';
      }

      const entry = inputs[position];
      if (!entry) {
        break;
      }

      await this.deps.rateLimiter.acquire();

      const result = await this.processEntry(entry);
      if (result === 'session-exhausted') {
        return 'session-exhausted';
      }
      if (result === 'interrupted') {
        return 'interrupted';
      }

      const committed = entry.index + 1;

      if (committed % this.config.checkpointInterval === 0) {
        this.transition('checkpointing');
        this.saveCheckpoint(null);
        this.transition('processing');
      }

      if (this.config.sessionRefreshInterval > 0 && committed % this.config.sessionRefreshInterval === 0) {
        const refreshed = await this.refreshProactively();
        if (refreshed !== 'recovered') {
          return refreshed === 'exhausted' ? 'session-exhausted' : 'interrupted';
        }
      }

      progress.maybeReport(entry.index, this.counters);
    }

    return 'completed';
  }

  private async processEntry(entry: InputEntry): Promise<EntryResult> {
    const startedAt = this.now();
    let retriesAfterLoss = 0;

    for (;;) {
      const attempt = await this.attemptRender(entry);

      if (attempt.outcome !== 'session-error') {
        this.sessionRecoveryAttempts = 0;
        this.commit(entry, attempt, startedAt);
        return 'committed';
      }

      log.warn(`Session lost at index ${entry.index} (${entry.url}): ${attempt.message}`);

      const recovery = await this.recoverSession();
      if (recovery === 'exhausted') {
        return 'session-exhausted';
      }
      if (recovery === 'interrupted') {
        return 'interrupted';
      }

      if (retriesAfterLoss >= this.config.maxUrlRetriesAfterSessionLoss) {
        this.commit(entry, attempt, startedAt);
        return 'committed';
      }

      retriesAfterLoss += 1;
      log.info(`Retrying index ${entry.index} on the new session (${retriesAfterLoss}/${this.config.maxUrlRetriesAfterSessionLoss})`);
    }
  }

  private async attemptRender(entry: InputEntry): Promise<RenderAttempt> {
    try {
      const signals = await this.deps.client.render(entry.url, this.config.timeoutSeconds);
      return { outcome: 'success', signals, message: '' };
    } catch (error) {
      if (error instanceof RenderFailure) {
        return { outcome: error.kind, signals: NO_SIGNALS, message: error.message };
      }

      log.error(`Unexpected render failure at index ${entry.index}:`, error);
      return { outcome: 'render-error', signals: NO_SIGNALS, message: errorMessage(error) };
    }
  }

  private commit(entry: InputEntry, attempt: RenderAttempt, startedAt: number): void {
    const elapsedSeconds = Math.max(0, (this.now() - startedAt) / 1000);

    this.deps.sink.append({
      index: entry.index,
      url: entry.url,
      label: entry.label,
      outcome: attempt.outcome,
      signals: attempt.signals,
      elapsedSeconds,
    });

    recordOutcome(this.counters, attempt.outcome);
    this.metrics.recordCommit(elapsedSeconds);
    this.lastProcessedIndex = entry.index;
    this.processedThisRun += 1;

    if (attempt.outcome === 'success') {
      log.debug(`#${entry.index} ${entry.url} ok in ${elapsedSeconds.toFixed(2)}s`);
      return;
    }

    log.warn(`#${entry.index} ${entry.url} ${attempt.outcome}: ${attempt.message}`);
    this.deps.failureLog?.write({
      index: entry.index,
      url: entry.url,
      outcome: attempt.outcome,
      message: attempt.message,
    });
  }

  /**
   * Backs off and replaces the session until one starts or the policy runs
   * out. Attempts accumulate until a render completes without session loss.
   */
  private async recoverSession(): Promise<RecoveryResult> {
    const { policy, client } = this.deps;

    for (;;) {
      const decision = policy.decide(this.sessionRecoveryAttempts);
      if (!decision.shouldRetry) {
        log.error(`Session recovery exhausted after ${this.sessionRecoveryAttempts} attempts`);
        return 'exhausted';
      }

      this.sessionRecoveryAttempts = decision.attempt;
      log.warn(
        `Session recovery attempt ${decision.attempt}/${policy.maxAttempts} in ${(decision.delayMs / 1000).toFixed(1)}s`,
      );

      await this.sleep(decision.delayMs, this.shutdown.signal);
      if (this.shutdownRequested) {
        return 'interrupted';
      }

      try {
        await client.refreshSession();
        this.counters.sessionRecoveries += 1;
        log.info(`Session re-established on attempt ${decision.attempt}`);
        return 'recovered';
      } catch (error) {
        if (!(error instanceof RenderFailure)) {
          throw error;
        }
        log.warn(`Session recovery attempt ${decision.attempt} failed: ${error.message}`);
      }
    }
  }

  private async refreshProactively(): Promise<RecoveryResult> {
    try {
      await this.deps.client.refreshSession();
      this.counters.sessionRefreshes += 1;
      log.debug(`Session refreshed after index ${this.lastProcessedIndex}`);
      return 'recovered';
    } catch (error) {
      if (!(error instanceof RenderFailure)) {
        throw error;
      }
      log.warn(`Proactive session refresh failed: ${error.message}`);
      return this.recoverSession();
    }
  }

  /**
   * Flushes the sink, then records progress. The checkpoint never names an
   * index whose row might not be on disk.
   */
  private saveCheckpoint(stopReason: StopReason | null): void {
    const { sink, store } = this.deps;

    try {
      sink.flush();
    } catch (error) {
      log.error(`Could not flush ${sink.path}; skipping checkpoint:`, error);
      return;
    }

    const state: CheckpointState = {
      lastProcessedIndex: this.lastProcessedIndex,
      counters: snapshotCounters(this.counters),
      savedAt: new Date().toISOString(),
      elapsedRunSeconds: this.inheritedSeconds + this.metrics.elapsedSeconds,
      stopReason,
      totalInputs: this.totalInputs,
    };

    try {
      store.save(state);
      log.debug(`Checkpoint saved at index ${this.lastProcessedIndex}`);
    } catch (error) {
      if (!(error instanceof CheckpointSaveError)) {
        throw error;
      }
      log.error(`Checkpoint not saved: ${error.message}`);
    }
  }

  private async closeResources(): Promise<void> {
    try {
      this.deps.sink.close();
    } catch (error) {
      log.error(`Could not close ${this.deps.sink.path}:`, error);
    }

    try {
      await this.deps.client.close();
    } catch (error) {
      log.warn(`Could not close the render session: ${errorMessage(error)}`);
    }
  }

  private transition(next: DriverState): void {
    log.trace(`${this.state} -> ${next}`);
    this.state = next;
  }
}

export { DEFAULT_CONFIG as DEFAULT_DRIVER_CONFIG };
