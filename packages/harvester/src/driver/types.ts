import type { CheckpointStore } from '../pipeline/checkpoint-store.js';
import type { ResultSink } from '../pipeline/result-sink.js';
import type { RunCounters, StopReason } from '../pipeline/types.js';
import type { FailureLog } from '../observability/failure-log.js';
import type { RunMetrics } from '../observability/run-metrics.js';
import type { RateLimiter } from '../pacing/rate-limiter.js';
import type { SessionRecoveryPolicy } from '../recovery/session-recovery.js';
import type { RenderClient } from '../render/types.js';

type DriverState =
  | 'initializing'
  | 'resuming'
  | 'processing'
  | 'checkpointing'
  | 'shutting-down'
  | 'terminated';

type DriverConfig = {
  timeoutSeconds: number;
  /** Save a checkpoint after every N committed indices. */
  checkpointInterval: number;
  /** Replace the session after every N committed indices; 0 disables. */
  sessionRefreshInterval: number;
  /** Progress line every N committed indices; 0 disables. */
  progressInterval: number;
  maxUrlRetriesAfterSessionLoss: number;
  /** Install SIGINT / SIGTERM handlers for the duration of `run`. */
  handleSignals: boolean;
};

type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

type DriverDeps = {
  sink: ResultSink;
  store: CheckpointStore;
  client: RenderClient;
  policy: SessionRecoveryPolicy;
  rateLimiter: RateLimiter;
  failureLog?: FailureLog;
  metrics?: RunMetrics;
  /** Backoff sleep; must resolve early once `signal` aborts. */
  sleep?: Sleep;
  now?: () => number;
};

type RunSummary = {
  status: StopReason;
  exitCode: 0 | 1;
  resumeOffset: number;
  processedThisRun: number;
  lastProcessedIndex: number;
  counters: RunCounters;
};

export type { DriverState, DriverConfig, DriverDeps, RunSummary, Sleep };
