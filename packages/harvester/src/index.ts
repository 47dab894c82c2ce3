export { ExtractionDriver, DEFAULT_DRIVER_CONFIG } from './driver/extraction-driver.js';
export type { DriverConfig, DriverDeps, DriverState, RunSummary } from './driver/types.js';
export { CheckpointStore } from './pipeline/checkpoint-store.js';
export { ResultSink, BASE_COLUMNS, type SinkRow, type SinkSummary } from './pipeline/result-sink.js';
export {
  createRunCounters,
  recordOutcome,
  snapshotCounters,
  successRate,
} from './pipeline/run-counters.js';
export {
  OUTCOMES,
  type CheckpointState,
  type InputEntry,
  type Outcome,
  type ResultRecord,
  type RunCounters,
  type SignalBundle,
  type SignalValue,
  type StopReason,
} from './pipeline/types.js';
export { loadInputList, type InputListOptions } from './input/input-list.js';
export { RenderClient } from './render/types.js';
export {
  WebDriverRenderClient,
  type WebDriverClientConfig,
  type EndpointStatus,
} from './render/webdriver-client.js';
export { SIGNAL_NAMES, SUSPICIOUS_KEYWORDS } from './render/signal-script.js';
export { createTlsProbe, type TlsProbe, type TlsVerdict } from './render/tls-probe.js';
export { SessionRecoveryPolicy, type SessionRecoveryConfig } from './recovery/session-recovery.js';
export { RateLimiter } from './pacing/rate-limiter.js';
export { FailureLog, type FailureEntry } from './observability/failure-log.js';
export { resolveRunConfig, type RunConfig } from './config/run-config.js';
export {
  RenderFailure,
  CorruptCheckpointError,
  CheckpointSaveError,
  ConfigError,
  InputLoadError,
  SinkOrderError,
} from './errors.js';
