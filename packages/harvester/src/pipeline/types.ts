const OUTCOMES = [
  'success',
  'timeout',
  'render-error',
  'session-error',
  'network-error',
] as const;

type Outcome = (typeof OUTCOMES)[number];

type SignalValue = number | boolean;

/**
 * Page signals keyed by name, in the order the render client declares them.
 * The pipeline stores them without interpreting any key.
 */
type SignalBundle = Readonly<Record<string, SignalValue>>;

type InputEntry = {
  readonly index: number;
  readonly url: string;
  readonly label: number;
};

type ResultRecord = {
  readonly index: number;
  readonly url: string;
  readonly label: number;
  readonly outcome: Outcome;
  readonly signals: SignalBundle;
  readonly elapsedSeconds: number;
};

type RunCounters = {
  totalProcessed: number;
  succeeded: number;
  failed: number;
  byOutcome: Record<Outcome, number>;
  sessionRecoveries: number;
  sessionRefreshes: number;
};

type StopReason = 'completed' | 'interrupted' | 'session-exhausted' | 'crashed';

type CheckpointState = {
  lastProcessedIndex: number;
  counters: RunCounters;
  savedAt: string;
  elapsedRunSeconds: number;
  stopReason: StopReason | null;
  totalInputs: number;
};

export { OUTCOMES };
export type {
  Outcome,
  SignalValue,
  SignalBundle,
  InputEntry,
  ResultRecord,
  RunCounters,
  StopReason,
  CheckpointState,
};
