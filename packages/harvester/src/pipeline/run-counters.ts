import { OUTCOMES } from './types.js';
import type { Outcome, RunCounters } from './types.js';

function emptyByOutcome(): Record<Outcome, number> {
  return {
    success: 0,
    timeout: 0,
    'render-error': 0,
    'session-error': 0,
    'network-error': 0,
  };
}

export function createRunCounters(): RunCounters {
  return {
    totalProcessed: 0,
    succeeded: 0,
    failed: 0,
    byOutcome: emptyByOutcome(),
    sessionRecoveries: 0,
    sessionRefreshes: 0,
  };
}

export function recordOutcome(counters: RunCounters, outcome: Outcome): void {
  counters.totalProcessed += 1;
  counters.byOutcome[outcome] += 1;

  if (outcome === 'success') {
    counters.succeeded += 1;
  } else {
    counters.failed += 1;
  }
}

/**
 * Detached copy handed to the checkpoint store, so later increments never
 * reach a state that is being serialized.
 */
export function snapshotCounters(counters: RunCounters): RunCounters {
  return {
    ...counters,
    byOutcome: { ...counters.byOutcome },
  };
}

export function countersFromOutcomes(
  outcomes: Iterable<Outcome>,
  base?: Pick<RunCounters, 'sessionRecoveries' | 'sessionRefreshes'>,
): RunCounters {
  const counters = createRunCounters();
  for (const outcome of outcomes) {
    recordOutcome(counters, outcome);
  }

  counters.sessionRecoveries = base?.sessionRecoveries ?? 0;
  counters.sessionRefreshes = base?.sessionRefreshes ?? 0;
  return counters;
}

export function isOutcome(value: string): value is Outcome {
  return OUTCOMES.some((outcome) => outcome === value);
}

export function successRate(counters: RunCounters): number {
  if (counters.totalProcessed === 0) {
    return 0;
  }

  return (counters.succeeded / counters.totalProcessed) * 100;
}
