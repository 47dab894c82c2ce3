type SessionRecoveryConfig = {
  maxAttempts: number;
  initialDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
};

type RecoveryDecision = {
  shouldRetry: boolean;
  attempt: number;
  delayMs: number;
};

const DEFAULT_RECOVERY_CONFIG: SessionRecoveryConfig = {
  maxAttempts: 10,
  initialDelayMs: 5_000,
  multiplier: 2,
  maxDelayMs: 120_000,
};

/**
 * Bounded, escalating backoff for re-establishing a lost automation session.
 * Attempts are counted across consecutive session losses, so a dead endpoint
 * stops the run after `maxAttempts` no matter how many URLs hit it.
 */
export class SessionRecoveryPolicy {
  private readonly config: SessionRecoveryConfig;

  constructor(config?: Partial<SessionRecoveryConfig>) {
    this.config = { ...DEFAULT_RECOVERY_CONFIG, ...config };
  }

  get maxAttempts(): number {
    return this.config.maxAttempts;
  }

  delayFor(attempt: number): number {
    const exponent = Math.max(0, attempt - 1);
    const delay = this.config.initialDelayMs * Math.pow(this.config.multiplier, exponent);
    return Math.min(delay, this.config.maxDelayMs);
  }

  /**
   * @param attemptsSoFar - recovery attempts already spent since the last
   * render that did not lose the session
   */
  decide(attemptsSoFar: number): RecoveryDecision {
    const attempt = attemptsSoFar + 1;

    if (attempt > this.config.maxAttempts) {
      return { shouldRetry: false, attempt: attemptsSoFar, delayMs: 0 };
    }

    return { shouldRetry: true, attempt, delayMs: this.delayFor(attempt) };
  }

  schedule(): number[] {
    return Array.from({ length: this.config.maxAttempts }, (_, index) =>
      this.delayFor(index + 1),
    );
  }
}

export { DEFAULT_RECOVERY_CONFIG };
export type { SessionRecoveryConfig, RecoveryDecision };
