import type { Outcome } from './pipeline/types.js';

type FailureKind = Exclude<Outcome, 'success'>;

/**
 * A render attempt that did not produce signals. `session-error` means the
 * automation session itself is unusable; every other kind is scoped to the URL.
 */
export class RenderFailure extends Error {
  constructor(
    message: string,
    public readonly kind: FailureKind,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'RenderFailure';
    Object.setPrototypeOf(this, RenderFailure.prototype);
  }

  get isSessionLoss(): boolean {
    return this.kind === 'session-error';
  }
}

export class CorruptCheckpointError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'CorruptCheckpointError';
    Object.setPrototypeOf(this, CorruptCheckpointError.prototype);
  }
}

export class CheckpointSaveError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'CheckpointSaveError';
    Object.setPrototypeOf(this, CheckpointSaveError.prototype);
  }
}

export class InputLoadError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'InputLoadError';
    Object.setPrototypeOf(this, InputLoadError.prototype);
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export class SinkOrderError extends Error {
  constructor(
    public readonly expectedIndex: number,
    public readonly receivedIndex: number,
  ) {
    super(
      `Result rows must be contiguous: expected index ${expectedIndex}, received ${receivedIndex}`,
    );
    this.name = 'SinkOrderError';
    Object.setPrototypeOf(this, SinkOrderError.prototype);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export type { FailureKind };
