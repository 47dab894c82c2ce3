import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  rmSync,
  writeSync,
} from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { CheckpointSaveError, CorruptCheckpointError, errorMessage } from '../errors.js';
import { formatJson } from '../utils/json.js';
import type { CheckpointState } from './types.js';

const countSchema = z.number().int().min(0);

const checkpointSchema = z.object({
  lastProcessedIndex: z.number().int().min(-1),
  counters: z.object({
    totalProcessed: countSchema,
    succeeded: countSchema,
    failed: countSchema,
    byOutcome: z.object({
      success: countSchema,
      timeout: countSchema,
      'render-error': countSchema,
      'session-error': countSchema,
      'network-error': countSchema,
    }),
    sessionRecoveries: countSchema.default(0),
    sessionRefreshes: countSchema.default(0),
  }),
  savedAt: z.string().datetime(),
  elapsedRunSeconds: z.number().min(0),
  stopReason: z
    .enum(['completed', 'interrupted', 'session-exhausted', 'crashed'])
    .nullable()
    .default(null),
  totalInputs: countSchema.default(0),
});

export class CheckpointStore {
  private readonly statePath: string;
  private readonly tmpPath: string;

  constructor(statePath: string) {
    this.statePath = statePath;
    this.tmpPath = `${statePath}.tmp`;
  }

  get path(): string {
    return this.statePath;
  }

  /**
   * Returns null when no checkpoint was ever saved. A file that exists but
   * does not parse or validate raises CorruptCheckpointError.
   */
  load(): CheckpointState | null {
    if (!existsSync(this.statePath)) {
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.statePath, 'utf-8'));
    } catch (error) {
      throw new CorruptCheckpointError(
        `Checkpoint is not valid JSON: ${errorMessage(error)}`,
        this.statePath,
        error,
      );
    }

    const parsed = checkpointSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.join('.') || '(root)';
      throw new CorruptCheckpointError(
        `Checkpoint failed validation at ${where}: ${issue?.message ?? 'invalid'}`,
        this.statePath,
        parsed.error,
      );
    }

    return parsed.data;
  }

  /**
   * Writes the full state to a sibling temp file, syncs it, then renames it
   * over the checkpoint so readers only ever see a complete document.
   */
  save(state: CheckpointState): void {
    try {
      const dir = dirname(this.statePath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }

      const fd = openSync(this.tmpPath, 'w');
      try {
        writeSync(fd, formatJson(state, true));
        fsyncSync(fd);
      } finally {
        closeSync(fd);
      }

      renameSync(this.tmpPath, this.statePath);
    } catch (error) {
      throw new CheckpointSaveError(
        `Failed to save checkpoint: ${errorMessage(error)}`,
        this.statePath,
        error,
      );
    }
  }

  remove(): void {
    rmSync(this.statePath, { force: true });
    rmSync(this.tmpPath, { force: true });
  }
}
