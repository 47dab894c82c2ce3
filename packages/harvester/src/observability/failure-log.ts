import { appendFileSync, existsSync, mkdirSync, readFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { createLogger } from '@workspace/logger';
import { errorMessage } from '../errors.js';
import { formatJson } from '../utils/json.js';

const log = createLogger('failure-log');

const failureEntrySchema = z.object({
  index: z.number().int().nonnegative(),
  url: z.string(),
  outcome: z.enum(['timeout', 'render-error', 'session-error', 'network-error']),
  message: z.string(),
  timestamp: z.string(),
});

type FailureEntry = z.infer<typeof failureEntrySchema>;

/**
 * JSON Lines record of every failed URL. Best effort: a write that fails is
 * logged and the run carries on, since the result row is the durable record.
 */
export class FailureLog {
  private readonly filePath: string;
  private writeCount: number;

  constructor(filePath: string) {
    this.filePath = filePath;
    this.writeCount = 0;
  }

  get path(): string {
    return this.filePath;
  }

  get written(): number {
    return this.writeCount;
  }

  write(entry: Omit<FailureEntry, 'timestamp'>, timestamp = new Date()): boolean {
    const line: FailureEntry = { ...entry, timestamp: timestamp.toISOString() };

    try {
      const dir = dirname(this.filePath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }

      appendFileSync(this.filePath, `${formatJson(line)}\n`, 'utf-8');
      this.writeCount += 1;
      return true;
    } catch (error) {
      log.warn(`Could not record failure for index ${entry.index}: ${errorMessage(error)}`);
      return false;
    }
  }

  /** Entries written so far, skipping lines that do not parse. */
  read(): FailureEntry[] {
    if (!existsSync(this.filePath)) {
      return [];
    }

    const entries: FailureEntry[] = [];
    for (const line of readFileSync(this.filePath, 'utf-8').split('\n')) {
      if (line.trim() === '') {
        continue;
      }
      try {
        const parsed = failureEntrySchema.safeParse(JSON.parse(line));
        if (parsed.success) {
          entries.push(parsed.data);
        }
      } catch {
        log.debug(`Skipping unreadable failure log line in ${this.filePath}`);
      }
    }
    return entries;
  }
}

export type { FailureEntry };
