import { createLogger } from '@workspace/logger';
import { z } from 'zod';
import { resolveRunConfig } from '../config/run-config.js';
import { ConfigError, CorruptCheckpointError, InputLoadError } from '../errors.js';
import { loadInputList } from '../input/input-list.js';
import { CheckpointStore } from '../pipeline/checkpoint-store.js';
import { ResultSink, type SinkRow } from '../pipeline/result-sink.js';
import { successRate } from '../pipeline/run-counters.js';
import type { CheckpointState, RunCounters } from '../pipeline/types.js';
import { formatDuration } from '../observability/progress-reporter.js';
import { formatJson } from '../utils/json.js';
import { flagFromCli, pathFromCli } from './cli-args.js';

const log = createLogger('status');

export const statusArgsSchema = z.object({
  output: pathFromCli('output'),
  checkpoint: pathFromCli('checkpoint'),
  input: pathFromCli('input'),
  config: pathFromCli('config'),
  json: flagFromCli(),
  pretty: flagFromCli(),
});

type StatusArgs = z.infer<typeof statusArgsSchema>;

type StatusPaths = {
  outputPath: string;
  checkpointPath: string;
  inputPath?: string;
  limit?: number;
};

type StatusReport = {
  outputPath: string;
  rows: number;
  checkpoint: CheckpointState | null;
  checkpointProblem: string | null;
  counters: RunCounters;
  successRate: number;
  lastRow: SinkRow | null;
  totalInputs: number | null;
  remaining: number | null;
  complete: boolean;
};

/**
 * Progress as recorded on disk. Counts come from the output file; the
 * checkpoint contributes its metadata and session counters.
 */
export function buildStatusReport(paths: StatusPaths): StatusReport {
  let checkpoint: CheckpointState | null = null;
  let checkpointProblem: string | null = null;
  try {
    checkpoint = new CheckpointStore(paths.checkpointPath).load();
  } catch (error) {
    if (!(error instanceof CorruptCheckpointError)) {
      throw error;
    }
    checkpointProblem = error.message;
  }

  const { rows, counters, lastRow } = new ResultSink(paths.outputPath).summarize(
    checkpoint?.counters,
  );

  let totalInputs: number | null = null;
  if (paths.inputPath) {
    totalInputs = loadInputList(paths.inputPath, { limit: paths.limit }).length;
  } else if (checkpoint && checkpoint.totalInputs > 0) {
    totalInputs = checkpoint.totalInputs;
  }

  const remaining = totalInputs === null ? null : Math.max(0, totalInputs - rows);

  return {
    outputPath: paths.outputPath,
    rows,
    checkpoint,
    checkpointProblem,
    counters,
    successRate: successRate(counters),
    lastRow: lastRow ?? null,
    totalInputs,
    remaining,
    complete: remaining === 0,
  };
}

export function formatStatusReport(report: StatusReport): string[] {
  const { counters, checkpoint } = report;
  const lines = [`Output: ${report.outputPath} (${report.rows} rows)`];

  if (checkpoint) {
    lines.push(
      `Checkpoint: last index ${checkpoint.lastProcessedIndex}, saved ${checkpoint.savedAt}, stop reason ${checkpoint.stopReason ?? 'none'}, run time ${formatDuration(checkpoint.elapsedRunSeconds)}`,
    );
  } else if (report.checkpointProblem) {
    lines.push(`Checkpoint: unreadable (${report.checkpointProblem})`);
  } else {
    lines.push('Checkpoint: none');
  }

  lines.push(
    `Processed: ${counters.totalProcessed}, ✅ ${counters.succeeded} ❌ ${counters.failed} (${report.successRate.toFixed(1)}% success)`,
  );

  const byOutcome = Object.entries(counters.byOutcome)
    .filter(([, count]) => count > 0)
    .map(([outcome, count]) => `${outcome}=${count}`)
    .join(', ');
  lines.push(`Outcomes: ${byOutcome === '' ? 'none' : byOutcome}`);

  if (report.lastRow) {
    lines.push(
      `Last row: #${report.lastRow.index ?? '?'} ${report.lastRow.url ?? ''} ${report.lastRow.outcome ?? ''}`,
    );
  }

  if (report.totalInputs === null || report.remaining === null) {
    lines.push('Remaining: unknown (pass --input)');
  } else {
    lines.push(`Remaining: ${report.remaining} of ${report.totalInputs}`);
  }

  lines.push(report.complete ? 'State: complete' : `State: resumable at index ${report.rows}`);
  return lines;
}

export function runStatusAction(args: StatusArgs): number {
  let report: StatusReport;
  try {
    const config = resolveRunConfig({
      configFile: args.config,
      overrides: {
        outputPath: args.output,
        checkpointPath: args.checkpoint,
        inputPath: args.input,
      },
    });

    report = buildStatusReport({
      outputPath: config.outputPath,
      checkpointPath: config.checkpointPath,
      inputPath: args.input ?? (args.config ? config.inputPath : undefined),
      limit: config.limit,
    });
  } catch (error) {
    if (error instanceof ConfigError || error instanceof InputLoadError) {
      log.error(error.message);
      return 1;
    }
    throw error;
  }

  if (args.json) {
    console.log(formatJson(report, args.pretty));
  } else {
    console.log(formatStatusReport(report).join('\n'));
  }

  return 0;
}

export type { StatusArgs, StatusReport, StatusPaths };
