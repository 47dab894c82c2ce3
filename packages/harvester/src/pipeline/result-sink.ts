import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  truncateSync,
  writeSync,
} from 'node:fs';
import { dirname } from 'node:path';
import { createLogger } from '@workspace/logger';
import { SinkOrderError } from '../errors.js';
import { formatCsvRow, scanCsv } from './csv.js';
import { createRunCounters, isOutcome, recordOutcome, snapshotCounters } from './run-counters.js';
import type { ResultRecord, RunCounters, SignalValue } from './types.js';

const BASE_COLUMNS = ['index', 'url', 'label', 'outcome', 'elapsed_seconds'] as const;
const OUTCOME_COLUMN = BASE_COLUMNS.indexOf('outcome');

const log = createLogger('sink');

type SinkRow = Record<string, string>;

type CounterBase = Pick<RunCounters, 'sessionRecoveries' | 'sessionRefreshes'>;

/** What one pass over the file finds. Only rows ended by a line break count. */
type SinkScan = {
  header: string[] | undefined;
  rowCount: number;
  tally: RunCounters;
  lastValues: string[] | undefined;
  completeBytes: number;
  totalBytes: number;
};

type SinkSummary = {
  rows: number;
  counters: RunCounters;
  lastRow: SinkRow | undefined;
};

function toSinkRow(header: readonly string[], values: readonly string[]): SinkRow {
  const entry: SinkRow = {};
  header.forEach((column, position) => {
    entry[column] = values[position] ?? '';
  });
  return entry;
}

function withBase(tally: RunCounters, base: CounterBase | undefined): RunCounters {
  return {
    ...snapshotCounters(tally),
    sessionRecoveries: base?.sessionRecoveries ?? 0,
    sessionRefreshes: base?.sessionRefreshes ?? 0,
  };
}

function formatSignal(value: SignalValue | undefined): string {
  if (value === undefined) {
    return '';
  }

  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }

  return String(value);
}

/**
 * Append-only CSV of result records. The header is written once when the file
 * is created; rows are appended in contiguous index order starting at 0.
 */
export class ResultSink {
  private readonly outputPath: string;
  private fd: number | undefined;
  private columns: string[];
  private rowCount: number;
  private tally: RunCounters;
  private lastValues: string[] | undefined;

  constructor(outputPath: string) {
    this.outputPath = outputPath;
    this.fd = undefined;
    this.columns = [];
    this.rowCount = 0;
    this.tally = createRunCounters();
    this.lastValues = undefined;
  }

  get path(): string {
    return this.outputPath;
  }

  get header(): readonly string[] {
    return this.columns;
  }

  get signalColumns(): readonly string[] {
    return this.columns.slice(BASE_COLUMNS.length);
  }

  /**
   * Opens for append and returns the number of complete rows already present.
   * An existing header is kept as-is; a torn final row left by a crash is cut.
   */
  open(signalNames: readonly string[]): number {
    if (this.fd !== undefined) {
      return this.rowCount;
    }

    const dir = dirname(this.outputPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    const scan = this.scan();
    this.repairTornTail(scan);
    const expected = [...BASE_COLUMNS, ...signalNames];

    if (!scan.header) {
      this.fd = openSync(this.outputPath, 'a');
      writeSync(this.fd, formatCsvRow(expected) + '\n');
      this.columns = expected;
      this.rowCount = 0;
      this.tally = createRunCounters();
      this.lastValues = undefined;
      return 0;
    }

    const header = scan.header;
    this.assertResultHeader(header);
    this.assertContiguous(scan);

    if (header.join(',') !== expected.join(',')) {
      log.warn(
        'Existing output header differs from the client signal set; keeping the file header',
        { file: header.slice(BASE_COLUMNS.length), client: signalNames },
      );
    }

    this.columns = header;
    this.rowCount = scan.rowCount;
    this.tally = scan.tally;
    this.lastValues = scan.lastValues;
    this.fd = openSync(this.outputPath, 'a');
    return this.rowCount;
  }

  append(record: ResultRecord): void {
    if (this.fd === undefined) {
      throw new Error(`Result sink is not open: ${this.outputPath}`);
    }

    if (record.index !== this.rowCount) {
      throw new SinkOrderError(this.rowCount, record.index);
    }

    const values = [
      String(record.index),
      record.url,
      String(record.label),
      record.outcome,
      String(Math.round(record.elapsedSeconds * 1000) / 1000),
      ...this.signalColumns.map((name) => formatSignal(record.signals[name])),
    ];

    writeSync(this.fd, formatCsvRow(values) + '\n');
    this.rowCount += 1;
    this.lastValues = values;
    recordOutcome(this.tally, record.outcome);
  }

  /**
   * Forces appended rows to the storage device. Must run before a checkpoint
   * that refers to those rows is saved.
   */
  flush(): void {
    if (this.fd !== undefined) {
      fsyncSync(this.fd);
    }
  }

  /** Complete rows: appended ones while open, newline-terminated ones on disk otherwise. */
  countRows(): number {
    return this.summarize().rows;
  }

  /**
   * Counters rebuilt from the `outcome` column. The session counters cannot be
   * recovered from rows and come from `base`.
   */
  tallyOutcomes(base?: CounterBase): RunCounters {
    return this.summarize(base).counters;
  }

  lastRow(): SinkRow | undefined {
    return this.summarize().lastRow;
  }

  /** Row count, outcome tally and last row; reads the file at most once. */
  summarize(base?: CounterBase): SinkSummary {
    if (this.fd !== undefined) {
      return {
        rows: this.rowCount,
        counters: withBase(this.tally, base),
        lastRow: this.lastValues ? toSinkRow(this.columns, this.lastValues) : undefined,
      };
    }

    const scan = this.scan();
    return {
      rows: scan.rowCount,
      counters: withBase(scan.tally, base),
      lastRow: scan.header && scan.lastValues ? toSinkRow(scan.header, scan.lastValues) : undefined,
    };
  }

  readDataRows(): SinkRow[] {
    const rows: SinkRow[] = [];
    let header: string[] | undefined;

    this.readComplete((values) => {
      if (!header) {
        header = values;
        return;
      }
      rows.push(toSinkRow(header, values));
    });

    return rows;
  }

  close(): void {
    if (this.fd === undefined) {
      return;
    }

    fsyncSync(this.fd);
    closeSync(this.fd);
    this.fd = undefined;
  }

  private scan(): SinkScan {
    const scan: SinkScan = {
      header: undefined,
      rowCount: 0,
      tally: createRunCounters(),
      lastValues: undefined,
      completeBytes: 0,
      totalBytes: 0,
    };

    const sizes = this.readComplete((values) => {
      if (!scan.header) {
        scan.header = values;
        return;
      }

      scan.rowCount += 1;
      scan.lastValues = values;
      const outcome = values[OUTCOME_COLUMN] ?? '';
      if (isOutcome(outcome)) {
        recordOutcome(scan.tally, outcome);
      }
    });

    scan.completeBytes = sizes.completeBytes;
    scan.totalBytes = sizes.totalBytes;
    return scan;
  }

  /** Streams the newline-terminated rows, header first. */
  private readComplete(onRow: (values: string[]) => void): {
    completeBytes: number;
    totalBytes: number;
  } {
    if (!existsSync(this.outputPath)) {
      return { completeBytes: 0, totalBytes: 0 };
    }

    const content = readFileSync(this.outputPath);
    const text = content.toString('utf-8');
    const { completeLength } = scanCsv(text, onRow);

    return {
      completeBytes:
        completeLength === text.length
          ? content.length
          : Buffer.byteLength(text.slice(0, completeLength), 'utf-8'),
      totalBytes: content.length,
    };
  }

  private repairTornTail(scan: SinkScan): void {
    if (scan.completeBytes === scan.totalBytes) {
      return;
    }

    log.warn('Output ends with a partial row; truncating it', {
      file: this.outputPath,
      droppedBytes: scan.totalBytes - scan.completeBytes,
    });
    truncateSync(this.outputPath, scan.completeBytes);
  }

  private assertResultHeader(header: readonly string[]): void {
    const matches = BASE_COLUMNS.every((column, position) => header[position] === column);
    if (!matches) {
      throw new Error(
        `${this.outputPath} is not a result file: header starts with "${header.slice(0, BASE_COLUMNS.length).join(',')}"`,
      );
    }
  }

  private assertContiguous(scan: SinkScan): void {
    const last = scan.lastValues;
    if (!last) {
      return;
    }

    if (Number(last[0]) !== scan.rowCount - 1) {
      throw new Error(
        `${this.outputPath} has ${scan.rowCount} rows but its last row is index ${last[0] ?? ''}`,
      );
    }
  }
}

export { BASE_COLUMNS };
export type { SinkRow, SinkSummary };
