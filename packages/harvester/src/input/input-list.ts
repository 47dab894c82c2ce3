import { existsSync, readFileSync } from 'node:fs';
import { InputLoadError, errorMessage } from '../errors.js';
import { isBlankRow, parseCsv } from '../pipeline/csv.js';
import type { InputEntry } from '../pipeline/types.js';

type InputListOptions = {
  urlColumn: string;
  domainColumn: string;
  labelColumn: string;
  defaultLabel: number;
  limit?: number;
};

const DEFAULT_OPTIONS: InputListOptions = {
  urlColumn: 'url',
  domainColumn: 'domain',
  labelColumn: 'label',
  defaultLabel: 0,
};

function findColumn(header: readonly string[], name: string): number {
  const wanted = name.trim().toLowerCase();
  return header.findIndex((column) => column.trim().toLowerCase() === wanted);
}

function toUrl(value: string, fromDomain: boolean): string {
  const trimmed = value.trim();
  if (!fromDomain || trimmed.length === 0 || /^https?:\/\//i.test(trimmed)) {
    return trimmed;
  }

  return `https://${trimmed}`;
}

function toLabel(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim().length === 0) {
    return fallback;
  }

  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : fallback;
}

/**
 * Reads the whole input CSV into index-ordered entries. Column names are
 * matched case-insensitively; a domain column (Majestic Million style) is used
 * when there is no URL column.
 *
 * Blank rows are dropped before numbering, so `index` counts non-blank data
 * rows and stays contiguous with the output file's rows. Editing blank lines
 * in the input between runs therefore does not move any index.
 */
export function loadInputList(
  inputPath: string,
  options?: Partial<InputListOptions>,
): InputEntry[] {
  const config = { ...DEFAULT_OPTIONS, ...options };

  if (!existsSync(inputPath)) {
    throw new InputLoadError(`Input file not found: ${inputPath}`, inputPath);
  }

  let rows: string[][];
  try {
    rows = parseCsv(readFileSync(inputPath, 'utf-8').replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new InputLoadError(
      `Cannot read input file: ${errorMessage(error)}`,
      inputPath,
      error,
    );
  }

  const [header, ...dataRows] = rows;
  if (!header || isBlankRow(header)) {
    throw new InputLoadError(`Input file has no header row: ${inputPath}`, inputPath);
  }

  let urlPosition = findColumn(header, config.urlColumn);
  const fromDomain = urlPosition < 0;
  if (fromDomain) {
    urlPosition = findColumn(header, config.domainColumn);
  }

  if (urlPosition < 0) {
    throw new InputLoadError(
      `Input file needs a "${config.urlColumn}" or "${config.domainColumn}" column; found: ${header.join(', ')}`,
      inputPath,
    );
  }

  const labelPosition = findColumn(header, config.labelColumn);
  const entries: InputEntry[] = [];

  for (const row of dataRows) {
    if (config.limit !== undefined && entries.length >= config.limit) {
      break;
    }

    if (isBlankRow(row)) {
      continue;
    }

    entries.push({
      index: entries.length,
      url: toUrl(row[urlPosition] ?? '', fromDomain),
      label: toLabel(
        labelPosition >= 0 ? row[labelPosition] : undefined,
        config.defaultLabel,
      ),
    });
  }

  return entries;
}

export type { InputListOptions };
