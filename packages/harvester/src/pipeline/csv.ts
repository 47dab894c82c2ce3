const NEEDS_QUOTING = /[",\r\n]/;

export function formatCsvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) {
    return value;
  }

  return `"${value.replace(/"/g, '""')}"`;
}

export function formatCsvRow(values: readonly string[]): string {
  return values.map(formatCsvField).join(',');
}

type CsvScan = {
  /** Length of the prefix made of complete rows, each ended by a line break outside quotes. */
  completeLength: number;
  /** Fields of a final row with no line break after it, including one cut inside quotes. */
  partial: string[] | undefined;
};

/**
 * RFC 4180 reader that hands each complete row to `onRow` as it is read.
 * Quoted fields may contain commas, doubled quotes and line breaks.
 */
export function scanCsv(text: string, onRow: (row: string[]) => void): CsvScan {
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let completeLength = 0;
  let index = 0;

  while (index < text.length) {
    const char = text[index];

    if (inQuotes) {
      if (char === '"') {
        if (text[index + 1] === '"') {
          field += '"';
          index += 2;
          continue;
        }

        inQuotes = false;
        index += 1;
        continue;
      }

      field += char;
      index += 1;
      continue;
    }

    if (char === '"' && field.length === 0) {
      inQuotes = true;
      index += 1;
      continue;
    }

    if (char === ',') {
      row.push(field);
      field = '';
      index += 1;
      continue;
    }

    if (char === '\r' || char === '\n') {
      row.push(field);
      onRow(row);
      row = [];
      field = '';
      index += char === '\r' && text[index + 1] === '\n' ? 2 : 1;
      completeLength = index;
      continue;
    }

    field += char;
    index += 1;
  }

  const torn = inQuotes || field.length > 0 || row.length > 0;
  if (torn) {
    row.push(field);
  }

  return { completeLength, partial: torn ? row : undefined };
}

/** Reads every row, including a final one without a trailing line break. */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  const { partial } = scanCsv(text, (row) => rows.push(row));

  if (partial) {
    rows.push(partial);
  }

  return rows;
}

export function isBlankRow(row: readonly string[]): boolean {
  return row.every((value) => value.trim().length === 0);
}
