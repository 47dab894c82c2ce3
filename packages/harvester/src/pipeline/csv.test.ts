import { describe, it, expect } from 'vitest';
import { formatCsvRow, isBlankRow, parseCsv, scanCsv } from './csv.js';

describe('csv', () => {
  it('leaves plain fields unquoted', () => {
    expect(formatCsvRow(['0', 'https://example.com/', 'success'])).toBe(
      '0,https://example.com/,success',
    );
  });

  it('quotes fields with commas, quotes and line breaks', () => {
    expect(formatCsvRow(['a,b', 'say "hi"', 'line\nbreak'])).toBe(
      '"a,b","say ""hi""","line\nbreak"',
    );
  });

  it('parses quoted fields back to their values', () => {
    const rows = parseCsv('url,label\n"https://a.test/?q=1,2",1\n"x ""y""",0\n');

    expect(rows).toEqual([
      ['url', 'label'],
      ['https://a.test/?q=1,2', '1'],
      ['x "y"', '0'],
    ]);
  });

  it('handles CRLF line endings and a missing final newline', () => {
    expect(parseCsv('a,b\r\n1,2\r\n3,4')).toEqual([
      ['a', 'b'],
      ['1', '2'],
      ['3', '4'],
    ]);
  });

  it('keeps line breaks inside quoted fields', () => {
    expect(parseCsv('"multi\nline",2\n')).toEqual([['multi\nline', '2']]);
  });

  it('keeps empty trailing fields', () => {
    expect(parseCsv('1,,\n')).toEqual([['1', '', '']]);
  });

  it('returns no rows for empty text', () => {
    expect(parseCsv('')).toEqual([]);
  });

  it('scanCsv reports where the complete rows end', () => {
    const rows: string[][] = [];
    const text = 'a,b\n1,2\n3,"x\n';

    const scan = scanCsv(text, (row) => rows.push(row));

    expect(rows).toEqual([
      ['a', 'b'],
      ['1', '2'],
    ]);
    expect(scan.completeLength).toBe(8);
    expect(scan.partial).toEqual(['3', 'x\n']);
  });

  it('scanCsv has no partial row after a final line break', () => {
    const scan = scanCsv('a\n"b\nc"\n', () => undefined);

    expect(scan.completeLength).toBe(8);
    expect(scan.partial).toBeUndefined();
  });

  it('detects blank rows', () => {
    expect(isBlankRow([''])).toBe(true);
    expect(isBlankRow([' ', ''])).toBe(true);
    expect(isBlankRow(['', 'x'])).toBe(false);
  });
});
