/**
 * Tabular input reader backed by csv-parse.
 *
 * Produces header-keyed rows that remember their position in the file so that
 * validation errors can point at the offending row.
 */

import { parse } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

export interface CsvRow {
  /** 1-based file line the record starts on */
  readonly line: number;
  readonly values: Readonly<Record<string, string>>;
}

export interface CsvTable {
  readonly columns: readonly string[];
  readonly rows: readonly CsvRow[];
}

export type CsvTableError =
  | { type: 'CsvSyntaxError'; message: string }
  | { type: 'EmptyTable'; message: string }
  | { type: 'MissingColumns'; message: string; columns: string[] };

export interface ParseCsvTableOptions {
  requiredColumns?: readonly string[];
  delimiter?: string;
}

interface ParsedRecord {
  record: string[];
  info: { lines: number };
}

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every((cell: unknown) => typeof cell === 'string');

const isParsedRecord = (value: unknown): value is ParsedRecord =>
  typeof value === 'object' &&
  value !== null &&
  'record' in value &&
  isStringArray(value.record) &&
  'info' in value &&
  typeof value.info === 'object' &&
  value.info !== null &&
  'lines' in value.info &&
  typeof value.info.lines === 'number';

const isParsedRecords = (value: unknown): value is ParsedRecord[] =>
  Array.isArray(value) && value.every(isParsedRecord);

/**
 * `info.lines` is the line a record ends on; quoted fields may span lines.
 */
const startLine = (record: readonly string[], endLine: number): number =>
  endLine - record.reduce((breaks, cell) => breaks + (cell.match(/\n/g)?.length ?? 0), 0);

export const parseCsvTable = (
  text: string,
  options: ParseCsvTableOptions = {}
): Result<CsvTable, CsvTableError> => {
  let records: unknown;
  try {
    records = parse(text, {
      bom: true,
      trim: true,
      relax_column_count: true,
      skip_empty_lines: false,
      delimiter: options.delimiter ?? ',',
      info: true,
    });
  } catch (error) {
    return err({
      type: 'CsvSyntaxError',
      message: `Failed to parse CSV: ${(error as Error).message}`,
    });
  }

  if (!isParsedRecords(records)) {
    return err({ type: 'CsvSyntaxError', message: 'CSV parser returned an unexpected shape' });
  }

  const [first, ...body] = records;
  if (first === undefined || first.record.every((cell) => cell === '')) {
    return err({ type: 'EmptyTable', message: 'CSV input has no header row' });
  }

  const columns = first.record;
  const missing = (options.requiredColumns ?? []).filter((column) => !columns.includes(column));
  if (missing.length > 0) {
    return err({
      type: 'MissingColumns',
      message: `CSV header is missing required column(s): ${missing.join(', ')}`,
      columns: missing,
    });
  }

  const rows: CsvRow[] = [];
  for (const { record, info } of body) {
    if (record.every((cell) => cell === '')) {
      continue;
    }

    const values: Record<string, string> = {};
    columns.forEach((column, columnIndex) => {
      values[column] = record[columnIndex] ?? '';
    });

    rows.push({ line: startLine(record, info.lines), values });
  }

  return ok({ columns, rows });
};
