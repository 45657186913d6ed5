import { err, ok, type Result } from 'neverthrow';

import { createRowError, type RowError } from '../../../../common/types/errors.js';
import { parseIsoDate } from '../../../../common/types/temporal.js';
import { parseCsvTable, type CsvRow } from '../../../../infra/csv/index.js';
import {
  REQUIRED_POWER_COLUMNS,
  type DailyPowerRecord,
  type PowerFeedLoadResult,
} from '../types.js';

import type { PowerFeedError } from '../errors.js';

const POWER_RE = /^[-+]?(\d+(\.\d*)?|\.\d+)$/;

const parsePowerRow = (row: CsvRow): Result<DailyPowerRecord, RowError> => {
  const rawDate = row.values['Date'] ?? '';
  const unit = row.values['Unit'] ?? '';
  const rawPower = row.values['Power'] ?? '';

  const date = parseIsoDate(rawDate);
  if (date === null) {
    return err(createRowError(row.line, `Unparseable date '${rawDate}'`, 'Date', rawDate));
  }

  if (unit === '') {
    return err(createRowError(row.line, 'Missing unit name', 'Unit'));
  }

  if (rawPower === '') {
    return ok({ date, unit, power: null });
  }

  const power = Number(rawPower);
  if (!POWER_RE.test(rawPower) || !Number.isFinite(power)) {
    return err(
      createRowError(row.line, `Unparseable power value '${rawPower}'`, 'Power', rawPower)
    );
  }
  if (power < 0 || power > 100) {
    return err(
      createRowError(row.line, `Power value ${rawPower} is outside 0-100`, 'Power', rawPower)
    );
  }

  return ok({ date, unit, power });
};

export const parsePowerRows = (rows: readonly CsvRow[]): PowerFeedLoadResult => {
  const records: DailyPowerRecord[] = [];
  const rowErrors: RowError[] = [];

  for (const row of rows) {
    parsePowerRow(row).match(
      (record) => records.push(record),
      (error) => rowErrors.push(error)
    );
  }

  return { records, rowErrors };
};

/**
 * Parses the daily power table (`Date`, `Unit`, `Power`). Bad rows are reported and
 * skipped; only an unreadable table fails.
 */
export const parsePowerFeedCsv = (
  csvText: string
): Result<PowerFeedLoadResult, PowerFeedError> =>
  parseCsvTable(csvText, { requiredColumns: REQUIRED_POWER_COLUMNS })
    .map((table) => parsePowerRows(table.rows))
    .mapErr((error): PowerFeedError => error);

/**
 * Groups records by feed unit name, keeping feed order within each unit and the order
 * in which units first appear.
 */
export const groupRecordsByUnit = (
  records: readonly DailyPowerRecord[]
): Map<string, DailyPowerRecord[]> => {
  const grouped = new Map<string, DailyPowerRecord[]>();
  for (const record of records) {
    const existing = grouped.get(record.unit);
    if (existing === undefined) {
      grouped.set(record.unit, [record]);
    } else {
      existing.push(record);
    }
  }
  return grouped;
};

/**
 * Latest date in the feed, or null for an empty feed.
 */
export const latestFeedDate = (records: readonly DailyPowerRecord[]): string | null =>
  records.reduce<string | null>(
    (latest, record) => (latest === null || record.date > latest ? record.date : latest),
    null
  );
