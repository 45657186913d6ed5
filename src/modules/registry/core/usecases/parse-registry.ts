import { err, ok, type Result } from 'neverthrow';

import { createRowError, type RowError } from '../../../../common/types/errors.js';
import { parseCalendarDate, type IsoDate } from '../../../../common/types/temporal.js';
import { parseCsvTable, type CsvRow } from '../../../../infra/csv/index.js';
import {
  REACTOR_TECHNOLOGIES,
  REQUIRED_REGISTRY_COLUMNS,
  type LicenseDates,
  type ReactorTechnology,
  type ReactorUnit,
  type RegistryLoadResult,
} from '../types.js';

import type { RegistryLoadError } from '../errors.js';

const DOCKET_RE = /^05[02]00\d{3}$/;
const NUMBER_RE = /^[-+]?(\d+(\.\d*)?|\.\d+)$/;

const DATE_COLUMNS: Record<keyof LicenseDates, string> = {
  constructionPermit: 'construction_permit',
  operatingLicense: 'operating_license',
  commercialOperation: 'commercial_operation',
  licenseRenewed: 'license_renewed',
  subsequentRenewal: 'subsequent_renewal',
  licenseExpires: 'license_expires',
};

const isTechnology = (value: string): value is ReactorTechnology =>
  REACTOR_TECHNOLOGIES.some((technology) => technology === value);

/**
 * Collects field-level problems for one row while the row is being mapped.
 */
class RowReader {
  readonly errors: RowError[] = [];

  constructor(private readonly row: CsvRow) {}

  text(column: string): string {
    return this.row.values[column] ?? '';
  }

  optionalText(column: string): string | null {
    const value = this.text(column);
    return value === '' ? null : value;
  }

  required(column: string): string {
    const value = this.text(column);
    if (value === '') {
      this.fail(column, `Missing required field '${column}'`);
    }
    return value;
  }

  number(column: string, range?: { min: number; max: number }): number | null {
    const raw = this.text(column);
    if (raw === '') {
      return null;
    }

    const value = Number(raw);
    if (!NUMBER_RE.test(raw) || !Number.isFinite(value)) {
      this.fail(column, `Field '${column}' is not a number`, raw);
      return null;
    }

    if (range !== undefined && (value < range.min || value > range.max)) {
      this.fail(
        column,
        `Field '${column}' must be between ${String(range.min)} and ${String(range.max)}`,
        raw
      );
      return null;
    }

    return value;
  }

  date(column: string): IsoDate | null {
    const raw = this.text(column);
    if (raw === '') {
      return null;
    }

    const parsed = parseCalendarDate(raw);
    if (parsed === null) {
      this.fail(column, `Field '${column}' is not a valid date`, raw);
    }
    return parsed;
  }

  fail(field: string, message: string, value?: unknown): void {
    this.errors.push(createRowError(this.row.line, message, field, value));
  }
}

/**
 * Legacy exports sometimes drop the leading zero of the docket number.
 */
const normalizeDocket = (raw: string): string => (/^\d{7}$/.test(raw) ? `0${raw}` : raw);

const readCoordinate = (
  reader: RowReader,
  column: 'latitude' | 'longitude',
  limit: number
): number | null => {
  if (reader.text(column) === '') {
    reader.fail(column, `Missing required coordinate '${column}'`);
    return null;
  }
  return reader.number(column, { min: -limit, max: limit });
};

const parseRow = (row: CsvRow): Result<ReactorUnit, RowError[]> => {
  const reader = new RowReader(row);

  const name = reader.required('name');

  const rawDocket = reader.required('docket_number');
  const docketNumber = normalizeDocket(rawDocket);
  if (rawDocket !== '' && !DOCKET_RE.test(docketNumber)) {
    reader.fail(
      'docket_number',
      `Docket number must be 05000XXX or 05200XXX, got '${rawDocket}'`,
      rawDocket
    );
  }

  const rawTechnology = reader.required('reactor_type').toUpperCase();
  if (rawTechnology !== '' && !isTechnology(rawTechnology)) {
    reader.fail(
      'reactor_type',
      `Unrecognized reactor technology '${reader.text('reactor_type')}'`,
      reader.text('reactor_type')
    );
  }

  const latitude = readCoordinate(reader, 'latitude', 90);
  const longitude = readCoordinate(reader, 'longitude', 180);

  const nrcRegion = reader.number('nrc_region', { min: 1, max: 4 });
  if (nrcRegion !== null && !Number.isInteger(nrcRegion)) {
    reader.fail('nrc_region', 'Field \'nrc_region\' must be a whole number', nrcRegion);
  }

  const electricalMwe = reader.number('capacity_mwe', { min: 0, max: Number.MAX_SAFE_INTEGER });
  const thermalMwt = reader.number('licensed_mwt', { min: 0, max: Number.MAX_SAFE_INTEGER });

  const dates: LicenseDates = {
    constructionPermit: reader.date(DATE_COLUMNS.constructionPermit),
    operatingLicense: reader.date(DATE_COLUMNS.operatingLicense),
    commercialOperation: reader.date(DATE_COLUMNS.commercialOperation),
    licenseRenewed: reader.date(DATE_COLUMNS.licenseRenewed),
    subsequentRenewal: reader.date(DATE_COLUMNS.subsequentRenewal),
    licenseExpires: reader.date(DATE_COLUMNS.licenseExpires),
  };

  if (
    reader.errors.length > 0 ||
    latitude === null ||
    longitude === null ||
    !isTechnology(rawTechnology)
  ) {
    return err(reader.errors);
  }

  return ok({
    name,
    docketNumber,
    licenseNumber: reader.text('license_number'),
    location: reader.text('location'),
    coordinates: { latitude, longitude },
    nrcRegion,
    technology: rawTechnology,
    containmentType: reader.text('containment_type'),
    vendor: reader.text('nsss_supplier'),
    architectEngineer: reader.text('architect_engineer'),
    constructionFirm: reader.text('constructor'),
    operator: reader.text('licensee'),
    parentCompany: reader.text('parent_company'),
    parentWebsite: reader.text('parent_website'),
    capacity: { electricalMwe, thermalMwt },
    dates,
    referenceUrl: reader.optionalText('nrc_site_url'),
  });
};

/**
 * Validates registry rows. Invalid rows, duplicate dockets and duplicate names are
 * reported and excluded; the remaining rows are returned in file order.
 */
export const parseRegistryRows = (rows: readonly CsvRow[]): RegistryLoadResult => {
  const units: ReactorUnit[] = [];
  const rowErrors: RowError[] = [];
  const docketRows = new Map<string, number>();
  const nameRows = new Map<string, number>();

  for (const row of rows) {
    const parsed = parseRow(row);
    if (parsed.isErr()) {
      rowErrors.push(...parsed.error);
      continue;
    }

    const unit = parsed.value;

    const docketRow = docketRows.get(unit.docketNumber);
    if (docketRow !== undefined) {
      rowErrors.push(
        createRowError(
          row.line,
          `Duplicate docket number '${unit.docketNumber}' (first seen on row ${String(docketRow)})`,
          'docket_number',
          unit.docketNumber
        )
      );
      continue;
    }

    const nameRow = nameRows.get(unit.name);
    if (nameRow !== undefined) {
      rowErrors.push(
        createRowError(
          row.line,
          `Duplicate reactor name '${unit.name}' (first seen on row ${String(nameRow)})`,
          'name',
          unit.name
        )
      );
      continue;
    }

    docketRows.set(unit.docketNumber, row.line);
    nameRows.set(unit.name, row.line);
    units.push(unit);
  }

  return { units, rowErrors };
};

/**
 * Parses the registry table. Fails only when the table itself is unreadable.
 */
export const parseRegistryCsv = (
  csvText: string
): Result<RegistryLoadResult, RegistryLoadError> =>
  parseCsvTable(csvText, { requiredColumns: REQUIRED_REGISTRY_COLUMNS })
    .map((table) => parseRegistryRows(table.rows))
    .mapErr((error): RegistryLoadError => error);
