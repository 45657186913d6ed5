/**
 * Calendar-date helpers.
 *
 * Dates travel through the pipeline as ISO `YYYY-MM-DD` strings. Arithmetic is done on
 * day numbers (days since 1970-01-01, UTC) so that local time zones and DST never shift
 * a date.
 */

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ][0-9:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/;

const MS_PER_DAY = 86_400_000;

/** `YYYY-MM-DD` */
export type IsoDate = string;

/** `YYYY-MM` */
export type IsoMonth = string;

/**
 * Parses an ISO-8601 calendar date (optionally followed by a time part, which is
 * ignored) and returns the `YYYY-MM-DD` form, or null when the value is not a real
 * calendar date.
 */
export const parseIsoDate = (value: string): IsoDate | null => {
  const match = ISO_DATE_RE.exec(value.trim());
  if (match === null) {
    return null;
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return fromDayNumber(Math.round(date.getTime() / MS_PER_DAY));
};

/**
 * Day number of a valid `YYYY-MM-DD` date.
 */
export const toDayNumber = (date: IsoDate): number => {
  const [year, month, day] = date.split('-').map(Number);
  return Math.round(Date.UTC(year ?? 1970, (month ?? 1) - 1, day ?? 1) / MS_PER_DAY);
};

export const fromDayNumber = (dayNumber: number): IsoDate =>
  new Date(dayNumber * MS_PER_DAY).toISOString().slice(0, 10);

export const addDays = (date: IsoDate, days: number): IsoDate =>
  fromDayNumber(toDayNumber(date) + days);

/**
 * Whole calendar days from `from` to `to` (negative when `to` is earlier).
 */
export const daysBetween = (from: IsoDate, to: IsoDate): number =>
  toDayNumber(to) - toDayNumber(from);

export const monthOf = (date: IsoDate): IsoMonth => date.slice(0, 7);

const US_DATE_RE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s.*)?$/;

/**
 * Parses `M/D/YYYY` (optionally followed by a time part) into `YYYY-MM-DD`.
 */
export const parseUsDate = (value: string): IsoDate | null => {
  const match = US_DATE_RE.exec(value.trim());
  if (match === null) {
    return null;
  }

  const month = (match[1] ?? '').padStart(2, '0');
  const day = (match[2] ?? '').padStart(2, '0');
  return parseIsoDate(`${match[3] ?? ''}-${month}-${day}`);
};

/**
 * Accepts either ISO-8601 or US `M/D/YYYY` dates.
 */
export const parseCalendarDate = (value: string): IsoDate | null =>
  parseIsoDate(value) ?? parseUsDate(value);
