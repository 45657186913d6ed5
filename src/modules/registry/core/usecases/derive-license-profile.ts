import { Decimal } from 'decimal.js';

import { daysBetween, type IsoDate } from '../../../../common/types/temporal.js';

import type { LicenseProfile, LicenseStatus, ReactorUnit } from '../types.js';

const TERM_YEARS: Record<LicenseStatus, number> = {
  original: 40,
  first_renewal: 60,
  subsequent_renewal: 80,
};

const DAYS_PER_YEAR = 365;

const licenseStatus = (unit: ReactorUnit): LicenseStatus => {
  if (unit.dates.subsequentRenewal !== null) return 'subsequent_renewal';
  if (unit.dates.licenseRenewed !== null) return 'first_renewal';
  return 'original';
};

const roundTenth = (value: Decimal): number =>
  value.toDecimalPlaces(1, Decimal.ROUND_HALF_UP).toNumber();

/**
 * License lifecycle relative to `asOf` (the data as-of date, so repeated runs over the
 * same inputs agree).
 */
export const deriveLicenseProfile = (unit: ReactorUnit, asOf: IsoDate): LicenseProfile => {
  const status = licenseStatus(unit);
  const termYears = TERM_YEARS[status];

  const { commercialOperation, licenseExpires } = unit.dates;

  const ageYears =
    commercialOperation !== null
      ? Math.floor(daysBetween(commercialOperation, asOf) / DAYS_PER_YEAR)
      : null;

  const remaining =
    licenseExpires !== null
      ? new Decimal(daysBetween(asOf, licenseExpires)).div(DAYS_PER_YEAR)
      : null;

  return {
    status,
    termYears,
    ageYears,
    yearsRemaining: remaining !== null ? roundTenth(remaining) : null,
    pctRemaining: remaining !== null ? roundTenth(remaining.div(termYears).mul(100)) : null,
  };
};
