import type { RowError } from '../../../common/types/errors.js';
import type { IsoDate } from '../../../common/types/temporal.js';

export const REACTOR_TECHNOLOGIES = ['PWR', 'BWR'] as const;

/** PWR = pressurized-water reactor, BWR = boiling-water reactor */
export type ReactorTechnology = (typeof REACTOR_TECHNOLOGIES)[number];

export interface Coordinates {
  latitude: number;
  longitude: number;
}

export interface ReactorCapacity {
  /** Rated electrical output */
  electricalMwe: number | null;
  /** Licensed thermal output */
  thermalMwt: number | null;
}

export interface LicenseDates {
  constructionPermit: IsoDate | null;
  operatingLicense: IsoDate | null;
  commercialOperation: IsoDate | null;
  licenseRenewed: IsoDate | null;
  subsequentRenewal: IsoDate | null;
  licenseExpires: IsoDate | null;
}

/**
 * One physical reactor unit from the master registry.
 */
export interface ReactorUnit {
  name: string;
  /** `05000XXX` (legacy) or `05200XXX` (combined license) */
  docketNumber: string;
  licenseNumber: string;
  location: string;
  coordinates: Coordinates;
  /** NRC region 1-4 */
  nrcRegion: number | null;
  technology: ReactorTechnology;
  containmentType: string;
  vendor: string;
  architectEngineer: string;
  constructionFirm: string;
  operator: string;
  parentCompany: string;
  parentWebsite: string;
  capacity: ReactorCapacity;
  dates: LicenseDates;
  referenceUrl: string | null;
}

/**
 * Units sharing one exact coordinate pair.
 */
export interface Site {
  /** `"<latitude>,<longitude>"` */
  key: string;
  coordinates: Coordinates;
  unitNames: string[];
  unitCount: number;
  totalCapacityMwe: number;
  isMultiUnit: boolean;
}

export type LicenseStatus = 'original' | 'first_renewal' | 'subsequent_renewal';

export interface LicenseProfile {
  status: LicenseStatus;
  termYears: number;
  ageYears: number | null;
  yearsRemaining: number | null;
  pctRemaining: number | null;
}

export interface RegistryLoadResult {
  units: ReactorUnit[];
  rowErrors: RowError[];
}

/** Columns the registry table must carry */
export const REQUIRED_REGISTRY_COLUMNS = [
  'name',
  'docket_number',
  'reactor_type',
  'latitude',
  'longitude',
] as const;
