// Source
export { createRegistrySource, type RegistrySourceOptions } from './shell/repo/csv-registry-source.js';
export type { RegistrySource } from './core/ports.js';

// Use cases
export { parseRegistryCsv, parseRegistryRows } from './core/usecases/parse-registry.js';
export { deriveSites, siteKey } from './core/usecases/derive-sites.js';
export { deriveLicenseProfile } from './core/usecases/derive-license-profile.js';

// Types
export {
  REACTOR_TECHNOLOGIES,
  REQUIRED_REGISTRY_COLUMNS,
  type ReactorTechnology,
  type ReactorUnit,
  type ReactorCapacity,
  type Coordinates,
  type LicenseDates,
  type LicenseProfile,
  type LicenseStatus,
  type RegistryLoadResult,
  type Site,
} from './core/types.js';

// Errors
export type { RegistryLoadError } from './core/errors.js';
