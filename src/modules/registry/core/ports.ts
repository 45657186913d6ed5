import type { RegistryLoadError } from './errors.js';
import type { RegistryLoadResult } from './types.js';
import type { Result } from 'neverthrow';

export interface RegistrySource {
  /**
   * Reads and validates the registry. Row problems are in `rowErrors`; only an
   * unreadable table is an error.
   */
  load(): Promise<Result<RegistryLoadResult, RegistryLoadError>>;
}
