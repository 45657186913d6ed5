import type { FileSourceError } from '../../../common/types/errors.js';
import type { CsvTableError } from '../../../infra/csv/index.js';

/**
 * Fatal registry errors. Row-level problems are reported as `RowError`s instead.
 */
export type RegistryLoadError = FileSourceError | CsvTableError;
