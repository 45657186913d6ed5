import type { FileSourceError } from '../../../common/types/errors.js';
import type { CsvTableError } from '../../../infra/csv/index.js';

/**
 * Fatal power feed errors. Unparseable rows are reported as `RowError`s instead.
 */
export type PowerFeedError = FileSourceError | CsvTableError;
