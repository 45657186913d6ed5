import type { PowerFeedError } from './errors.js';
import type { PowerFeedLoadResult } from './types.js';
import type { Result } from 'neverthrow';

export interface PowerFeedSource {
  /**
   * Reads the daily power feed. Unparseable rows are in `rowErrors`.
   */
  load(): Promise<Result<PowerFeedLoadResult, PowerFeedError>>;
}
