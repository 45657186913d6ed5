import type { DocumentFetchError } from './errors.js';
import type { RawDocumentRecord, SearchPage } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Search access to the public document library.
 */
export interface DocumentSearchClient {
  /**
   * Documents whose docket field starts with `docket`, most recently published first.
   */
  searchByDocket(
    docket: string,
    page: SearchPage
  ): Promise<Result<RawDocumentRecord[], DocumentFetchError>>;
}
