// Client
export {
  createAdamsSearchClient,
  buildDocketQuery,
  buildSearchUrl,
  documentUrl,
  parseSearchResponse,
  type AdamsSearchClientOptions,
  type FetchFn,
} from './shell/adams/adams-search-client.js';
export type { DocumentSearchClient } from './core/ports.js';

// Use cases
export { categorizeDocument } from './core/usecases/categorize-document.js';
export { toRegulatoryDocument, isPlantSpecific } from './core/usecases/to-regulatory-document.js';
export {
  buildDocumentFeeds,
  compareDocuments,
  countCategories,
  summarizeActivity,
  type BuildDocumentFeedsDeps,
} from './core/usecases/build-document-feeds.js';
export { slimDocumentFeed, truncate } from './core/usecases/slim-document-feed.js';

// Types
export {
  DOCUMENT_CATEGORIES,
  SlimDocumentSchema,
  SlimDocketFeedSchema,
  SlimFeedArtifactSchema,
  type DocumentCategory,
  type RawDocumentRecord,
  type RegulatoryDocument,
  type DocketRequest,
  type SearchPage,
  type DocketFeed,
  type DocumentFeedArtifact,
  type DocumentFeedPolicy,
  type SlimPolicy,
  type SlimDocument,
  type SlimDocketFeed,
  type SlimFeedArtifact,
} from './core/types.js';

// Errors
export {
  createHttpError,
  createNetworkError,
  createParseError,
  createTimeoutError,
  type DocumentFetchError,
  type NetworkError,
  type TimeoutError,
  type HttpError,
  type ParseError,
} from './core/errors.js';
