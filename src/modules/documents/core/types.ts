import { type Static, Type } from '@sinclair/typebox';

import type { IsoDate } from '../../../common/types/temporal.js';

// ─────────────────────────────────────────────────────────────────────────────
// Categories
// ─────────────────────────────────────────────────────────────────────────────

export const DOCUMENT_CATEGORIES = [
  'LER',
  'Inspection',
  'Enforcement',
  'License Amendment',
  'Correspondence',
  'Report',
  'Other',
] as const;

export type DocumentCategory = (typeof DOCUMENT_CATEGORIES)[number];

// ─────────────────────────────────────────────────────────────────────────────
// Documents
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A search result as the document library returns it. Every field is the raw text of
 * the response; missing fields are empty strings.
 */
export interface RawDocumentRecord {
  title: string;
  accessionNumber: string;
  documentDate: string;
  publishDate: string;
  documentType: string;
  authorName: string;
  authorAffiliation: string;
  docketNumber: string;
  pageCount: string;
  url: string | null;
}

export interface RegulatoryDocument {
  accessionNumber: string;
  title: string;
  documentDate: IsoDate | null;
  publishDate: IsoDate | null;
  documentType: string;
  category: DocumentCategory;
  /** Distinct docket numbers the document references, in the order listed */
  dockets: string[];
  authorName: string;
  authorAffiliation: string;
  pageCount: number | null;
  url: string | null;
}

export interface DocketRequest {
  docket: string;
  name: string;
}

export interface SearchPage {
  start: number;
  rows: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Feeds
// ─────────────────────────────────────────────────────────────────────────────

export interface DocketFeed {
  docket: string;
  name: string;
  documents: RegulatoryDocument[];
  documentCount: number;
  lastActivity: IsoDate | null;
  categories: Record<string, number>;
  summary: string;
  /** Set when the search for this docket failed; the feed is then empty */
  fetchError: string | null;
}

export interface DocumentFeedArtifact {
  fetchedAt: string;
  totalDocuments: number;
  reactorsWithActivity: number;
  categoryTotals: Record<string, number>;
  failedDockets: string[];
  byDocket: Record<string, DocketFeed>;
}

export interface DocumentFeedPolicy {
  readonly docsPerDocket: number;
  readonly fetchMultiplier: number;
  readonly maxDocketsPerDocument: number;
  readonly concurrency: number;
}

export interface SlimPolicy {
  readonly maxDocuments: number;
  readonly maxTitleLength: number;
  readonly maxTypeLength: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Slim feed (read back by the dashboard build, so it has a schema)
// ─────────────────────────────────────────────────────────────────────────────

const DocumentCategorySchema = Type.Union(
  DOCUMENT_CATEGORIES.map((category) => Type.Literal(category))
);

const CategoryCountsSchema = Type.Record(Type.String(), Type.Number());

export const SlimDocumentSchema = Type.Object({
  title: Type.String(),
  accession: Type.String(),
  date: Type.Union([Type.String(), Type.Null()]),
  type: Type.String(),
  category: DocumentCategorySchema,
  url: Type.Union([Type.String(), Type.Null()]),
});

export const SlimDocketFeedSchema = Type.Object({
  name: Type.String(),
  lastActivity: Type.Union([Type.String(), Type.Null()]),
  documents: Type.Array(SlimDocumentSchema),
  categories: CategoryCountsSchema,
});

export const SlimFeedArtifactSchema = Type.Object({
  fetchedAt: Type.String(),
  totalDocuments: Type.Number(),
  categoryTotals: CategoryCountsSchema,
  byDocket: Type.Record(Type.String(), SlimDocketFeedSchema),
});

export type SlimDocument = Static<typeof SlimDocumentSchema>;
export type SlimDocketFeed = Static<typeof SlimDocketFeedSchema>;
export type SlimFeedArtifact = Static<typeof SlimFeedArtifactSchema>;
