import { isPlantSpecific, toRegulatoryDocument } from './to-regulatory-document.js';

import type { DocumentFetchError } from '../errors.js';
import type { DocumentSearchClient } from '../ports.js';
import type {
  DocketFeed,
  DocketRequest,
  DocumentFeedArtifact,
  DocumentFeedPolicy,
  RawDocumentRecord,
  RegulatoryDocument,
} from '../types.js';
import type { Result } from 'neverthrow';
import type { Logger } from 'pino';

export interface BuildDocumentFeedsDeps {
  client: DocumentSearchClient;
  logger: Logger;
  policy: DocumentFeedPolicy;
  now: () => Date;
}

interface DocketFetch {
  docket: string;
  result: Result<RawDocumentRecord[], DocumentFetchError>;
}

/**
 * Most recently published first; undated documents last; ties by accession number.
 */
export const compareDocuments = (a: RegulatoryDocument, b: RegulatoryDocument): number => {
  if (a.publishDate !== b.publishDate) {
    if (a.publishDate === null) return 1;
    if (b.publishDate === null) return -1;
    return a.publishDate < b.publishDate ? 1 : -1;
  }
  if (a.accessionNumber === b.accessionNumber) return 0;
  return a.accessionNumber < b.accessionNumber ? -1 : 1;
};

export const countCategories = (
  documents: readonly RegulatoryDocument[]
): Record<string, number> => {
  const counts: Record<string, number> = {};
  for (const document of documents) {
    counts[document.category] = (counts[document.category] ?? 0) + 1;
  }
  return counts;
};

export const summarizeActivity = (documentCount: number): string =>
  documentCount === 0
    ? 'No recent documents found.'
    : `${String(documentCount)} recent document(s) on file.`;

const uniqueRequests = (requests: readonly DocketRequest[]): DocketRequest[] => {
  const seen = new Set<string>();
  const unique: DocketRequest[] = [];
  for (const request of requests) {
    if (request.docket === '' || seen.has(request.docket)) continue;
    seen.add(request.docket);
    unique.push(request);
  }
  return unique;
};

/**
 * Runs the docket searches in batches of `concurrency`.
 */
const fetchAll = async (
  client: DocumentSearchClient,
  dockets: readonly string[],
  rows: number,
  concurrency: number
): Promise<DocketFetch[]> => {
  const fetched: DocketFetch[] = [];
  const batchSize = Math.max(1, concurrency);

  for (let index = 0; index < dockets.length; index += batchSize) {
    const batch = dockets.slice(index, index + batchSize);
    const batchResults = await Promise.all(
      batch.map(async (docket) => ({
        docket,
        result: await client.searchByDocket(docket, { start: 0, rows }),
      }))
    );
    fetched.push(...batchResults);
  }

  return fetched;
};

/**
 * Per-docket feeds of recent plant-specific documents.
 *
 * Documents are pooled across every search and deduplicated by accession number, then
 * placed in the feed of every requested docket they reference, so a shared-docket
 * document shows up for each unit it names. A failed search leaves that docket with an
 * empty feed, even when another search returns a document naming it.
 */
export const buildDocumentFeeds = async (
  deps: BuildDocumentFeedsDeps,
  requests: readonly DocketRequest[]
): Promise<DocumentFeedArtifact> => {
  const { client, logger, policy } = deps;
  const targets = uniqueRequests(requests);
  const requested = new Set(targets.map((target) => target.docket));
  const rows = policy.docsPerDocket * policy.fetchMultiplier;

  logger.info(
    { dockets: targets.length, rows, concurrency: policy.concurrency },
    'Fetching documents'
  );

  const fetched = await fetchAll(
    client,
    targets.map((target) => target.docket),
    rows,
    policy.concurrency
  );

  const fetchErrors = new Map<string, string>();
  for (const { docket, result } of fetched) {
    if (result.isErr()) {
      logger.warn({ docket, error: result.error }, 'Document search failed');
      fetchErrors.set(docket, result.error.message);
    }
  }

  // Failed dockets get no feed to place into.
  const placed = new Map<string, Map<string, RegulatoryDocument>>(
    targets
      .filter((target) => !fetchErrors.has(target.docket))
      .map((target) => [target.docket, new Map<string, RegulatoryDocument>()])
  );
  let industryWide = 0;
  let withoutAccession = 0;

  for (const { docket, result } of fetched) {
    if (result.isErr()) continue;

    for (const raw of result.value) {
      const document = toRegulatoryDocument(raw);

      if (document.accessionNumber === '') {
        withoutAccession += 1;
        continue;
      }
      if (!isPlantSpecific(document, policy.maxDocketsPerDocument)) {
        industryWide += 1;
        continue;
      }

      const destinations = new Set([docket, ...document.dockets.filter((d) => requested.has(d))]);
      for (const destination of destinations) {
        const feed = placed.get(destination);
        if (feed !== undefined && !feed.has(document.accessionNumber)) {
          feed.set(document.accessionNumber, document);
        }
      }
    }
  }

  const byDocket: Record<string, DocketFeed> = {};
  const categoryTotals: Record<string, number> = {};
  let totalDocuments = 0;
  let reactorsWithActivity = 0;

  for (const target of targets) {
    const documents = [...(placed.get(target.docket)?.values() ?? [])]
      .sort(compareDocuments)
      .slice(0, policy.docsPerDocket);

    const categories = countCategories(documents);
    for (const [category, count] of Object.entries(categories)) {
      categoryTotals[category] = (categoryTotals[category] ?? 0) + count;
    }

    const lastActivity = documents.reduce<string | null>(
      (latest, document) =>
        document.publishDate !== null && (latest === null || document.publishDate > latest)
          ? document.publishDate
          : latest,
      null
    );

    totalDocuments += documents.length;
    if (documents.length > 0) {
      reactorsWithActivity += 1;
    }

    byDocket[target.docket] = {
      docket: target.docket,
      name: target.name,
      documents,
      documentCount: documents.length,
      lastActivity,
      categories,
      summary: summarizeActivity(documents.length),
      fetchError: fetchErrors.get(target.docket) ?? null,
    };
  }

  logger.info(
    {
      totalDocuments,
      reactorsWithActivity,
      failedDockets: fetchErrors.size,
      industryWide,
      withoutAccession,
    },
    'Document feeds built'
  );

  return {
    fetchedAt: deps.now().toISOString(),
    totalDocuments,
    reactorsWithActivity,
    categoryTotals,
    failedDockets: targets
      .map((target) => target.docket)
      .filter((docket) => fetchErrors.has(docket)),
    byDocket,
  };
};
