import { compareDocuments } from './build-document-feeds.js';

import type {
  DocumentFeedArtifact,
  RegulatoryDocument,
  SlimDocketFeed,
  SlimDocument,
  SlimFeedArtifact,
  SlimPolicy,
} from '../types.js';

/**
 * Cuts `text` to at most `length` characters without splitting a surrogate pair.
 */
export const truncate = (text: string, length: number): string => {
  const characters = Array.from(text);
  return characters.length <= length ? text : characters.slice(0, length).join('');
};

const slimDocument = (document: RegulatoryDocument, policy: SlimPolicy): SlimDocument => ({
  title: truncate(document.title, policy.maxTitleLength),
  accession: document.accessionNumber,
  date: document.documentDate,
  type: truncate(document.documentType, policy.maxTypeLength),
  category: document.category,
  url: document.url,
});

/**
 * Dashboard-sized copy of the document feed: the most recent documents per docket,
 * with long titles and types cut down.
 */
export const slimDocumentFeed = (
  artifact: DocumentFeedArtifact,
  policy: SlimPolicy
): SlimFeedArtifact => {
  const byDocket: Record<string, SlimDocketFeed> = {};
  let totalDocuments = 0;

  for (const [docket, feed] of Object.entries(artifact.byDocket)) {
    const documents = [...feed.documents]
      .sort(compareDocuments)
      .slice(0, policy.maxDocuments)
      .map((document) => slimDocument(document, policy));

    totalDocuments += documents.length;
    byDocket[docket] = {
      name: feed.name,
      lastActivity: feed.lastActivity,
      documents,
      categories: feed.categories,
    };
  }

  return {
    fetchedAt: artifact.fetchedAt,
    totalDocuments,
    categoryTotals: artifact.categoryTotals,
    byDocket,
  };
};
