import { parseCalendarDate } from '../../../../common/types/temporal.js';
import { categorizeDocument } from './categorize-document.js';

import type { RawDocumentRecord, RegulatoryDocument } from '../types.js';

const parseDocketList = (field: string): string[] => {
  const dockets: string[] = [];
  for (const part of field.split(',')) {
    const trimmed = part.trim();
    const docket = /^\d{7}$/.test(trimmed) ? `0${trimmed}` : trimmed;
    if (docket !== '' && !dockets.includes(docket)) {
      dockets.push(docket);
    }
  }
  return dockets;
};

const parsePageCount = (raw: string): number | null => {
  const trimmed = raw.trim();
  return /^\d+$/.test(trimmed) ? Number(trimmed) : null;
};

export const toRegulatoryDocument = (raw: RawDocumentRecord): RegulatoryDocument => ({
  accessionNumber: raw.accessionNumber.trim(),
  title: raw.title.trim(),
  documentDate: parseCalendarDate(raw.documentDate),
  publishDate: parseCalendarDate(raw.publishDate),
  documentType: raw.documentType.trim(),
  category: categorizeDocument(raw.documentType, raw.title),
  dockets: parseDocketList(raw.docketNumber),
  authorName: raw.authorName.trim(),
  authorAffiliation: raw.authorAffiliation.trim(),
  pageCount: parsePageCount(raw.pageCount),
  url: raw.url,
});

/**
 * Documents tagged to more than `maxDockets` dockets are industry-wide notices.
 * A document without docket information counts as plant-specific.
 */
export const isPlantSpecific = (document: RegulatoryDocument, maxDockets: number): boolean =>
  document.dockets.length <= maxDockets;
