import type { DocumentCategory } from '../types.js';

/**
 * Buckets a document by its type and title. The first matching rule wins.
 */
export const categorizeDocument = (documentType: string, title: string): DocumentCategory => {
  const type = documentType.toLowerCase();
  const heading = title.toLowerCase();

  if (type.includes('ler') || heading.includes('licensee event report')) return 'LER';
  if (type.includes('inspection') || heading.includes('inspection')) return 'Inspection';
  if (type.includes('enforcement') || heading.includes('violation')) return 'Enforcement';
  if (type.includes('amendment') || heading.includes('license amendment')) {
    return 'License Amendment';
  }
  if (type.includes('correspondence') || type.includes('letter')) return 'Correspondence';
  if (type.includes('report')) return 'Report';
  return 'Other';
};
