import { describe, expect, it } from 'vitest';

import {
  categorizeDocument,
  isPlantSpecific,
  toRegulatoryDocument,
} from '@/modules/documents/index.js';

import { makeDocument, makeRawDocument } from '../../fixtures/builders.js';

describe('categorizeDocument', () => {
  it.each([
    ['Licensee Event Report (LER)', 'Reactor trip', 'LER'],
    ['Letter', 'Licensee Event Report 2024-001', 'LER'],
    ['Inspection Report', 'Quarterly results', 'Inspection'],
    ['Enforcement Action', 'Civil penalty', 'Enforcement'],
    ['Letter', 'Notice of Violation', 'Enforcement'],
    ['Amendment', 'Technical specifications', 'License Amendment'],
    ['Letter', 'Response to request', 'Correspondence'],
    ['Report, Miscellaneous', 'Annual summary', 'Report'],
    ['Meeting Summary', 'Public meeting', 'Other'],
    ['', '', 'Other'],
  ] as const)('classifies type %j with title %j as %s', (type, title, expected) => {
    expect(categorizeDocument(type, title)).toBe(expected);
  });
});

describe('toRegulatoryDocument', () => {
  it('normalizes dates, dockets and page counts', () => {
    const document = toRegulatoryDocument(
      makeRawDocument({
        documentDate: '1/5/2024',
        publishDate: '01/16/2024 09:00 AM EST',
        docketNumber: ' 05000901, 5000902 ,05000901',
        pageCount: '12',
      })
    );

    expect(document.documentDate).toBe('2024-01-05');
    expect(document.publishDate).toBe('2024-01-16');
    expect(document.dockets).toEqual(['05000901', '05000902']);
    expect(document.pageCount).toBe(12);
    expect(document.category).toBe('Inspection');
  });

  it('keeps unparseable values as null', () => {
    const document = toRegulatoryDocument(
      makeRawDocument({ documentDate: 'soon', publishDate: '', pageCount: 'n/a', docketNumber: '' })
    );

    expect(document.documentDate).toBeNull();
    expect(document.publishDate).toBeNull();
    expect(document.pageCount).toBeNull();
    expect(document.dockets).toEqual([]);
  });
});

describe('isPlantSpecific', () => {
  const withDockets = (count: number) =>
    makeDocument({
      dockets: Array.from({ length: count }, (_, index) => `0500090${String(index)}`),
    });

  it('accepts up to the limit', () => {
    expect(isPlantSpecific(withDockets(5), 5)).toBe(true);
  });

  it('rejects documents above the limit', () => {
    expect(isPlantSpecific(withDockets(6), 5)).toBe(false);
  });

  it('treats documents without dockets as plant-specific', () => {
    expect(isPlantSpecific(withDockets(0), 5)).toBe(true);
  });
});
