/**
 * Document library search client
 *
 * Talks to the public ADAMS advanced-search endpoint, which answers with XML.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { err, ok, type Result } from 'neverthrow';

import {
  createHttpError,
  createNetworkError,
  createParseError,
  createTimeoutError,
  type DocumentFetchError,
} from '../../core/errors.js';

import type { DocumentSearchClient } from '../../core/ports.js';
import type { RawDocumentRecord, SearchPage } from '../../core/types.js';
import type { Logger } from 'pino';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface AdamsSearchClientOptions {
  baseUrl: string;
  timeoutMs: number;
  logger: Logger;
  fetchFn?: FetchFn;
}

const USER_AGENT = 'reactor-fleet-dashboard (document feed)';
const DOCUMENT_BASE_URL = 'https://www.nrc.gov/docs';

const parser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (name: string) => name === 'result',
});

/**
 * Search expression for documents whose docket field starts with `docket`, limited to
 * the public library.
 */
export const buildDocketQuery = (docket: string): string =>
  `(mode:sections,sections:(filters:(public-library:!t),` +
  `properties_search_all:!(!(DocketNumber,starts,'${docket}',''))))`;

export const buildSearchUrl = (baseUrl: string, docket: string, page: SearchPage): string => {
  const url = new URL(baseUrl);
  url.searchParams.set('q', buildDocketQuery(docket));
  url.searchParams.set('qn', 'AdamsSearch');
  url.searchParams.set('tab', 'advanced-search-pars');
  url.searchParams.set('start', String(page.start));
  url.searchParams.set('rows', String(page.rows));
  url.searchParams.set('s', 'PublishDatePARS');
  url.searchParams.set('so', 'desc');
  return url.toString();
};

/**
 * Public PDF location for `ML` accession numbers; other numbers have no direct link.
 */
export const documentUrl = (accessionNumber: string): string | null =>
  accessionNumber.startsWith('ML')
    ? `${DOCUMENT_BASE_URL}/${accessionNumber.slice(0, 6)}/${accessionNumber}.pdf`
    : null;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Every `<result>` element, wherever it sits in the response tree.
 */
const collectResults = (
  node: unknown,
  into: Record<string, unknown>[] = []
): Record<string, unknown>[] => {
  if (Array.isArray(node)) {
    for (const item of node) collectResults(item, into);
    return into;
  }
  if (!isRecord(node)) {
    return into;
  }

  for (const [key, value] of Object.entries(node)) {
    if (key === 'result' && Array.isArray(value)) {
      into.push(...value.filter(isRecord));
    } else {
      collectResults(value, into);
    }
  }
  return into;
};

const text = (record: Record<string, unknown>, field: string): string => {
  const value = record[field];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return '';
};

const toRawRecord = (record: Record<string, unknown>): RawDocumentRecord => {
  const accessionNumber = text(record, 'AccessionNumber').trim();
  return {
    title: text(record, 'DocumentTitle'),
    accessionNumber,
    documentDate: text(record, 'DocumentDate'),
    publishDate: text(record, 'PublishDatePARS'),
    documentType: text(record, 'DocumentType'),
    authorName: text(record, 'AuthorName'),
    authorAffiliation: text(record, 'AuthorAffiliation'),
    docketNumber: text(record, 'DocketNumber'),
    pageCount: text(record, 'EstimatedPageCount'),
    url: accessionNumber === '' ? null : documentUrl(accessionNumber),
  };
};

export const parseSearchResponse = (
  xml: string
): Result<RawDocumentRecord[], DocumentFetchError> => {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    return err(
      createParseError(
        `Malformed search response at line ${String(validation.err.line)}: ${validation.err.msg}`
      )
    );
  }

  const parsed: unknown = parser.parse(xml);
  return ok(collectResults(parsed).map(toRawRecord));
};

export const createAdamsSearchClient = (
  options: AdamsSearchClientOptions
): DocumentSearchClient => {
  const { baseUrl, timeoutMs, logger } = options;
  const fetchFn: FetchFn = options.fetchFn ?? fetch;

  return {
    async searchByDocket(docket, page) {
      const url = buildSearchUrl(baseUrl, docket, page);
      const controller = new AbortController();
      const timer = setTimeout(() => {
        controller.abort();
      }, timeoutMs);

      logger.debug({ docket, start: page.start, rows: page.rows }, 'Searching documents');

      try {
        const response = await fetchFn(url, {
          headers: { 'User-Agent': USER_AGENT, Accept: 'application/xml' },
          signal: controller.signal,
        });

        if (!response.ok) {
          return err(
            createHttpError(
              response.status,
              `Search for docket ${docket} failed with HTTP ${String(response.status)}`
            )
          );
        }

        const body = await response.text();
        const records = parseSearchResponse(body);
        if (records.isOk()) {
          logger.debug({ docket, results: records.value.length }, 'Search complete');
        }
        return records;
      } catch (error) {
        if (controller.signal.aborted) {
          return err(
            createTimeoutError(
              `Search for docket ${docket} timed out after ${String(timeoutMs)}ms`,
              timeoutMs
            )
          );
        }
        return err(
          createNetworkError(
            `Search for docket ${docket} failed: ${(error as Error).message}`,
            error
          )
        );
      } finally {
        clearTimeout(timer);
      }
    },
  };
};
