import { Decimal } from 'decimal.js';

import {
  PERFORMER_COUNT,
  SITE_DOCUMENT_COUNT,
  type DashboardInput,
  type DashboardModel,
  type DashboardSite,
  type DashboardUnit,
  type MetricsReactor,
  type PerformanceClass,
  type Performer,
  type SiteDocument,
} from '../types.js';

import type { PowerStatus } from '../../../capacity-factors/index.js';
import type { SlimDocketFeed, SlimFeedArtifact } from '../../../documents/index.js';
import type { ReactorTechnology } from '../../../registry/index.js';

const STATUS_RANK: readonly PowerStatus[] = ['full_power', 'reduced_power', 'low_power', 'offline'];

export const performanceClass = (capacityFactor: number | null): PerformanceClass => {
  if (capacityFactor === null) return 'offline';
  if (capacityFactor >= 90) return 'excellent';
  if (capacityFactor >= 80) return 'good';
  if (capacityFactor >= 70) return 'fair';
  if (capacityFactor >= 50) return 'poor';
  return 'critical';
};

/**
 * "Alpha Point Unit 2" -> "Alpha Point"
 */
export const siteBaseName = (unitName: string): string =>
  unitName.replace(/,?\s*(Unit\s*)?\d+$/i, '').trim();

const feedFor = (documents: SlimFeedArtifact | null, docket: string): SlimDocketFeed | null =>
  documents?.byDocket[docket] ?? null;

const toDashboardUnit = (
  reactor: MetricsReactor,
  documents: SlimFeedArtifact | null
): DashboardUnit => {
  const feed = feedFor(documents, reactor.docketNumber);
  return {
    name: reactor.name,
    docketNumber: reactor.docketNumber,
    licenseNumber: reactor.licenseNumber,
    technology: reactor.technology,
    nrcRegion: reactor.nrcRegion,
    operator: reactor.operator,
    parentCompany: reactor.parentCompany,
    capacityMwe: reactor.capacity.electricalMwe,
    referenceUrl: reactor.referenceUrl,
    license: reactor.license,
    performance: reactor.performance,
    performanceClass: performanceClass(reactor.performance.capacityFactor30d),
    lastActivity: feed?.lastActivity ?? null,
    documents: feed?.documents ?? [],
  };
};

const averageOf = (values: readonly number[]): number | null => {
  if (values.length === 0) return null;
  const total = values.reduce((sum, value) => sum.plus(value), new Decimal(0));
  return total.div(values.length).toDecimalPlaces(1, Decimal.ROUND_HALF_UP).toNumber();
};

const siteStatus = (units: readonly DashboardUnit[]): PowerStatus =>
  STATUS_RANK.find((status) => units.some((unit) => unit.performance.status === status)) ??
  'offline';

/**
 * Most recent documents across the site's units, newest first, each listed once.
 */
const siteDocuments = (units: readonly DashboardUnit[]): SiteDocument[] => {
  const seen = new Set<string>();
  const documents: SiteDocument[] = [];
  for (const unit of units) {
    for (const document of unit.documents) {
      if (seen.has(document.accession)) continue;
      seen.add(document.accession);
      documents.push({ ...document, unitName: unit.name });
    }
  }

  return documents
    .sort((a, b) => {
      if (a.date !== b.date) {
        if (a.date === null) return 1;
        if (b.date === null) return -1;
        return a.date < b.date ? 1 : -1;
      }
      return a.accession.localeCompare(b.accession);
    })
    .slice(0, SITE_DOCUMENT_COUNT);
};

const rankPerformers = (reactors: readonly MetricsReactor[]): Performer[] =>
  reactors
    .flatMap((reactor) => {
      const value = reactor.performance.capacityFactor365d;
      return value === null
        ? []
        : [
            {
              name: reactor.name,
              siteKey: reactor.siteKey,
              coordinates: reactor.coordinates,
              capacityFactor365d: value,
            },
          ];
    })
    .sort((a, b) => b.capacityFactor365d - a.capacityFactor365d || a.name.localeCompare(b.name));

/**
 * Read-only merge of the metrics and the document feed into what the page shows.
 */
export const buildDashboardModel = (input: DashboardInput): DashboardModel => {
  const { metrics, documents } = input;

  const reactorsByName = new Map(metrics.reactors.map((reactor) => [reactor.name, reactor]));

  const sites: DashboardSite[] = metrics.sites.flatMap((site) => {
    const units = site.unitNames.flatMap((name) => {
      const reactor = reactorsByName.get(name);
      return reactor === undefined ? [] : [toDashboardUnit(reactor, documents)];
    });
    const first = units[0];
    const firstReactor = reactorsByName.get(site.unitNames[0] ?? '');
    if (first === undefined || firstReactor === undefined) {
      return [];
    }

    const averageCapacityFactor30d = averageOf(
      units.flatMap((unit) =>
        unit.performance.capacityFactor30d === null ? [] : [unit.performance.capacityFactor30d]
      )
    );

    return [
      {
        key: site.key,
        name: siteBaseName(first.name),
        location: firstReactor.location,
        coordinates: site.coordinates,
        units,
        totalCapacityMwe: site.totalCapacityMwe,
        isMultiUnit: site.isMultiUnit,
        averageCapacityFactor30d,
        performanceClass: performanceClass(averageCapacityFactor30d),
        status: siteStatus(units),
        documents: siteDocuments(units),
      },
    ];
  });

  const ranked = rankPerformers(metrics.reactors);
  const technologies: ReactorTechnology[] = [];
  for (const reactor of metrics.reactors) {
    if (!technologies.includes(reactor.technology)) technologies.push(reactor.technology);
  }

  return {
    asOf: metrics.asOf,
    fleet: metrics.fleet,
    sites,
    topPerformers: ranked.slice(0, PERFORMER_COUNT),
    bottomPerformers: ranked.slice(-PERFORMER_COUNT).reverse(),
    regions: Object.keys(metrics.fleet.byRegion).sort(),
    technologies: technologies.sort(),
    documents: {
      fetchedAt: documents?.fetchedAt ?? null,
      totalDocuments: documents?.totalDocuments ?? 0,
      categoryTotals: documents?.categoryTotals ?? {},
    },
  };
};
