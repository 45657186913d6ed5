import { describe, expect, it } from 'vitest';

import {
  buildDashboardModel,
  performanceClass,
  SITE_DOCUMENT_COUNT,
  siteBaseName,
  type MetricsReactor,
} from '@/modules/dashboard/index.js';
import { deriveSites } from '@/modules/registry/index.js';

import { makeFleet, makeReactor } from '../../fixtures/builders.js';

import type { SlimDocument, SlimFeedArtifact } from '@/modules/documents/index.js';

const slimDocument = (overrides: Partial<SlimDocument> = {}): SlimDocument => ({
  title: 'Inspection Report',
  accession: 'ML24001A001',
  date: '2024-01-10',
  type: 'Inspection Report',
  category: 'Inspection',
  url: null,
  ...overrides,
});

const unitOne = makeReactor(
  { name: 'Alpha Point Unit 1', docketNumber: '05000901' },
  {
    capacityFactor30d: 90.1,
    capacityFactor90d: 70,
    capacityFactor365d: 92,
    status: 'full_power',
  }
);
const unitTwo = makeReactor(
  { name: 'Alpha Point Unit 2', docketNumber: '05000902' },
  {
    capacityFactor30d: 80,
    capacityFactor90d: 95,
    capacityFactor365d: 75,
    status: 'reduced_power',
  }
);
const birch = makeReactor(
  {
    name: 'Birch Creek',
    docketNumber: '05000903',
    technology: 'BWR',
    location: 'Birchton, AR',
    coordinates: { latitude: 35, longitude: -90 },
    nrcRegion: 4,
  },
  {
    capacityFactor30d: null,
    capacityFactor90d: null,
    capacityFactor365d: null,
    status: 'offline',
  }
);

const shared = slimDocument({ accession: 'ML24001A001', date: '2024-01-10' });

const documents: SlimFeedArtifact = {
  fetchedAt: '2024-03-01T12:00:00.000Z',
  totalDocuments: 3,
  categoryTotals: { Inspection: 3 },
  byDocket: {
    '05000901': {
      name: 'Alpha Point Unit 1',
      lastActivity: '2024-02-01',
      documents: [slimDocument({ accession: 'ML24032A002', date: '2024-02-01' }), shared],
      categories: { Inspection: 2 },
    },
    '05000902': {
      name: 'Alpha Point Unit 2',
      lastActivity: '2024-01-10',
      documents: [shared],
      categories: { Inspection: 1 },
    },
  },
};

const build = (reactors: MetricsReactor[], feed: SlimFeedArtifact | null = documents) =>
  buildDashboardModel({
    metrics: {
      asOf: '2024-12-30',
      reactors,
      sites: deriveSites(reactors),
      fleet: makeFleet({ byRegion: { '4': 1, '3': 2 } }),
    },
    documents: feed,
  });

describe('performanceClass', () => {
  it.each([
    [95, 'excellent'],
    [90, 'excellent'],
    [89.9, 'good'],
    [80, 'good'],
    [70, 'fair'],
    [50, 'poor'],
    [49.9, 'critical'],
    [0, 'critical'],
    [null, 'offline'],
  ] as const)('classifies %s as %s', (value, expected) => {
    expect(performanceClass(value)).toBe(expected);
  });
});

describe('siteBaseName', () => {
  it.each([
    ['Alpha Point Unit 2', 'Alpha Point'],
    ['Cedar Ridge, Unit 3', 'Cedar Ridge'],
    ['Delta Bay 1', 'Delta Bay'],
    ['Birch Creek', 'Birch Creek'],
  ])('reduces %j to %j', (name, expected) => {
    expect(siteBaseName(name)).toBe(expected);
  });
});

describe('buildDashboardModel', () => {
  it('groups units into sites with performance averaged over 30 days', () => {
    const model = build([unitOne, unitTwo, birch]);
    const [alpha, birchSite] = model.sites;

    expect(model.sites).toHaveLength(2);
    expect(alpha?.name).toBe('Alpha Point');
    expect(alpha?.key).toBe('41.5,-82.1');
    expect(alpha?.location).toBe('Testville, OH');
    expect(alpha?.units.map((unit) => unit.performanceClass)).toEqual(['excellent', 'good']);
    expect(alpha?.averageCapacityFactor30d).toBe(85.1);
    expect(alpha?.performanceClass).toBe('good');
    expect(alpha?.status).toBe('full_power');
    expect(alpha?.totalCapacityMwe).toBe(2000);
    expect(alpha?.isMultiUnit).toBe(true);

    expect(birchSite?.averageCapacityFactor30d).toBeNull();
    expect(birchSite?.performanceClass).toBe('offline');
    expect(birchSite?.status).toBe('offline');
  });

  it('attaches documents to units and lists each once per site', () => {
    const model = build([unitOne, unitTwo, birch]);
    const alpha = model.sites[0];

    expect(alpha?.units[0]?.lastActivity).toBe('2024-02-01');
    expect(alpha?.units[1]?.documents.map((doc) => doc.accession)).toEqual(['ML24001A001']);
    expect(
      alpha?.documents.map((doc) => ({ accession: doc.accession, unitName: doc.unitName }))
    ).toEqual([
      { accession: 'ML24032A002', unitName: 'Alpha Point Unit 1' },
      { accession: 'ML24001A001', unitName: 'Alpha Point Unit 1' },
    ]);
    expect(model.sites[1]?.documents).toEqual([]);
    expect(model.documents).toEqual({
      fetchedAt: '2024-03-01T12:00:00.000Z',
      totalDocuments: 3,
      categoryTotals: { Inspection: 3 },
    });
  });

  it('keeps only the most recent documents on a site', () => {
    const unitDocuments = (unit: number): SlimDocument[] =>
      Array.from({ length: 5 }, (_, index) =>
        slimDocument({
          accession: `ML2400${String(unit)}A00${String(index)}`,
          date: `2024-0${String(index + 1)}-1${String(unit)}`,
        })
      );
    const feed: SlimFeedArtifact = {
      ...documents,
      byDocket: {
        '05000901': {
          name: 'Alpha Point Unit 1',
          lastActivity: '2024-05-11',
          documents: unitDocuments(1),
          categories: { Inspection: 5 },
        },
        '05000902': {
          name: 'Alpha Point Unit 2',
          lastActivity: '2024-05-12',
          documents: unitDocuments(2),
          categories: { Inspection: 5 },
        },
      },
    };

    const model = build([unitOne, unitTwo, birch], feed);
    const alpha = model.sites[0];

    expect(SITE_DOCUMENT_COUNT).toBe(8);
    expect(alpha?.units[0]?.documents).toHaveLength(5);
    expect(alpha?.documents.map((doc) => doc.accession)).toEqual([
      'ML24002A004',
      'ML24001A004',
      'ML24002A003',
      'ML24001A003',
      'ML24002A002',
      'ML24001A002',
      'ML24002A001',
      'ML24001A001',
    ]);
  });

  it('renders without a document feed', () => {
    const model = build([unitOne, unitTwo, birch], null);

    expect(model.sites[0]?.units[0]?.documents).toEqual([]);
    expect(model.sites[0]?.units[0]?.lastActivity).toBeNull();
    expect(model.documents).toEqual({ fetchedAt: null, totalDocuments: 0, categoryTotals: {} });
  });

  it('lists filter options in sorted order', () => {
    const model = build([unitOne, unitTwo, birch]);

    expect(model.regions).toEqual(['3', '4']);
    expect(model.technologies).toEqual(['BWR', 'PWR']);
    expect(model.asOf).toBe('2024-12-30');
  });

  it('ranks performers by 365-day capacity factor', () => {
    const values = [50, 95, 70, 80, 60, 90, 85];
    const reactors = values.map((value, index) =>
      makeReactor(
        {
          name: `Reactor ${String(index + 1)}`,
          docketNumber: `0500091${String(index)}`,
          coordinates: { latitude: 30 + index, longitude: -95 },
        },
        { capacityFactor365d: value }
      )
    );

    const model = build([...reactors, birch]);

    expect(model.topPerformers.map((performer) => performer.name)).toEqual([
      'Reactor 2',
      'Reactor 6',
      'Reactor 7',
      'Reactor 4',
      'Reactor 3',
    ]);
    expect(model.bottomPerformers.map((performer) => performer.name)).toEqual([
      'Reactor 1',
      'Reactor 5',
      'Reactor 3',
      'Reactor 4',
      'Reactor 7',
    ]);
    expect(model.topPerformers[0]).toEqual({
      name: 'Reactor 2',
      siteKey: '31,-95',
      coordinates: { latitude: 31, longitude: -95 },
      capacityFactor365d: 95,
    });
  });

  it('breaks ranking ties by name', () => {
    const reactors = ['Zeta 1', 'Eta 1'].map((name, index) =>
      makeReactor(
        {
          name,
          docketNumber: `0500092${String(index)}`,
          coordinates: { latitude: 40 + index, longitude: -80 },
        },
        { capacityFactor365d: 88 }
      )
    );

    const model = build(reactors);

    expect(model.topPerformers.map((performer) => performer.name)).toEqual(['Eta 1', 'Zeta 1']);
  });
});
