import { describe, expect, it } from 'vitest';

import { buildMetrics } from '@/app/index.js';

import { makeRecords, makeUnit, testLogger, testPolicy } from '../../fixtures/builders.js';

import type { PowerFeedLoadResult } from '@/modules/capacity-factors/index.js';
import type { RegistryLoadResult } from '@/modules/registry/index.js';

const registry: RegistryLoadResult = {
  units: [
    makeUnit({ name: 'Alpha Point Unit 1', docketNumber: '05000901' }),
    makeUnit({
      name: 'Birch Creek',
      docketNumber: '05000902',
      coordinates: { latitude: 35, longitude: -90 },
    }),
    makeUnit({
      name: 'Cedar Ridge',
      docketNumber: '05200903',
      coordinates: { latitude: 33, longitude: -81 },
    }),
  ],
  rowErrors: [{ row: 5, message: "Missing required field 'name'", field: 'name' }],
};

const feed: PowerFeedLoadResult = {
  records: [
    ...makeRecords('Alpha Point 1', '2024-01-01', [100, 100, 90]),
    ...makeRecords('Birch Creek', '2024-01-01', [80, 80]),
    ...makeRecords('Ghost Unit', '2024-01-01', [50]),
  ],
  rowErrors: [],
};

const policy = { ...testPolicy, unitAliases: { 'Alpha Point Unit 1': 'Alpha Point 1' } };

const build = (input: Partial<{ feed: PowerFeedLoadResult }> = {}) =>
  buildMetrics(
    { logger: testLogger },
    { registry, feed: input.feed ?? feed, policy, fallbackAsOf: '2024-06-30' }
  );

describe('buildMetrics', () => {
  it('takes the as-of date from the latest feed record', () => {
    const metrics = build();

    expect(metrics.asOf).toBe('2024-01-03');
    expect(metrics.fleet.dataAsOf).toBe('2024-01-03');
  });

  it('falls back to the given date when the feed is empty', () => {
    const metrics = build({ feed: { records: [], rowErrors: [] } });

    expect(metrics.asOf).toBe('2024-06-30');
    expect(metrics.diagnostics.unitsWithoutData).toEqual([
      'Alpha Point Unit 1',
      'Birch Creek',
      'Cedar Ridge',
    ]);
  });

  it('joins each unit with its site, feed name, license and performance', () => {
    const [alpha, birch, cedar] = build().reactors;

    expect(alpha?.siteKey).toBe('41.5,-82.1');
    expect(alpha?.feedName).toBe('Alpha Point 1');
    expect(alpha?.performance.currentPower).toBe(90);
    expect(alpha?.performance.capacityFactor30d).toBe(96.7);
    expect(alpha?.performance.status).toBe('reduced_power');
    expect(alpha?.license.status).toBe('original');

    expect(birch?.feedName).toBe('Birch Creek');
    expect(birch?.performance.currentPower).toBeNull();
    expect(birch?.performance.status).toBe('offline');
    expect(birch?.performance.capacityFactor30d).toBe(80);

    expect(cedar?.feedName).toBeNull();
    expect(cedar?.performance.recordCount).toBe(0);
  });

  it('keys capacity factors by registry name', () => {
    const metrics = build();

    expect(Object.keys(metrics.capacityFactors)).toEqual([
      'Alpha Point Unit 1',
      'Birch Creek',
      'Cedar Ridge',
    ]);
    expect(metrics.capacityFactors['Alpha Point Unit 1']).toEqual(metrics.reactors[0]?.performance);
  });

  it('computes fleet statistics over the joined units', () => {
    const { fleet, sites } = build();

    expect(sites.map((site) => site.key)).toEqual(['41.5,-82.1', '35,-90', '33,-81']);
    expect(fleet.totalUnits).toBe(3);
    expect(fleet.totalCapacityMwe).toBe(3000);
    expect(fleet.capacityFactor).toBe(88.4);
    expect(fleet.statusCounts).toEqual({
      full_power: 0,
      reduced_power: 1,
      low_power: 0,
      offline: 2,
    });
  });

  it('reports diagnostics', () => {
    const { diagnostics } = build();

    expect(diagnostics).toEqual({
      registryRowErrors: registry.rowErrors,
      powerRowErrors: [],
      unitErrors: [],
      unmatchedFeedUnits: ['Ghost Unit'],
      unitsWithoutData: ['Cedar Ridge'],
    });
  });

  it('produces the same artifact for the same inputs', () => {
    expect(build()).toEqual(build());
  });
});
