import { describe, expect, it } from 'vitest';

import { computeFleetStats } from '@/modules/capacity-factors/index.js';
import { deriveSites } from '@/modules/registry/index.js';

import { makeLicense, makeSummary, makeUnit } from '../../fixtures/builders.js';

import type { CapacityFactorSummary } from '@/modules/capacity-factors/index.js';
import type { LicenseProfile, ReactorUnit } from '@/modules/registry/index.js';

const units: ReactorUnit[] = [
  makeUnit({ name: 'A', docketNumber: '05000901', capacity: { electricalMwe: 1000, thermalMwt: null } }),
  makeUnit({ name: 'B', docketNumber: '05000902', capacity: { electricalMwe: 500, thermalMwt: null } }),
  makeUnit({
    name: 'C',
    docketNumber: '05000903',
    technology: 'BWR',
    nrcRegion: 4,
    coordinates: { latitude: 30.2, longitude: -97.3 },
    capacity: { electricalMwe: null, thermalMwt: null },
  }),
  makeUnit({
    name: 'D',
    docketNumber: '05000904',
    nrcRegion: null,
    coordinates: { latitude: 33.1, longitude: -82 },
    capacity: { electricalMwe: 1000, thermalMwt: null },
  }),
];

const summaries = new Map<string, CapacityFactorSummary>([
  ['A', makeSummary({ capacityFactor30d: 90 })],
  ['B', makeSummary({ capacityFactor30d: 60, status: 'reduced_power' })],
  ['C', makeSummary({ capacityFactor30d: 50, status: 'low_power' })],
  ['D', makeSummary({ capacityFactor30d: null, status: 'offline' })],
]);

const licenses = new Map<string, LicenseProfile>([
  ['A', makeLicense({ ageYears: 40 })],
  ['B', makeLicense({ ageYears: 41, status: 'first_renewal', termYears: 60 })],
  ['C', makeLicense({ ageYears: 20 })],
  ['D', makeLicense({ ageYears: null })],
]);

const compute = (list: ReactorUnit[]) =>
  computeFleetStats({
    units: list,
    sites: deriveSites(list),
    summaries,
    licenses,
    asOf: '2024-12-30',
    decimals: 1,
  });

describe('computeFleetStats', () => {
  it('aggregates the fleet', () => {
    expect(compute(units)).toEqual({
      totalUnits: 4,
      totalSites: 3,
      multiUnitSites: 1,
      totalCapacityMwe: 2500,
      totalCapacityGwe: 2.5,
      capacityFactor: 80,
      unitsAtFullPower: 1,
      byTechnology: { PWR: 3, BWR: 1 },
      byRegion: { '3': 2, '4': 1 },
      statusCounts: { full_power: 1, reduced_power: 1, low_power: 1, offline: 1 },
      licenseStatusCounts: { original: 3, first_renewal: 1 },
      averageAgeYears: 33.7,
      dataAsOf: '2024-12-30',
    });
  });

  it('does not depend on unit order', () => {
    expect(compute([...units].reverse())).toEqual(compute(units));
  });

  it('has no fleet capacity factor when no unit qualifies', () => {
    const stats = computeFleetStats({
      units: [units[3] ?? makeUnit()],
      sites: [],
      summaries,
      licenses,
      asOf: '2024-12-30',
      decimals: 1,
    });

    expect(stats.capacityFactor).toBeNull();
  });
});
