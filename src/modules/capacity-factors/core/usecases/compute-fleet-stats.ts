import { Decimal } from 'decimal.js';

import { mean, roundOrNull, roundTo, weightedMean } from '../statistics.js';

import type { IsoDate } from '../../../../common/types/temporal.js';
import type { LicenseProfile, ReactorUnit, Site } from '../../../registry/index.js';
import type { CapacityFactorSummary, FleetStats, PowerStatus } from '../types.js';

export interface ComputeFleetStatsInput {
  units: readonly ReactorUnit[];
  sites: readonly Site[];
  summaries: ReadonlyMap<string, CapacityFactorSummary>;
  licenses: ReadonlyMap<string, LicenseProfile>;
  asOf: IsoDate;
  decimals: number;
}

const increment = (counts: Record<string, number>, key: string): void => {
  counts[key] = (counts[key] ?? 0) + 1;
};

/**
 * Fleet-wide aggregates. The fleet capacity factor weights each unit's 30-day capacity
 * factor by its rated electrical capacity; units without a 30-day value or without a
 * positive capacity are left out of both sums.
 */
export const computeFleetStats = (input: ComputeFleetStatsInput): FleetStats => {
  const { units, sites, summaries, licenses, asOf, decimals } = input;

  const statusCounts: Record<PowerStatus, number> = {
    full_power: 0,
    reduced_power: 0,
    low_power: 0,
    offline: 0,
  };
  const byTechnology: Record<string, number> = {};
  const byRegion: Record<string, number> = {};
  const licenseStatusCounts: Record<string, number> = {};
  const weighted: { value: number; weight: number }[] = [];
  const ages: number[] = [];

  let totalCapacity = new Decimal(0);

  for (const unit of units) {
    const summary = summaries.get(unit.name);
    const capacity = unit.capacity.electricalMwe;

    totalCapacity = totalCapacity.plus(capacity ?? 0);
    increment(byTechnology, unit.technology);
    if (unit.nrcRegion !== null) {
      increment(byRegion, String(unit.nrcRegion));
    }

    statusCounts[summary?.status ?? 'offline'] += 1;

    const cf30 = summary?.capacityFactor30d ?? null;
    if (cf30 !== null && capacity !== null) {
      weighted.push({ value: cf30, weight: capacity });
    }

    const license = licenses.get(unit.name);
    if (license !== undefined) {
      increment(licenseStatusCounts, license.status);
      if (license.ageYears !== null) {
        ages.push(license.ageYears);
      }
    }
  }

  return {
    totalUnits: units.length,
    totalSites: sites.length,
    multiUnitSites: sites.filter((site) => site.isMultiUnit).length,
    totalCapacityMwe: totalCapacity.toNumber(),
    totalCapacityGwe: roundTo(totalCapacity.div(1000), 1),
    capacityFactor: roundOrNull(weightedMean(weighted), decimals),
    unitsAtFullPower: statusCounts.full_power,
    byTechnology,
    byRegion,
    statusCounts,
    licenseStatusCounts,
    averageAgeYears: roundOrNull(mean(ages), 1),
    dataAsOf: asOf,
  };
};
