/**
 * Metrics builder
 *
 * Registry + daily power feed -> per-unit summaries, sites and fleet statistics.
 * Pure apart from logging: the same inputs always produce the same artifact.
 */

import {
  aggregateCapacityFactors,
  computeFleetStats,
  groupRecordsByUnit,
  latestFeedDate,
  matchFeedUnits,
  type CapacityFactorSummary,
  type FleetStats,
  type PowerFeedLoadResult,
  type UnitAggregationError,
} from '../modules/capacity-factors/index.js';
import {
  deriveLicenseProfile,
  deriveSites,
  type LicenseProfile,
  type ReactorUnit,
  type RegistryLoadResult,
  type Site,
} from '../modules/registry/index.js';

import type { RowError } from '../common/types/errors.js';
import type { IsoDate } from '../common/types/temporal.js';
import type { PipelinePolicy } from '../infra/config/index.js';
import type { Logger } from 'pino';

export interface ReactorRecord extends ReactorUnit {
  siteKey: string;
  feedName: string | null;
  license: LicenseProfile;
  performance: CapacityFactorSummary;
}

export interface MetricsDiagnostics {
  registryRowErrors: RowError[];
  powerRowErrors: RowError[];
  unitErrors: UnitAggregationError[];
  unmatchedFeedUnits: string[];
  unitsWithoutData: string[];
}

export interface MetricsArtifact {
  asOf: IsoDate;
  reactors: ReactorRecord[];
  capacityFactors: Record<string, CapacityFactorSummary>;
  sites: Site[];
  fleet: FleetStats;
  diagnostics: MetricsDiagnostics;
}

export interface BuildMetricsDeps {
  logger: Logger;
}

export interface BuildMetricsInput {
  registry: RegistryLoadResult;
  feed: PowerFeedLoadResult;
  policy: PipelinePolicy;
  /** Used as the as-of date only when the feed has no records at all */
  fallbackAsOf: IsoDate;
}

export const buildMetrics = (deps: BuildMetricsDeps, input: BuildMetricsInput): MetricsArtifact => {
  const { logger } = deps;
  const { registry, feed, policy } = input;
  const { units } = registry;

  const asOf = latestFeedDate(feed.records) ?? input.fallbackAsOf;

  const sites = deriveSites(units);
  const siteByUnit = new Map<string, string>();
  for (const site of sites) {
    for (const name of site.unitNames) {
      siteByUnit.set(name, site.key);
    }
  }

  const unitNames = units.map((unit) => unit.name);
  const match = matchFeedUnits(unitNames, groupRecordsByUnit(feed.records), policy.unitAliases);

  if (match.unmatchedFeedUnits.length > 0) {
    logger.warn(
      { units: match.unmatchedFeedUnits },
      'Power feed units without a registry match'
    );
  }

  const { summaries, unitErrors } = aggregateCapacityFactors(
    { logger },
    { unitNames, recordsByUnit: match.recordsByUnit, asOf, policy }
  );

  const licenses = new Map<string, LicenseProfile>(
    units.map((unit) => [unit.name, deriveLicenseProfile(unit, asOf)])
  );

  const reactors: ReactorRecord[] = [];
  const capacityFactors: Record<string, CapacityFactorSummary> = {};
  const unitsWithoutData: string[] = [];

  for (const unit of units) {
    const performance = summaries.get(unit.name);
    const license = licenses.get(unit.name);
    if (performance === undefined || license === undefined) {
      continue;
    }

    if (performance.recordCount === 0) {
      unitsWithoutData.push(unit.name);
    }

    capacityFactors[unit.name] = performance;
    reactors.push({
      ...unit,
      siteKey: siteByUnit.get(unit.name) ?? '',
      feedName: match.feedNames.get(unit.name) ?? null,
      license,
      performance,
    });
  }

  const fleet = computeFleetStats({
    units,
    sites,
    summaries,
    licenses,
    asOf,
    decimals: policy.rounding.decimals,
  });

  logger.info(
    {
      asOf,
      units: units.length,
      sites: sites.length,
      fleetCapacityFactor: fleet.capacityFactor,
      unitsWithoutData: unitsWithoutData.length,
    },
    'Metrics built'
  );

  return {
    asOf,
    reactors,
    capacityFactors,
    sites,
    fleet,
    diagnostics: {
      registryRowErrors: registry.rowErrors,
      powerRowErrors: feed.rowErrors,
      unitErrors,
      unmatchedFeedUnits: match.unmatchedFeedUnits,
      unitsWithoutData,
    },
  };
};
