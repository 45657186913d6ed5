import type { RowError } from '../../../common/types/errors.js';
import type { IsoDate, IsoMonth } from '../../../common/types/temporal.js';

/**
 * One row of the daily power feed. `power` is percent of rated output; null means the
 * feed has no value for that day.
 */
export interface DailyPowerRecord {
  date: IsoDate;
  unit: string;
  power: number | null;
}

export interface PowerFeedLoadResult {
  records: DailyPowerRecord[];
  rowErrors: RowError[];
}

export const REQUIRED_POWER_COLUMNS = ['Date', 'Unit', 'Power'] as const;

export type PowerStatus = 'full_power' | 'reduced_power' | 'low_power' | 'offline';

export type Trend = 'improving' | 'stable' | 'declining';

export interface MonthlyValue {
  month: IsoMonth;
  value: number;
}

export interface CapacityFactorSummary {
  currentPower: number | null;
  status: PowerStatus;
  capacityFactor30d: number | null;
  capacityFactor90d: number | null;
  capacityFactor365d: number | null;
  capacityFactorLifetime: number | null;
  outageCount: number;
  outageDays: number;
  /** Days from the end of the latest outage to the as-of date; 0 while in an outage */
  daysSinceLastOutage: number | null;
  longestFullPowerRunDays: number;
  monthly: MonthlyValue[];
  trend: Trend;
  recordCount: number;
  firstDate: IsoDate | null;
  lastDate: IsoDate | null;
}

/**
 * Thresholds the aggregator runs with. Matches the shape of the pipeline policy so the
 * resolved policy can be passed straight through.
 */
export interface AggregatorPolicy {
  readonly status: { readonly fullPowerMin: number; readonly reducedPowerMin: number };
  readonly trend: { readonly windowDays: number; readonly threshold: number };
  readonly outage: { readonly maxPower: number };
  readonly rounding: { readonly decimals: number };
}

/** Trailing windows reported on every summary */
export const CAPACITY_FACTOR_WINDOWS = {
  capacityFactor30d: 30,
  capacityFactor90d: 90,
  capacityFactor365d: 365,
} as const;

export interface UnitAggregationError {
  unit: string;
  message: string;
}

export interface FleetStats {
  totalUnits: number;
  totalSites: number;
  multiUnitSites: number;
  totalCapacityMwe: number;
  totalCapacityGwe: number;
  /** Capacity-weighted mean of unit 30-day capacity factors */
  capacityFactor: number | null;
  unitsAtFullPower: number;
  byTechnology: Record<string, number>;
  byRegion: Record<string, number>;
  statusCounts: Record<PowerStatus, number>;
  licenseStatusCounts: Record<string, number>;
  averageAgeYears: number | null;
  dataAsOf: IsoDate;
}
