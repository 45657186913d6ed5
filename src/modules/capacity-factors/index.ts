// Source
export { createPowerFeedSource, type PowerFeedSourceOptions } from './shell/repo/csv-power-source.js';
export type { PowerFeedSource } from './core/ports.js';

// Use cases
export {
  parsePowerFeedCsv,
  parsePowerRows,
  groupRecordsByUnit,
  latestFeedDate,
} from './core/usecases/parse-power-feed.js';
export {
  summarizeUnit,
  emptySummary,
  classifyStatus,
  classifyTrend,
  toDaySeries,
} from './core/usecases/summarize-unit.js';
export {
  aggregateCapacityFactors,
  type AggregateCapacityFactorsDeps,
  type AggregateCapacityFactorsInput,
  type AggregateCapacityFactorsResult,
} from './core/usecases/aggregate-capacity-factors.js';
export { matchFeedUnits, resolveFeedName, type FeedMatch } from './core/usecases/match-feed-units.js';
export { computeFleetStats, type ComputeFleetStatsInput } from './core/usecases/compute-fleet-stats.js';
export { mean, weightedMean, roundTo, roundOrNull } from './core/statistics.js';

// Types
export {
  CAPACITY_FACTOR_WINDOWS,
  REQUIRED_POWER_COLUMNS,
  type AggregatorPolicy,
  type CapacityFactorSummary,
  type DailyPowerRecord,
  type FleetStats,
  type MonthlyValue,
  type PowerFeedLoadResult,
  type PowerStatus,
  type Trend,
  type UnitAggregationError,
} from './core/types.js';

// Errors
export type { PowerFeedError } from './core/errors.js';
