import { Decimal } from 'decimal.js';

import { monthOf, toDayNumber, type IsoDate } from '../../../../common/types/temporal.js';
import { mean, roundOrNull, roundTo } from '../statistics.js';
import {
  CAPACITY_FACTOR_WINDOWS,
  type AggregatorPolicy,
  type CapacityFactorSummary,
  type DailyPowerRecord,
  type MonthlyValue,
  type PowerStatus,
  type Trend,
} from '../types.js';

/**
 * A record placed on the day-number axis.
 */
interface DayPoint {
  day: number;
  date: IsoDate;
  power: number | null;
}

interface Run {
  startDay: number;
  endDay: number;
}

export const emptySummary = (): CapacityFactorSummary => ({
  currentPower: null,
  status: 'offline',
  capacityFactor30d: null,
  capacityFactor90d: null,
  capacityFactor365d: null,
  capacityFactorLifetime: null,
  outageCount: 0,
  outageDays: 0,
  daysSinceLastOutage: null,
  longestFullPowerRunDays: 0,
  monthly: [],
  trend: 'stable',
  recordCount: 0,
  firstDate: null,
  lastDate: null,
});

/**
 * Stable sort by date, then collapse duplicate dates keeping the later record in feed
 * order. Records after `asOf` are dropped.
 */
export const toDaySeries = (records: readonly DailyPowerRecord[], asOf: IsoDate): DayPoint[] => {
  const asOfDay = toDayNumber(asOf);

  const sorted = records
    .map((record, index) => ({ record, index, day: toDayNumber(record.date) }))
    .filter((entry) => entry.day <= asOfDay)
    .sort((a, b) => a.day - b.day || a.index - b.index);

  const series: DayPoint[] = [];
  for (const { record, day } of sorted) {
    const previous = series[series.length - 1];
    const point = { day, date: record.date, power: record.power };
    if (previous?.day === day) {
      series[series.length - 1] = point;
    } else {
      series.push(point);
    }
  }

  return series;
};

export const classifyStatus = (
  power: number | null,
  thresholds: AggregatorPolicy['status']
): PowerStatus => {
  if (power === null) return 'offline';
  if (power >= thresholds.fullPowerMin) return 'full_power';
  if (power >= thresholds.reducedPowerMin) return 'reduced_power';
  if (power > 0) return 'low_power';
  return 'offline';
};

const valuesBetween = (series: readonly DayPoint[], fromDay: number, toDay: number): number[] =>
  series
    .filter((point) => point.day >= fromDay && point.day <= toDay)
    .flatMap((point) => (point.power === null ? [] : [point.power]));

/**
 * Mean of non-null values in the `days` calendar days ending at `endDay` (inclusive).
 * Missing days and null values are left out of the mean.
 */
const windowMean = (series: readonly DayPoint[], endDay: number, days: number): Decimal | null =>
  mean(valuesBetween(series, endDay - days + 1, endDay));

/**
 * Maximal runs of consecutive calendar days matching `predicate`. A gap in the dates or
 * a null value ends a run.
 */
const findRuns = (
  series: readonly DayPoint[],
  predicate: (power: number) => boolean
): Run[] => {
  const runs: Run[] = [];
  let current: Run | null = null;

  for (const point of series) {
    const matches = point.power !== null && predicate(point.power);

    if (!matches) {
      current = null;
      continue;
    }

    if (current !== null && point.day === current.endDay + 1) {
      current.endDay = point.day;
    } else {
      current = { startDay: point.day, endDay: point.day };
      runs.push(current);
    }
  }

  return runs;
};

const runLength = (run: Run): number => run.endDay - run.startDay + 1;

const monthlyMeans = (series: readonly DayPoint[], decimals: number): MonthlyValue[] => {
  const byMonth = new Map<string, number[]>();
  for (const point of series) {
    if (point.power === null) continue;
    const month = monthOf(point.date);
    const values = byMonth.get(month);
    if (values === undefined) {
      byMonth.set(month, [point.power]);
    } else {
      values.push(point.power);
    }
  }

  const monthly: MonthlyValue[] = [];
  for (const [month, values] of byMonth) {
    const value = mean(values);
    if (value !== null) {
      monthly.push({ month, value: roundTo(value, decimals) });
    }
  }
  return monthly;
};

/**
 * Compares the latest trend window with the window right before it.
 */
export const classifyTrend = (
  current: Decimal | null,
  prior: Decimal | null,
  threshold: number
): Trend => {
  if (current === null || prior === null) return 'stable';
  const delta = current.minus(prior);
  if (delta.greaterThan(threshold)) return 'improving';
  if (delta.lessThan(-threshold)) return 'declining';
  return 'stable';
};

/**
 * Capacity-factor summary for one unit's records, relative to the feed as-of date.
 */
export const summarizeUnit = (
  records: readonly DailyPowerRecord[],
  asOf: IsoDate,
  policy: AggregatorPolicy
): CapacityFactorSummary => {
  const series = toDaySeries(records, asOf);
  const first = series[0];
  const last = series[series.length - 1];

  if (first === undefined || last === undefined) {
    return emptySummary();
  }

  const { decimals } = policy.rounding;
  const asOfDay = toDayNumber(asOf);

  const currentPower = last.day === asOfDay ? last.power : null;

  const outages = findRuns(series, (power) => power <= policy.outage.maxPower);
  const lastOutage = outages[outages.length - 1];
  const daysSinceLastOutage =
    lastOutage === undefined
      ? null
      : lastOutage.endDay === asOfDay
        ? 0
        : asOfDay - (lastOutage.endDay + 1);

  const fullPowerRuns = findRuns(series, (power) => power >= policy.status.fullPowerMin);

  const trendDays = policy.trend.windowDays;
  const trend = classifyTrend(
    windowMean(series, asOfDay, trendDays),
    windowMean(series, asOfDay - trendDays, trendDays),
    policy.trend.threshold
  );

  return {
    currentPower,
    status: classifyStatus(currentPower, policy.status),
    capacityFactor30d: roundOrNull(
      windowMean(series, asOfDay, CAPACITY_FACTOR_WINDOWS.capacityFactor30d),
      decimals
    ),
    capacityFactor90d: roundOrNull(
      windowMean(series, asOfDay, CAPACITY_FACTOR_WINDOWS.capacityFactor90d),
      decimals
    ),
    capacityFactor365d: roundOrNull(
      windowMean(series, asOfDay, CAPACITY_FACTOR_WINDOWS.capacityFactor365d),
      decimals
    ),
    capacityFactorLifetime: roundOrNull(
      mean(series.flatMap((point) => (point.power === null ? [] : [point.power]))),
      decimals
    ),
    outageCount: outages.length,
    outageDays: outages.reduce((total, run) => total + runLength(run), 0),
    daysSinceLastOutage,
    longestFullPowerRunDays: fullPowerRuns.reduce((max, run) => Math.max(max, runLength(run)), 0),
    monthly: monthlyMeans(series, decimals),
    trend,
    recordCount: series.length,
    firstDate: first.date,
    lastDate: last.date,
  };
};
