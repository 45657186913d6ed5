import { fromThrowable } from 'neverthrow';

import { describeError } from '../../../../common/types/errors.js';
import { emptySummary, summarizeUnit } from './summarize-unit.js';

import type { IsoDate } from '../../../../common/types/temporal.js';
import type {
  AggregatorPolicy,
  CapacityFactorSummary,
  DailyPowerRecord,
  UnitAggregationError,
} from '../types.js';
import type { Logger } from 'pino';

export interface AggregateCapacityFactorsDeps {
  logger: Logger;
}

export interface AggregateCapacityFactorsInput {
  unitNames: readonly string[];
  recordsByUnit: ReadonlyMap<string, readonly DailyPowerRecord[]>;
  asOf: IsoDate;
  policy: AggregatorPolicy;
}

export interface AggregateCapacityFactorsResult {
  summaries: Map<string, CapacityFactorSummary>;
  unitErrors: UnitAggregationError[];
}

/**
 * Summarizes every unit independently. A unit that cannot be summarized gets the empty
 * summary and an entry in `unitErrors`; the batch always completes.
 */
export const aggregateCapacityFactors = (
  deps: AggregateCapacityFactorsDeps,
  input: AggregateCapacityFactorsInput
): AggregateCapacityFactorsResult => {
  const { logger } = deps;
  const summaries = new Map<string, CapacityFactorSummary>();
  const unitErrors: UnitAggregationError[] = [];

  const safeSummarize = fromThrowable(summarizeUnit, describeError);

  for (const unit of input.unitNames) {
    const records = input.recordsByUnit.get(unit) ?? [];
    const result = safeSummarize(records, input.asOf, input.policy);

    if (result.isErr()) {
      logger.error({ unit, error: result.error }, 'Failed to summarize unit');
      unitErrors.push({ unit, message: result.error });
      summaries.set(unit, emptySummary());
      continue;
    }

    if (records.length === 0) {
      logger.debug({ unit }, 'No power records for unit');
    }

    summaries.set(unit, result.value);
  }

  logger.info(
    { units: summaries.size, failed: unitErrors.length, asOf: input.asOf },
    'Capacity factors aggregated'
  );

  return { summaries, unitErrors };
};
