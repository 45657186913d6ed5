import { err, ok, type Result } from 'neverthrow';

import { buildMetrics, type MetricsArtifact } from './build-metrics.js';

import type { IsoDate } from '../common/types/temporal.js';
import type { PipelinePolicy } from '../infra/config/index.js';
import type { PowerFeedError, PowerFeedSource } from '../modules/capacity-factors/index.js';
import type { RegistryLoadError, RegistrySource } from '../modules/registry/index.js';
import type { Logger } from 'pino';

export type MetricsPipelineError =
  | { type: 'RegistryUnavailable'; message: string; cause: RegistryLoadError }
  | { type: 'PowerFeedUnavailable'; message: string; cause: PowerFeedError };

export interface RunMetricsDeps {
  registry: RegistrySource;
  powerFeed: PowerFeedSource;
  logger: Logger;
}

/**
 * Loads both tables and builds the metrics. Fails only when a table cannot be read at
 * all; row problems are reported in the artifact's diagnostics.
 */
export const runMetrics = async (
  deps: RunMetricsDeps,
  input: { policy: PipelinePolicy; fallbackAsOf: IsoDate }
): Promise<Result<MetricsArtifact, MetricsPipelineError>> => {
  const { logger } = deps;

  const registry = await deps.registry.load();
  if (registry.isErr()) {
    return err({
      type: 'RegistryUnavailable',
      message: `Reactor registry unavailable: ${registry.error.message}`,
      cause: registry.error,
    });
  }

  const feed = await deps.powerFeed.load();
  if (feed.isErr()) {
    return err({
      type: 'PowerFeedUnavailable',
      message: `Daily power feed unavailable: ${feed.error.message}`,
      cause: feed.error,
    });
  }

  for (const rowError of registry.value.rowErrors) {
    logger.warn({ source: 'registry', ...rowError }, 'Skipped registry row');
  }
  if (feed.value.rowErrors.length > 0) {
    logger.warn(
      {
        source: 'power-feed',
        count: feed.value.rowErrors.length,
        first: feed.value.rowErrors[0],
      },
      'Skipped power feed rows'
    );
  }

  return ok(
    buildMetrics(
      { logger },
      {
        registry: registry.value,
        feed: feed.value,
        policy: input.policy,
        fallbackAsOf: input.fallbackAsOf,
      }
    )
  );
};
