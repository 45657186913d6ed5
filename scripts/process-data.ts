/**
 * Builds the metrics artifacts (reactors, capacity factors, sites, fleet stats)
 * from the registry and daily power tables.
 */

import {
  formatPolicyError,
  loadPolicyOrDefaults,
  runMetrics,
  writeMetricsArtifacts,
} from '../src/app/index.js';
import { createConfig, parseEnv } from '../src/infra/config/index.js';
import { createLogger } from '../src/infra/logger/index.js';
import { createPowerFeedSource } from '../src/modules/capacity-factors/index.js';
import { createRegistrySource } from '../src/modules/registry/index.js';

const main = async (): Promise<void> => {
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({ ...config.logger, name: 'process-data' });

  const policy = await loadPolicyOrDefaults(config.paths.pipelineConfig, logger);
  if (policy.isErr()) {
    logger.fatal(formatPolicyError(policy.error));
    process.exit(1);
  }

  const metrics = await runMetrics(
    {
      registry: createRegistrySource({ filePath: config.paths.registryCsv }),
      powerFeed: createPowerFeedSource({ filePath: config.paths.powerCsv }),
      logger,
    },
    { policy: policy.value, fallbackAsOf: new Date().toISOString().slice(0, 10) }
  );

  if (metrics.isErr()) {
    logger.fatal({ error: metrics.error.cause }, metrics.error.message);
    process.exit(1);
  }

  const { diagnostics, fleet } = metrics.value;
  const written = await writeMetricsArtifacts(config.paths.dataDir, metrics.value);

  logger.info(
    {
      files: written,
      units: fleet.totalUnits,
      sites: fleet.totalSites,
      capacityGwe: fleet.totalCapacityGwe,
      fleetCapacityFactor: fleet.capacityFactor,
      registryRowErrors: diagnostics.registryRowErrors.length,
      powerRowErrors: diagnostics.powerRowErrors.length,
      unitErrors: diagnostics.unitErrors.length,
      unmatchedFeedUnits: diagnostics.unmatchedFeedUnits.length,
    },
    'Metrics artifacts written'
  );
};

await main().catch((error: unknown) => {
  console.error((error as Error).message);
  process.exit(1);
});
