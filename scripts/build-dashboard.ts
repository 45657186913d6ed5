/**
 * Renders the self-contained dashboard page from the metrics and the slimmed
 * document feed.
 */

import {
  formatPolicyError,
  loadPolicyOrDefaults,
  readSlimDocumentFeed,
  runMetrics,
} from '../src/app/index.js';
import { createConfig, parseEnv } from '../src/infra/config/index.js';
import { writeTextFile } from '../src/infra/files/index.js';
import { createLogger } from '../src/infra/logger/index.js';
import { createPowerFeedSource } from '../src/modules/capacity-factors/index.js';
import {
  buildDashboardModel,
  loadMapAssets,
  renderDashboard,
} from '../src/modules/dashboard/index.js';
import { createRegistrySource } from '../src/modules/registry/index.js';

const main = async (): Promise<void> => {
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({ ...config.logger, name: 'build-dashboard' });

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

  const documents = await readSlimDocumentFeed(config.paths.dataDir);
  if (documents.isErr()) {
    logger.fatal({ error: documents.error }, 'Document feed unreadable');
    process.exit(1);
  }
  if (documents.value === null) {
    logger.warn('No document feed found, building the dashboard without documents');
  }

  const assets = await loadMapAssets();
  if (assets.isErr()) {
    logger.fatal({ error: assets.error }, assets.error.message);
    process.exit(1);
  }

  const model = buildDashboardModel({ metrics: metrics.value, documents: documents.value });
  const html = renderDashboard(model, assets.value);
  if (html.isErr()) {
    logger.fatal({ error: html.error }, html.error.message);
    process.exit(1);
  }

  await writeTextFile(config.paths.outputHtml, html.value);
  logger.info(
    { file: config.paths.outputHtml, sites: model.sites.length, bytes: html.value.length },
    'Dashboard written'
  );
};

await main().catch((error: unknown) => {
  console.error((error as Error).message);
  process.exit(1);
});
