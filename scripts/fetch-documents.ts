/**
 * Fetches recent regulatory documents for every registry docket and writes the full
 * and slimmed document feeds.
 */

import {
  formatPolicyError,
  loadPolicyOrDefaults,
  writeDocumentArtifacts,
} from '../src/app/index.js';
import { createConfig, parseEnv } from '../src/infra/config/index.js';
import { createChildLogger, createLogger } from '../src/infra/logger/index.js';
import {
  buildDocumentFeeds,
  createAdamsSearchClient,
  slimDocumentFeed,
} from '../src/modules/documents/index.js';
import { createRegistrySource } from '../src/modules/registry/index.js';

const main = async (): Promise<void> => {
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({ ...config.logger, name: 'fetch-documents' });

  const policy = await loadPolicyOrDefaults(config.paths.pipelineConfig, logger);
  if (policy.isErr()) {
    logger.fatal(formatPolicyError(policy.error));
    process.exit(1);
  }

  const registry = await createRegistrySource({ filePath: config.paths.registryCsv }).load();
  if (registry.isErr()) {
    logger.fatal({ error: registry.error }, 'Reactor registry unavailable');
    process.exit(1);
  }

  const client = createAdamsSearchClient({
    baseUrl: config.documents.baseUrl,
    timeoutMs: config.documents.timeoutMs,
    logger: createChildLogger(logger, 'document-search'),
  });

  const { documents } = policy.value;
  const full = await buildDocumentFeeds(
    {
      client,
      logger,
      policy: {
        docsPerDocket: documents.docsPerDocket,
        fetchMultiplier: documents.fetchMultiplier,
        maxDocketsPerDocument: documents.maxDocketsPerDocument,
        concurrency: config.documents.concurrency,
      },
      now: () => new Date(),
    },
    registry.value.units.map((unit) => ({ docket: unit.docketNumber, name: unit.name }))
  );

  const slim = slimDocumentFeed(full, documents.slim);
  const written = await writeDocumentArtifacts(config.paths.dataDir, full, slim);

  logger.info(
    {
      files: written,
      totalDocuments: full.totalDocuments,
      slimDocuments: slim.totalDocuments,
      reactorsWithActivity: full.reactorsWithActivity,
      failedDockets: full.failedDockets,
    },
    'Document feeds written'
  );
};

await main().catch((error: unknown) => {
  console.error((error as Error).message);
  process.exit(1);
});
