/**
 * Serves the built dashboard and the data artifacts for local preview.
 */

import { createConfig, parseEnv } from '../src/infra/config/index.js';
import { createLogger } from '../src/infra/logger/index.js';
import { buildPreviewServer } from '../src/modules/preview/index.js';

const main = async (): Promise<void> => {
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({ ...config.logger, name: 'serve' });

  const app = await buildPreviewServer({
    indexFile: config.paths.outputHtml,
    dataDir: config.paths.dataDir,
    fastifyOptions: {
      logger: {
        level: config.logger.level,
        ...(config.logger.pretty && {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          },
        }),
      },
    },
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');
    try {
      await app.close();
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  const address = await app.listen({ port: config.server.port, host: config.server.host });
  logger.info({ address }, 'Dashboard preview running');
};

await main().catch((error: unknown) => {
  console.error((error as Error).message);
  process.exit(1);
});
