/**
 * Preview server factory
 */

import fastifyLib, {
  type FastifyError,
  type FastifyInstance,
  type FastifyServerOptions,
} from 'fastify';

import { makePreviewRoutes, type PreviewDeps } from './routes.js';

export interface PreviewServerOptions extends PreviewDeps {
  fastifyOptions?: FastifyServerOptions;
}

export const buildPreviewServer = async (
  options: PreviewServerOptions
): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, ...deps } = options;

  const app = fastifyLib({
    ...fastifyOptions,
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request error');

    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: error.name,
        message: error.message,
      });
    }

    return reply.status(500).send({
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  await app.register(makePreviewRoutes(deps));

  return app;
};
