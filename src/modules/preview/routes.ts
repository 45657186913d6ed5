/**
 * Preview routes
 * Serves the built dashboard page and the JSON artifacts next to it
 */

import fs from 'node:fs/promises';
import path from 'node:path';

import type { FastifyPluginAsync, FastifyReply } from 'fastify';

export interface PreviewDeps {
  indexFile: string;
  dataDir: string;
}

const JSON_FILE_RE = /^[A-Za-z0-9_-][A-Za-z0-9._-]*\.json$/;

/**
 * Absolute path of an artifact inside `dataDir`, or null when `file` is not a plain
 * `.json` file name.
 */
export const resolveDataFile = (dataDir: string, file: string): string | null => {
  if (!JSON_FILE_RE.test(file)) {
    return null;
  }
  const root = path.resolve(dataDir);
  const resolved = path.resolve(root, file);
  return path.dirname(resolved) === root ? resolved : null;
};

const readOrNull = async (filePath: string): Promise<Buffer | null> => {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT' || code === 'EISDIR') {
      return null;
    }
    throw error;
  }
};

const notFound = (reply: FastifyReply, message: string) =>
  reply.status(404).send({ error: 'NotFoundError', message });

export const makePreviewRoutes = (deps: PreviewDeps): FastifyPluginAsync => {
  const { indexFile, dataDir } = deps;

  return async (fastify) => {
    fastify.get('/', async (_request, reply) => {
      const page = await readOrNull(indexFile);
      if (page === null) {
        return notFound(reply, 'Dashboard has not been built yet');
      }
      return reply.type('text/html; charset=utf-8').send(page);
    });

    fastify.get<{ Params: { file: string } }>('/data/:file', async (request, reply) => {
      const filePath = resolveDataFile(dataDir, request.params.file);
      if (filePath === null) {
        return notFound(reply, `Artifact ${request.params.file} not found`);
      }

      const contents = await readOrNull(filePath);
      if (contents === null) {
        return notFound(reply, `Artifact ${request.params.file} not found`);
      }
      return reply.type('application/json; charset=utf-8').send(contents);
    });
  };
};
