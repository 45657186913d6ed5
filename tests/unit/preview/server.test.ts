import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { buildPreviewServer, resolveDataFile } from '@/modules/preview/index.js';

import type { FastifyInstance } from 'fastify';

describe('resolveDataFile', () => {
  it('resolves plain json names inside the data directory', () => {
    expect(resolveDataFile('/srv/data', 'fleet_stats.json')).toBe('/srv/data/fleet_stats.json');
  });

  it.each(['../secret.json', '.hidden.json', 'sites.csv', 'nested/sites.json', ''])(
    'rejects %j',
    (file) => {
      expect(resolveDataFile('/srv/data', file)).toBeNull();
    }
  );
});

describe('preview server', () => {
  let root: string;
  let app: FastifyInstance;

  beforeAll(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'preview-'));
    await fs.mkdir(path.join(root, 'data'));
    await fs.writeFile(path.join(root, 'index.html'), '<!DOCTYPE html><title>Preview</title>');
    await fs.writeFile(path.join(root, 'data', 'fleet_stats.json'), '{"totalUnits":4}');
    await fs.writeFile(path.join(root, 'secret.json'), '{"marker":"outside-data-dir-7f3a"}');

    app = await buildPreviewServer({
      indexFile: path.join(root, 'index.html'),
      dataDir: path.join(root, 'data'),
    });
  });

  afterAll(async () => {
    await app.close();
    await fs.rm(root, { recursive: true, force: true });
  });

  it('serves the dashboard page', async () => {
    const response = await app.inject({ method: 'GET', url: '/' });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('text/html; charset=utf-8');
    expect(response.body).toBe('<!DOCTYPE html><title>Preview</title>');
  });

  it('serves artifacts from the data directory', async () => {
    const response = await app.inject({ method: 'GET', url: '/data/fleet_stats.json' });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('application/json; charset=utf-8');
    expect(response.json()).toEqual({ totalUnits: 4 });
  });

  it('answers 404 for a missing artifact', async () => {
    const response = await app.inject({ method: 'GET', url: '/data/sites.json' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      error: 'NotFoundError',
      message: 'Artifact sites.json not found',
    });
  });

  it('does not serve files outside the data directory', async () => {
    const response = await app.inject({ method: 'GET', url: '/data/..%2Fsecret.json' });

    expect(response.statusCode).toBe(404);
    expect(response.body).not.toContain('outside-data-dir-7f3a');
  });

  it('answers 404 for unknown routes', async () => {
    const response = await app.inject({ method: 'GET', url: '/admin' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      error: 'NotFoundError',
      message: 'Route GET /admin not found',
    });
  });

  it('answers 404 before the dashboard is built', async () => {
    const empty = await buildPreviewServer({
      indexFile: path.join(root, 'missing.html'),
      dataDir: path.join(root, 'data'),
    });

    const response = await empty.inject({ method: 'GET', url: '/' });
    await empty.close();

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      error: 'NotFoundError',
      message: 'Dashboard has not been built yet',
    });
  });
});
