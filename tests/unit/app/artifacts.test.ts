import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  ARTIFACT_FILES,
  buildMetrics,
  readSlimDocumentFeed,
  writeDocumentArtifacts,
  writeMetricsArtifacts,
} from '@/app/index.js';

import { makeRecords, makeUnit, testLogger, testPolicy } from '../../fixtures/builders.js';

import type { DocumentFeedArtifact, SlimFeedArtifact } from '@/modules/documents/index.js';

const slim: SlimFeedArtifact = {
  fetchedAt: '2024-03-01T12:00:00.000Z',
  totalDocuments: 1,
  categoryTotals: { Inspection: 1 },
  byDocket: {
    '05000901': {
      name: 'Test Unit 1',
      lastActivity: '2024-01-16',
      documents: [
        {
          title: 'Inspection Report',
          accession: 'ML24001A001',
          date: '2024-01-15',
          type: 'Inspection Report',
          category: 'Inspection',
          url: null,
        },
      ],
      categories: { Inspection: 1 },
    },
  },
};

const full: DocumentFeedArtifact = {
  fetchedAt: '2024-03-01T12:00:00.000Z',
  totalDocuments: 0,
  reactorsWithActivity: 0,
  categoryTotals: {},
  failedDockets: [],
  byDocket: {},
};

describe('artifacts', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'artifacts-'));
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it('writes the four metrics files', async () => {
    const metrics = buildMetrics(
      { logger: testLogger },
      {
        registry: { units: [makeUnit()], rowErrors: [] },
        feed: { records: makeRecords('Test Unit 1', '2024-01-01', [100]), rowErrors: [] },
        policy: testPolicy,
        fallbackAsOf: '2024-01-01',
      }
    );

    const written = await writeMetricsArtifacts(dataDir, metrics);

    expect(written).toEqual([
      path.join(dataDir, 'reactors.json'),
      path.join(dataDir, 'capacity_factors.json'),
      path.join(dataDir, 'sites.json'),
      path.join(dataDir, 'fleet_stats.json'),
    ]);
    const fleet: unknown = JSON.parse(
      await fs.readFile(path.join(dataDir, ARTIFACT_FILES.fleetStats), 'utf8')
    );
    expect(fleet).toEqual(metrics.fleet);
  });

  it('reads back the slim document feed it wrote', async () => {
    await writeDocumentArtifacts(dataDir, full, slim);

    expect((await readSlimDocumentFeed(dataDir))._unsafeUnwrap()).toEqual(slim);
  });

  it('reads a feed that was never fetched as null', async () => {
    expect((await readSlimDocumentFeed(dataDir))._unsafeUnwrap()).toBeNull();
  });

  it('rejects a slim feed with the wrong shape', async () => {
    await fs.writeFile(
      path.join(dataDir, ARTIFACT_FILES.slimDocuments),
      JSON.stringify({ fetchedAt: 5 })
    );

    const error = (await readSlimDocumentFeed(dataDir))._unsafeUnwrapErr();

    expect(error.type).toBe('SchemaValidationError');
  });

  it('rejects malformed JSON', async () => {
    await fs.writeFile(path.join(dataDir, ARTIFACT_FILES.slimDocuments), '{"fetchedAt":');

    expect((await readSlimDocumentFeed(dataDir))._unsafeUnwrapErr().type).toBe('ParseError');
  });
});
