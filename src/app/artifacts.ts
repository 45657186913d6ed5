/**
 * Artifact locations and readers/writers
 *
 * Every stage writes its output as JSON under the data directory; later stages read
 * only what an earlier stage wrote.
 */

import path from 'node:path';

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';

import { readJsonFile, writeJsonFile } from '../infra/files/index.js';
import {
  SlimFeedArtifactSchema,
  type DocumentFeedArtifact,
  type SlimFeedArtifact,
} from '../modules/documents/index.js';

import type { MetricsArtifact } from './build-metrics.js';

export const ARTIFACT_FILES = {
  reactors: 'reactors.json',
  capacityFactors: 'capacity_factors.json',
  sites: 'sites.json',
  fleetStats: 'fleet_stats.json',
  documents: 'adams_activity.json',
  slimDocuments: 'adams_activity_slim.json',
} as const;

export type ArtifactReadError =
  | { type: 'ReadError'; message: string }
  | { type: 'ParseError'; message: string }
  | { type: 'SchemaValidationError'; message: string; details: string[] };

/**
 * Writes the four metrics artifacts and returns their paths.
 */
export const writeMetricsArtifacts = async (
  dataDir: string,
  metrics: MetricsArtifact
): Promise<string[]> => {
  const outputs: [string, unknown][] = [
    [ARTIFACT_FILES.reactors, metrics.reactors],
    [ARTIFACT_FILES.capacityFactors, metrics.capacityFactors],
    [ARTIFACT_FILES.sites, metrics.sites],
    [ARTIFACT_FILES.fleetStats, metrics.fleet],
  ];

  const written: string[] = [];
  for (const [file, value] of outputs) {
    const filePath = path.join(dataDir, file);
    await writeJsonFile(filePath, value);
    written.push(filePath);
  }
  return written;
};

export const writeDocumentArtifacts = async (
  dataDir: string,
  full: DocumentFeedArtifact,
  slim: SlimFeedArtifact
): Promise<string[]> => {
  const fullPath = path.join(dataDir, ARTIFACT_FILES.documents);
  const slimPath = path.join(dataDir, ARTIFACT_FILES.slimDocuments);
  await writeJsonFile(fullPath, full);
  await writeJsonFile(slimPath, slim);
  return [fullPath, slimPath];
};

const slimValidator = TypeCompiler.Compile(SlimFeedArtifactSchema);

/**
 * Reads the slim document feed. A feed that was never fetched is `ok(null)`.
 */
export const readSlimDocumentFeed = async (
  dataDir: string
): Promise<Result<SlimFeedArtifact | null, ArtifactReadError>> => {
  const filePath = path.join(dataDir, ARTIFACT_FILES.slimDocuments);
  const parsed = await readJsonFile(filePath);
  if (parsed.isErr()) {
    return err(
      parsed.error.type === 'ParseError'
        ? parsed.error
        : { type: 'ReadError', message: parsed.error.message }
    );
  }

  const value = parsed.value;
  if (value === null) {
    return ok(null);
  }

  if (!slimValidator.Check(value)) {
    return err({
      type: 'SchemaValidationError',
      message: `Schema validation failed for ${filePath}`,
      details: Array.from(slimValidator.Errors(value)).map(
        (error) => `${error.path}: ${error.message}`
      ),
    });
  }

  return ok(value);
};
