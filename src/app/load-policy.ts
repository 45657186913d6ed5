import { err, ok, type Result } from 'neverthrow';

import {
  DEFAULT_PIPELINE_POLICY,
  loadPipelinePolicy,
  type PipelinePolicy,
  type PipelinePolicyError,
} from '../infra/config/index.js';

import type { Logger } from 'pino';

/**
 * Policy from `filePath`, or the defaults when the file does not exist. A file that
 * exists but does not validate is an error.
 */
export const loadPolicyOrDefaults = async (
  filePath: string,
  logger: Logger
): Promise<Result<PipelinePolicy, PipelinePolicyError>> => {
  const loaded = await loadPipelinePolicy(filePath);
  if (loaded.isOk()) {
    logger.debug({ filePath }, 'Pipeline policy loaded');
    return ok(loaded.value);
  }

  if (loaded.error.type === 'NotFound') {
    logger.info({ filePath }, 'No pipeline policy file, using defaults');
    return ok(DEFAULT_PIPELINE_POLICY);
  }

  return err(loaded.error);
};

export const formatPolicyError = (error: PipelinePolicyError): string =>
  error.type === 'SchemaValidationError'
    ? `${error.message}\n  - ${error.details.join('\n  - ')}`
    : error.message;
