/**
 * Pipeline policy
 *
 * Thresholds, limits and lookup tables used by the registry loader, the aggregator
 * and the document feed. Read from a YAML file, validated with TypeBox and merged
 * over frozen defaults. Every consumer receives the policy as an argument.
 */

import fs from 'node:fs/promises';

import { Type, type Static } from '@sinclair/typebox';
import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';
import { parse as parseYaml } from 'yaml';

const Percent = Type.Number({ minimum: 0, maximum: 100 });

export const PipelinePolicySchema = Type.Object({
  status: Type.Optional(
    Type.Object({
      fullPowerMin: Type.Optional(Percent),
      reducedPowerMin: Type.Optional(Percent),
    })
  ),
  trend: Type.Optional(
    Type.Object({
      windowDays: Type.Optional(Type.Integer({ minimum: 1 })),
      threshold: Type.Optional(Type.Number({ minimum: 0 })),
    })
  ),
  outage: Type.Optional(
    Type.Object({
      maxPower: Type.Optional(Percent),
    })
  ),
  rounding: Type.Optional(
    Type.Object({
      decimals: Type.Optional(Type.Integer({ minimum: 0, maximum: 6 })),
    })
  ),
  unitAliases: Type.Optional(Type.Record(Type.String(), Type.String())),
  documents: Type.Optional(
    Type.Object({
      docsPerDocket: Type.Optional(Type.Integer({ minimum: 1 })),
      fetchMultiplier: Type.Optional(Type.Integer({ minimum: 1 })),
      maxDocketsPerDocument: Type.Optional(Type.Integer({ minimum: 1 })),
      slim: Type.Optional(
        Type.Object({
          maxDocuments: Type.Optional(Type.Integer({ minimum: 1 })),
          maxTitleLength: Type.Optional(Type.Integer({ minimum: 1 })),
          maxTypeLength: Type.Optional(Type.Integer({ minimum: 1 })),
        })
      ),
    })
  ),
});

export type PipelinePolicyFile = Static<typeof PipelinePolicySchema>;

export interface PipelinePolicy {
  readonly status: { readonly fullPowerMin: number; readonly reducedPowerMin: number };
  readonly trend: { readonly windowDays: number; readonly threshold: number };
  readonly outage: { readonly maxPower: number };
  readonly rounding: { readonly decimals: number };
  readonly unitAliases: Readonly<Record<string, string>>;
  readonly documents: {
    readonly docsPerDocket: number;
    readonly fetchMultiplier: number;
    readonly maxDocketsPerDocument: number;
    readonly slim: {
      readonly maxDocuments: number;
      readonly maxTitleLength: number;
      readonly maxTypeLength: number;
    };
  };
}

export type PipelinePolicyError =
  | { type: 'NotFound'; message: string }
  | { type: 'ReadError'; message: string }
  | { type: 'ParseError'; message: string }
  | { type: 'SchemaValidationError'; message: string; details: string[] }
  | { type: 'InvalidPolicy'; message: string };

const freezePolicy = (policy: PipelinePolicy): PipelinePolicy =>
  Object.freeze({
    status: Object.freeze({ ...policy.status }),
    trend: Object.freeze({ ...policy.trend }),
    outage: Object.freeze({ ...policy.outage }),
    rounding: Object.freeze({ ...policy.rounding }),
    unitAliases: Object.freeze({ ...policy.unitAliases }),
    documents: Object.freeze({
      ...policy.documents,
      slim: Object.freeze({ ...policy.documents.slim }),
    }),
  });

export const DEFAULT_PIPELINE_POLICY: PipelinePolicy = freezePolicy({
  status: { fullPowerMin: 95, reducedPowerMin: 50 },
  trend: { windowDays: 30, threshold: 2 },
  outage: { maxPower: 0 },
  rounding: { decimals: 1 },
  unitAliases: {},
  documents: {
    docsPerDocket: 5,
    fetchMultiplier: 10,
    maxDocketsPerDocument: 5,
    slim: { maxDocuments: 3, maxTitleLength: 150, maxTypeLength: 50 },
  },
});

/**
 * Merges a (partial) policy file over the defaults.
 */
export const resolvePipelinePolicy = (
  file: PipelinePolicyFile,
  defaults: PipelinePolicy = DEFAULT_PIPELINE_POLICY
): Result<PipelinePolicy, PipelinePolicyError> => {
  const policy: PipelinePolicy = {
    status: { ...defaults.status, ...file.status },
    trend: { ...defaults.trend, ...file.trend },
    outage: { ...defaults.outage, ...file.outage },
    rounding: { ...defaults.rounding, ...file.rounding },
    unitAliases: { ...defaults.unitAliases, ...file.unitAliases },
    documents: {
      ...defaults.documents,
      ...file.documents,
      slim: { ...defaults.documents.slim, ...file.documents?.slim },
    },
  };

  if (policy.status.reducedPowerMin > policy.status.fullPowerMin) {
    return err({
      type: 'InvalidPolicy',
      message: `status.reducedPowerMin (${String(policy.status.reducedPowerMin)}) must not exceed status.fullPowerMin (${String(policy.status.fullPowerMin)})`,
    });
  }

  return ok(freezePolicy(policy));
};

const validator = TypeCompiler.Compile(PipelinePolicySchema);

/**
 * Reads and validates a YAML policy file.
 */
export const loadPipelinePolicy = async (
  filePath: string
): Promise<Result<PipelinePolicy, PipelinePolicyError>> => {
  let contents: string;

  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      return err({ type: 'NotFound', message: `Pipeline policy not found at ${filePath}` });
    }

    return err({
      type: 'ReadError',
      message: `Failed to read pipeline policy at ${filePath}: ${(error as Error).message}`,
    });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(contents) ?? {};
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse YAML at ${filePath}: ${(error as Error).message}`,
    });
  }

  if (!validator.Check(parsed)) {
    const details = Array.from(validator.Errors(parsed)).map(
      (error) => `${error.path}: ${error.message}`
    );
    return err({
      type: 'SchemaValidationError',
      message: `Schema validation failed for ${filePath}`,
      details,
    });
  }

  return resolvePipelinePolicy(parsed);
};
