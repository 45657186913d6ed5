/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Pipeline inputs and outputs
  DATA_DIR: Type.String({ minLength: 1, default: 'data' }),
  REGISTRY_CSV: Type.String({ minLength: 1, default: 'data/reactors_master.csv' }),
  POWER_CSV: Type.String({ minLength: 1, default: 'data/reactor_power_daily.csv' }),
  PIPELINE_CONFIG: Type.String({ minLength: 1, default: 'config/pipeline.yaml' }),
  OUTPUT_HTML: Type.String({ minLength: 1, default: 'index.html' }),

  // Document search
  ADAMS_BASE_URL: Type.String({ minLength: 1 }),
  FETCH_CONCURRENCY: Type.Integer({ minimum: 1, maximum: 16, default: 5 }),
  FETCH_TIMEOUT_MS: Type.Integer({ minimum: 1, default: 20_000 }),

  // Preview server
  PORT: Type.Number({ default: 8080, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '127.0.0.1' }),
});

export type Env = Static<typeof EnvSchema>;

const DEFAULT_ADAMS_BASE_URL = 'https://adams.nrc.gov/wba/services/search/advanced/nrc';

const parseInteger = (value: string | undefined, fallback: number): number =>
  value != null && value !== '' ? Number.parseInt(value, 10) : fallback;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    DATA_DIR: env['DATA_DIR'] ?? 'data',
    REGISTRY_CSV: env['REGISTRY_CSV'] ?? 'data/reactors_master.csv',
    POWER_CSV: env['POWER_CSV'] ?? 'data/reactor_power_daily.csv',
    PIPELINE_CONFIG: env['PIPELINE_CONFIG'] ?? 'config/pipeline.yaml',
    OUTPUT_HTML: env['OUTPUT_HTML'] ?? 'index.html',
    ADAMS_BASE_URL: env['ADAMS_BASE_URL'] ?? DEFAULT_ADAMS_BASE_URL,
    FETCH_CONCURRENCY: parseInteger(env['FETCH_CONCURRENCY'], 5),
    FETCH_TIMEOUT_MS: parseInteger(env['FETCH_TIMEOUT_MS'], 20_000),
    PORT: parseInteger(env['PORT'], 8080),
    HOST: env['HOST'] ?? '127.0.0.1',
  };

  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => ({
  logger: {
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV !== 'production',
  },
  paths: {
    dataDir: env.DATA_DIR,
    registryCsv: env.REGISTRY_CSV,
    powerCsv: env.POWER_CSV,
    pipelineConfig: env.PIPELINE_CONFIG,
    outputHtml: env.OUTPUT_HTML,
  },
  documents: {
    baseUrl: env.ADAMS_BASE_URL,
    /** Upper bound on in-flight search requests */
    concurrency: env.FETCH_CONCURRENCY,
    timeoutMs: env.FETCH_TIMEOUT_MS,
  },
  server: {
    port: env.PORT,
    host: env.HOST,
  },
});

export type AppConfig = ReturnType<typeof createConfig>;
