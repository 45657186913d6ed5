export { EnvSchema, parseEnv, createConfig, type Env, type AppConfig } from './env.js';
export {
  PipelinePolicySchema,
  DEFAULT_PIPELINE_POLICY,
  resolvePipelinePolicy,
  loadPipelinePolicy,
  type PipelinePolicy,
  type PipelinePolicyFile,
  type PipelinePolicyError,
} from './pipeline-policy.js';
