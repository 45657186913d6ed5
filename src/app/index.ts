export {
  buildMetrics,
  type BuildMetricsDeps,
  type BuildMetricsInput,
  type MetricsArtifact,
  type MetricsDiagnostics,
  type ReactorRecord,
} from './build-metrics.js';
export { runMetrics, type MetricsPipelineError, type RunMetricsDeps } from './run-metrics.js';
export { loadPolicyOrDefaults, formatPolicyError } from './load-policy.js';
export {
  ARTIFACT_FILES,
  readSlimDocumentFeed,
  writeDocumentArtifacts,
  writeMetricsArtifacts,
  type ArtifactReadError,
} from './artifacts.js';
