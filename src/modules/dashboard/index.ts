// Use cases
export {
  buildDashboardModel,
  performanceClass,
  siteBaseName,
} from './core/usecases/build-dashboard-model.js';

// Rendering
export {
  renderDashboard,
  serializeForScript,
  inlineScript,
  inlineStyle,
  DEFAULT_TEMPLATES_DIR,
  DEFAULT_TILE_URL,
  DEFAULT_TITLE,
  type RenderOptions,
} from './shell/render-dashboard.js';
export { loadMapAssets, type MapAssets } from './shell/load-map-assets.js';

// Types
export {
  PERFORMER_COUNT,
  SITE_DOCUMENT_COUNT,
  type DashboardInput,
  type DashboardMetrics,
  type DashboardModel,
  type DashboardSite,
  type DashboardUnit,
  type MetricsReactor,
  type PerformanceClass,
  type Performer,
  type SiteDocument,
} from './core/types.js';

// Errors
export {
  createAssetNotFoundError,
  createTemplateError,
  createTemplateNotFoundError,
  type DashboardRenderError,
} from './core/errors.js';
