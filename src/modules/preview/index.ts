export { buildPreviewServer, type PreviewServerOptions } from './server.js';
export { makePreviewRoutes, resolveDataFile, type PreviewDeps } from './routes.js';
