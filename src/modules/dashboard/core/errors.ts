export type DashboardRenderError =
  | { type: 'TemplateNotFound'; message: string }
  | { type: 'TemplateError'; message: string }
  | { type: 'AssetNotFound'; message: string; asset: string };

export const createTemplateNotFoundError = (message: string): DashboardRenderError => ({
  type: 'TemplateNotFound',
  message,
});

export const createTemplateError = (message: string): DashboardRenderError => ({
  type: 'TemplateError',
  message,
});

export const createAssetNotFoundError = (asset: string, message: string): DashboardRenderError => ({
  type: 'AssetNotFound',
  message,
  asset,
});
