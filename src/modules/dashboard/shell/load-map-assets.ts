import fs from 'node:fs/promises';
import { createRequire } from 'node:module';

import { err, ok, type Result } from 'neverthrow';

import { createAssetNotFoundError, type DashboardRenderError } from '../core/errors.js';

export interface MapAssets {
  leafletCss: string;
  leafletJs: string;
}

const require = createRequire(import.meta.url);

const readPackageFile = async (
  specifier: string
): Promise<Result<string, DashboardRenderError>> => {
  try {
    const resolved = require.resolve(specifier);
    return ok(await fs.readFile(resolved, 'utf8'));
  } catch (error) {
    return err(
      createAssetNotFoundError(specifier, `Cannot load ${specifier}: ${(error as Error).message}`)
    );
  }
};

/**
 * Leaflet's stylesheet and script from the installed package, so the page works
 * without a CDN.
 */
export const loadMapAssets = async (): Promise<Result<MapAssets, DashboardRenderError>> => {
  const css = await readPackageFile('leaflet/dist/leaflet.css');
  if (css.isErr()) return err(css.error);

  const js = await readPackageFile('leaflet/dist/leaflet.js');
  if (js.isErr()) return err(js.error);

  return ok({ leafletCss: css.value, leafletJs: js.value });
};
