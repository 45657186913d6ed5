/**
 * Dashboard renderer
 *
 * Compiles the Handlebars page template (with its partials) once per templates
 * directory and renders a self-contained HTML document.
 */

import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import Handlebars, { type TemplateDelegate } from 'handlebars';
import { err, ok, type Result } from 'neverthrow';

import {
  createTemplateError,
  createTemplateNotFoundError,
  type DashboardRenderError,
} from '../core/errors.js';

import type { DashboardModel } from '../core/types.js';
import type { MapAssets } from './load-map-assets.js';

export const DEFAULT_TILE_URL = 'https://{s}.tile.openstreetmap.org/{z}/{x}/{y}.png';
export const DEFAULT_TITLE = 'Reactor Fleet Dashboard';

export interface RenderOptions {
  title?: string;
  tileUrl?: string;
  templatesDir?: string;
}

interface PageContext {
  title: string;
  model: DashboardModel;
  leafletCss: string;
  leafletJs: string;
  pageData: string;
}

type PageTemplate = TemplateDelegate<PageContext>;

export const DEFAULT_TEMPLATES_DIR = fileURLToPath(new URL('./templates', import.meta.url));

const compiled = new Map<string, PageTemplate>();

/**
 * JSON that can sit inside an inline `<script>` element: nothing in it can close the
 * element or open a comment, and line separators are escaped for older parsers.
 */
export const serializeForScript = (value: unknown): string =>
  JSON.stringify(value)
    .replace(/</g, '\\u003c')
    .replace(/>/g, '\\u003e')
    .replace(/&/g, '\\u0026')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029');

/**
 * Script source for an inline `<script>` element.
 */
export const inlineScript = (source: string): string => source.replace(/<\/(script)/gi, '<\\/$1');

/**
 * Inline `<style>` contents.
 */
export const inlineStyle = (source: string): string => source.replace(/<\/(style)/gi, '<\\/$1');

const formatPercent = (value: unknown): string =>
  typeof value === 'number' && Number.isFinite(value) ? `${value.toFixed(1)}%` : 'N/A';

const formatNumber = (value: unknown): string =>
  typeof value === 'number' && Number.isFinite(value) ? value.toLocaleString('en-US') : '--';

const createEnvironment = (templatesDir: string): typeof Handlebars => {
  const env = Handlebars.create();

  env.registerHelper('percent', formatPercent);
  env.registerHelper('number', formatNumber);
  env.registerHelper('count', (counts: unknown, key: unknown) => {
    if (typeof counts !== 'object' || counts === null || typeof key !== 'string') return 0;
    const value: unknown = Object.entries(counts).find(([name]) => name === key)?.[1];
    return typeof value === 'number' ? value : 0;
  });

  const partialsDir = path.join(templatesDir, 'partials');
  if (fs.existsSync(partialsDir)) {
    for (const file of fs.readdirSync(partialsDir).filter((name) => name.endsWith('.hbs'))) {
      env.registerPartial(
        path.basename(file, '.hbs'),
        fs.readFileSync(path.join(partialsDir, file), 'utf8')
      );
    }
  }

  return env;
};

const getTemplate = (templatesDir: string): Result<PageTemplate, DashboardRenderError> => {
  const cached = compiled.get(templatesDir);
  if (cached !== undefined) return ok(cached);

  const filePath = path.join(templatesDir, 'dashboard.hbs');
  if (!fs.existsSync(filePath)) {
    return err(createTemplateNotFoundError(`Dashboard template not found: ${filePath}`));
  }

  try {
    const env = createEnvironment(templatesDir);
    const template = env.compile<PageContext>(fs.readFileSync(filePath, 'utf8'));
    compiled.set(templatesDir, template);
    return ok(template);
  } catch (error) {
    return err(createTemplateError(`Failed to compile ${filePath}: ${(error as Error).message}`));
  }
};

export const renderDashboard = (
  model: DashboardModel,
  assets: MapAssets,
  options: RenderOptions = {}
): Result<string, DashboardRenderError> => {
  const templatesDir = options.templatesDir ?? DEFAULT_TEMPLATES_DIR;
  const template = getTemplate(templatesDir);
  if (template.isErr()) return err(template.error);

  const context: PageContext = {
    title: options.title ?? DEFAULT_TITLE,
    model,
    leafletCss: inlineStyle(assets.leafletCss),
    leafletJs: inlineScript(assets.leafletJs),
    pageData: serializeForScript({
      tileUrl: options.tileUrl ?? DEFAULT_TILE_URL,
      sites: model.sites,
    }),
  };

  try {
    return ok(template.value(context));
  } catch (error) {
    return err(createTemplateError(`Failed to render dashboard: ${(error as Error).message}`));
  }
};
