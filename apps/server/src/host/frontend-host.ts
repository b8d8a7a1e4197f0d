/**
 * Frontend Host - The dashboard front end that branding hooks attach to
 *
 * Exposes the seams a front-end plugin is allowed to touch:
 *
 * - `getTemplate`: replaceable strategy that produces the index template
 *   for a view. Plugins swap it out and restore it later.
 * - `manifest`: the manifest registry served at /manifest.json
 * - `resources()`: the router listing of index views, whose cached
 *   templates can be cleared
 * - `resolveStoragePath()`: maps a path relative to the configuration dir
 * - `runInExecutor()`: dispatches slow work (file system scans) off the
 *   request path
 */

import fs from 'fs';
import { fileURLToPath } from 'url';
import {
  createStoragePathResolver,
  type StoragePathResolver,
} from '@branding/platform';
import { createLogger } from '@branding/utils';
import { ManifestRegistry } from './manifest.js';
import { compileTemplate, type IndexTemplate, type TemplateContext } from './template-engine.js';

const logger = createLogger('FrontendHost');

/** Produces the index template for a view */
export type TemplateProducer = (view: IndexView) => IndexTemplate;

/** Accent color rendered into the default template */
export const DEFAULT_THEME_COLOR = '#03A9F4';

const DEFAULT_TEMPLATE_URL = new URL('../../templates/index.html', import.meta.url);

/**
 * Read the index template shipped with the server
 */
export function loadDefaultIndexTemplate(): string {
  return fs.readFileSync(fileURLToPath(DEFAULT_TEMPLATE_URL), 'utf-8');
}

export interface FrontendHostOptions {
  /** Host configuration directory; local storage lives in `<configDir>/www` */
  configDir: string;
  /** Index template source (defaults to templates/index.html) */
  indexTemplate?: string;
  /** Theme color passed to the template */
  themeColor?: string;
}

/**
 * An index page route. Caches the template produced by the host's current
 * producer until the cache is cleared.
 */
export class IndexView {
  /** Template produced for this view, or null when it must be produced again */
  templateCache: IndexTemplate | null = null;

  constructor(
    private readonly host: FrontendHost,
    readonly urlPath: string
  ) {}

  getTemplate(): IndexTemplate {
    if (!this.templateCache) {
      this.templateCache = this.host.getTemplate(this);
    }
    return this.templateCache;
  }

  render(context: TemplateContext = {}): string {
    return this.getTemplate().render({ theme_color: this.host.themeColor, ...context });
  }
}

export class FrontendHost {
  /** Current template producer; the host's own producer until a plugin replaces it */
  getTemplate: TemplateProducer;

  readonly manifest = new ManifestRegistry();
  readonly resolveStoragePath: StoragePathResolver;
  readonly themeColor: string;

  private readonly views: IndexView[] = [];

  constructor(options: FrontendHostOptions) {
    const source = options.indexTemplate ?? loadDefaultIndexTemplate();
    this.getTemplate = () => compileTemplate(source);
    this.resolveStoragePath = createStoragePathResolver(options.configDir);
    this.themeColor = options.themeColor ?? DEFAULT_THEME_COLOR;
  }

  /**
   * Register an index view at a URL path (e.g. "/" or "/lovelace")
   */
  addIndexView(urlPath: string): IndexView {
    const view = new IndexView(this, urlPath);
    this.views.push(view);
    return view;
  }

  /** Router listing of index views */
  resources(): readonly IndexView[] {
    return this.views;
  }

  /**
   * Drop every view's cached template so the next request goes through the
   * current producer
   */
  clearTemplateCaches(): void {
    for (const view of this.views) {
      view.templateCache = null;
    }
    logger.debug(`Cleared template cache on ${this.views.length} view(s)`);
  }

  /**
   * Run slow work outside the current call stack and wait for its result
   */
  runInExecutor<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      setImmediate(() => {
        task().then(resolve, reject);
      });
    });
  }
}
