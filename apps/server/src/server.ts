/**
 * Server assembly - Wires the frontend host, branding hooks and routes
 */

import express, { type Express } from 'express';
import { createLogger } from '@branding/utils';
import type { ServerConfig } from './config.js';
import { FrontendHost } from './host/frontend-host.js';
import { BrandingHooks } from './services/branding-hooks.js';
import { ConfigEntryStore } from './services/config-entry-store.js';
import { BrandingIntegration } from './integration/lifecycle.js';
import { createEventEmitter, type EventEmitter } from './lib/events.js';
import { createBrandingRoutes } from './routes/branding/index.js';
import { createFrontendRoutes } from './routes/frontend/index.js';

const logger = createLogger('Server');

/** Index page routes the dashboard serves */
export const INDEX_PATHS = ['/', '/lovelace', '/config', '/history', '/logbook', '/map'] as const;

export interface BrandingServer {
  app: Express;
  host: FrontendHost;
  hooks: BrandingHooks;
  integration: BrandingIntegration;
  events: EventEmitter;
}

export interface CreateServerOptions {
  /** Index template source; defaults to templates/index.html */
  indexTemplate?: string;
}

export async function createServer(
  config: ServerConfig,
  options: CreateServerOptions = {}
): Promise<BrandingServer> {
  const host = new FrontendHost({
    configDir: config.configDir,
    indexTemplate: options.indexTemplate,
  });
  for (const urlPath of INDEX_PATHS) {
    host.addIndexView(urlPath);
  }

  const events = createEventEmitter();
  events.subscribe((event) => {
    logger.debug(`Event ${event.type}`, event.payload);
  });

  const hooks = new BrandingHooks(host, { sortIconEntries: config.sortIconEntries });
  const store = new ConfigEntryStore(config.dataDir);
  const integration = new BrandingIntegration(hooks, store, events);
  await integration.start();

  const app = express();
  app.use(express.json());
  app.use('/api/branding', createBrandingRoutes(host, integration));
  app.use(createFrontendRoutes(host));

  return { app, host, hooks, integration, events };
}
