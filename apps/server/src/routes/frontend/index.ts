/**
 * Frontend routes - Index page and web app manifest
 *
 * Every registered index view is served at its URL path through the host's
 * current template producer, so installed branding applies on the next
 * request after the template cache is cleared.
 */

import { Router, type Request, type Response } from 'express';
import { createLogger } from '@branding/utils';
import type { FrontendHost, IndexView } from '../../host/frontend-host.js';
import { createLogError, getErrorMessage } from '../common.js';

const logger = createLogger('Frontend');
const logError = createLogError(logger);

export function createIndexHandler(view: IndexView) {
  return (_req: Request, res: Response): void => {
    try {
      res.type('html').send(view.render());
    } catch (error) {
      logError(error, `Render ${view.urlPath} failed`);
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}

export function createManifestHandler(host: FrontendHost) {
  return (_req: Request, res: Response): void => {
    res.type('application/manifest+json').send(JSON.stringify(host.manifest.toJSON()));
  };
}

export function createFrontendRoutes(host: FrontendHost): Router {
  const router = Router();

  router.get('/manifest.json', createManifestHandler(host));
  for (const view of host.resources()) {
    router.get(view.urlPath, createIndexHandler(view));
  }

  return router;
}
