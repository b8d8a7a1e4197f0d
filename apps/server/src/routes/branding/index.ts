/**
 * Branding routes - HTTP API for the branding config and options flows
 *
 * Mounted at /api/branding in the main server.
 */

import { Router } from 'express';
import type { FrontendHost } from '../../host/frontend-host.js';
import type { BrandingIntegration } from '../../integration/lifecycle.js';
import {
  createStartConfigFlowHandler,
  createSubmitConfigFlowHandler,
} from './routes/config-flow.js';
import { createGetOptionsHandler, createSubmitOptionsHandler } from './routes/options.js';
import { createDeleteEntryHandler } from './routes/delete-entry.js';
import { createIconsHandler } from './routes/icons.js';

/**
 * Create branding router with all endpoints
 *
 * Endpoints:
 * - GET    /config-flow   - Start the user step (form or abort)
 * - POST   /config-flow   - Submit the user step
 * - GET    /options       - Options form pre-filled from the entry
 * - POST   /options       - Submit options (updates entry, re-applies hooks)
 * - DELETE /entry         - Remove the entry and restore the host originals
 * - GET    /icons?path=.. - Scan an icon folder
 */
export function createBrandingRoutes(host: FrontendHost, integration: BrandingIntegration): Router {
  const router = Router();

  router.get('/config-flow', createStartConfigFlowHandler(integration));
  router.post('/config-flow', createSubmitConfigFlowHandler(integration));

  router.get('/options', createGetOptionsHandler(integration));
  router.post('/options', createSubmitOptionsHandler(integration));

  router.delete('/entry', createDeleteEntryHandler(integration));

  router.get('/icons', createIconsHandler(host, integration));

  return router;
}
