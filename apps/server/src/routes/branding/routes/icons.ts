/**
 * GET /icons endpoint - Scan an icon folder
 *
 * Query params:
 * - path (optional) - Web path to scan; defaults to the entry's icon_path
 *
 * Responds with the discovered IconSet. Configuration and lookup problems
 * are reported in `error` next to an empty icon set, with status 200, since
 * the hooks treat them as "no icons".
 */

import type { Request, Response } from 'express';
import { scanIconFolder } from '@branding/platform';
import { ConfigurationError, LookupError } from '@branding/utils';
import type { FrontendHost } from '../../../host/frontend-host.js';
import type { BrandingIntegration } from '../../../integration/lifecycle.js';
import { getErrorMessage, logError } from '../common.js';

export function createIconsHandler(host: FrontendHost, integration: BrandingIntegration) {
  return async (req: Request, res: Response): Promise<void> => {
    const queryPath = typeof req.query.path === 'string' ? req.query.path : undefined;
    const iconPath = queryPath ?? integration.getEntry()?.data.icon_path;

    try {
      const icons = await host.runInExecutor(() =>
        scanIconFolder(iconPath, { resolveStoragePath: host.resolveStoragePath })
      );
      res.json({ success: true, path: iconPath ?? null, icons });
    } catch (error) {
      if (error instanceof ConfigurationError || error instanceof LookupError) {
        res.json({ success: false, path: iconPath ?? null, icons: {}, error: error.message });
        return;
      }
      logError(error, 'Scan icons failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
