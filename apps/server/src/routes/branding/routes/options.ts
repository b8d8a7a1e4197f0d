/**
 * GET/POST /options endpoints - Edit the branding entry
 *
 * GET returns the form pre-filled from the entry data. POST updates the
 * entry and re-applies the hooks before responding.
 */

import type { Request, Response } from 'express';
import { BrandingOptionsFlow } from '../../../integration/config-flow.js';
import type { BrandingIntegration } from '../../../integration/lifecycle.js';
import { getErrorMessage, logError } from '../common.js';
import { statusForResult } from './config-flow.js';

export function createGetOptionsHandler(integration: BrandingIntegration) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const result = await new BrandingOptionsFlow(integration).stepInit();
      res.status(result.type === 'abort' ? 404 : 200).json({
        success: result.type !== 'abort',
        result,
      });
    } catch (error) {
      logError(error, 'Get options failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}

export function createSubmitOptionsHandler(integration: BrandingIntegration) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const body: unknown = req.body;
      if (!body || typeof body !== 'object') {
        res.status(400).json({ success: false, error: 'form body is required' });
        return;
      }

      const result = await new BrandingOptionsFlow(integration).stepInit(body);
      const status = result.type === 'abort' ? 404 : statusForResult(result, true);
      res.status(status).json({
        success: result.type === 'create_entry',
        result,
      });
    } catch (error) {
      logError(error, 'Submit options failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
