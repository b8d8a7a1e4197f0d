/**
 * GET/POST /config-flow endpoints - Create the branding entry
 *
 * GET returns the initial form (or an abort when an entry already exists).
 * POST submits the form body. Invalid input comes back as a form with
 * per-field errors and status 400.
 */

import type { Request, Response } from 'express';
import type { ConfigFlowResult } from '@branding/types';
import { BrandingConfigFlow } from '../../../integration/config-flow.js';
import type { BrandingIntegration } from '../../../integration/lifecycle.js';
import { getErrorMessage, logError } from '../common.js';

/** HTTP status for a flow step result */
export function statusForResult(result: ConfigFlowResult, submitted: boolean): number {
  if (result.type === 'abort') return 409;
  if (result.type === 'form' && submitted) return 400;
  return 200;
}

export function createStartConfigFlowHandler(integration: BrandingIntegration) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const result = await new BrandingConfigFlow(integration).stepUser();
      res.status(statusForResult(result, false)).json({
        success: result.type !== 'abort',
        result,
      });
    } catch (error) {
      logError(error, 'Start config flow failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}

export function createSubmitConfigFlowHandler(integration: BrandingIntegration) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const body: unknown = req.body;
      if (!body || typeof body !== 'object') {
        res.status(400).json({ success: false, error: 'form body is required' });
        return;
      }

      const result = await new BrandingConfigFlow(integration).stepUser(body);
      res.status(statusForResult(result, true)).json({
        success: result.type === 'create_entry',
        result,
      });
    } catch (error) {
      logError(error, 'Submit config flow failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
