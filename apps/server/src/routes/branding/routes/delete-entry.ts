/**
 * DELETE /entry endpoint - Remove the branding entry
 *
 * Restores the host's original index template and manifest, then deletes
 * the stored entry.
 */

import type { Request, Response } from 'express';
import type { BrandingIntegration } from '../../../integration/lifecycle.js';
import { getErrorMessage, logError } from '../common.js';

export function createDeleteEntryHandler(integration: BrandingIntegration) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      const entry = integration.getEntry();
      if (!entry) {
        res.status(404).json({ success: false, error: 'No branding entry configured' });
        return;
      }

      await integration.removeEntry();
      res.json({ success: true, entryId: entry.entryId });
    } catch (error) {
      logError(error, 'Delete entry failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
