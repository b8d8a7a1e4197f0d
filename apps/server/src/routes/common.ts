/**
 * Common utilities shared by all route groups
 */

import type { Logger } from '@branding/utils';
import { getErrorMessage } from '@branding/utils';

export { getErrorMessage };

/**
 * Create a logError function bound to a route group's logger
 *
 * @example
 * const logError = createLogError(logger);
 * logError(error, 'Submit options failed');
 */
export function createLogError(logger: Logger): (error: unknown, context: string) => void {
  return (error: unknown, context: string) => {
    logger.error(`${context}:`, getErrorMessage(error));
    if (error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
  };
}
