/**
 * @branding/utils
 * Logging, error types and color helpers shared across packages
 */

// Logger
export {
  createLogger,
  setLogLevel,
  getLogLevel,
  parseLogLevel,
  LogLevel,
  type Logger,
} from './logger.js';

// Errors
export {
  BrandingError,
  ConfigurationError,
  LookupError,
  HookNotInstalledError,
  ValidationError,
  EntryStateError,
  getErrorMessage,
  hasErrorCode,
} from './errors.js';

// Color conversion
export { rgbToHex, hexToRgb, isHexColor, isRgbColor } from './color.js';
