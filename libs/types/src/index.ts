/**
 * @branding/types
 * Shared type definitions for front-end branding
 */

export type {
  ManifestIcon,
  IconSet,
  RewriteConfig,
  RgbColor,
  BrandingEntryData,
  BrandingEntryKey,
  BrandingEntry,
  FlowErrors,
  FlowAbortReason,
  ConfigFlowResult,
  ManifestJson,
} from './branding.js';
