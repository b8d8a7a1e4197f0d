/**
 * Branding Types - Shared types for front-end branding overrides
 *
 * Defines the icon scan result, the user-supplied rewrite overrides and the
 * persisted configuration entry used by both the icon locator (platform)
 * and the template rewriter (server).
 */

// ============================================================================
// Icon Types
// ============================================================================

/**
 * ManifestIcon - One entry of the web app manifest `icons` array
 */
export interface ManifestIcon {
  /** Web-facing asset path (e.g. "/local/icons/favicon-32x32.png") */
  src: string;
  /** Size descriptor in "WxH" form (e.g. "32x32") */
  sizes: string;
  /** MIME type; discovered icons always report "image/png" */
  type: string;
  /** Optional manifest purpose (e.g. "maskable") */
  purpose?: string;
}

/**
 * IconSet - Result of one icon folder scan
 *
 * An empty scan (no matches, invalid folder or unreadable directory) yields
 * an IconSet with no fields set. `manifestIcons` is only present when at
 * least one sized icon was found.
 */
export interface IconSet {
  /** Asset path of a file named exactly `favicon.ico` */
  favicon?: string;
  /** Asset path of the apple touch icon (`favicon-apple-*`) */
  appleIcon?: string;
  /** Sized icons (`favicon-<W>x<H>.<ext>`) in scan order */
  manifestIcons?: ManifestIcon[];
}

// ============================================================================
// Rewrite Types
// ============================================================================

/**
 * RewriteConfig - Overrides applied to the rendered index page and manifest
 *
 * All fields are optional; an absent field leaves the host's value untouched.
 */
export interface RewriteConfig {
  /** Replacement display name */
  title?: string;
  /** Accent color as `#RRGGBB` */
  accentColor?: string;
  /** Web-facing icon folder, must start with `/local/` */
  iconFolder?: string;
}

/** RGB triple as used by color selector widgets, each component 0-255 */
export type RgbColor = [number, number, number];

// ============================================================================
// Configuration Entry Types
// ============================================================================

/**
 * BrandingEntryData - Persisted configuration entry, in host key naming
 */
export interface BrandingEntryData {
  title: string;
  icon_path: string;
  launch_icon_color: string;
}

/** Keys of a configuration entry */
export type BrandingEntryKey = keyof BrandingEntryData;

/**
 * BrandingEntry - A stored configuration entry
 */
export interface BrandingEntry {
  /** Stable entry identifier */
  entryId: string;
  /** Human-readable entry title */
  title: string;
  /** Entry data submitted through the config flow */
  data: BrandingEntryData;
  /** Entry options (unused by the options flow, which rewrites data) */
  options: Partial<BrandingEntryData>;
  /** ISO timestamp of creation */
  createdAt: string;
  /** ISO timestamp of last update */
  updatedAt: string;
}

/** Field-level validation errors keyed by entry field */
export type FlowErrors = Partial<Record<BrandingEntryKey, string>>;

/** Why a flow step cannot continue */
export type FlowAbortReason = 'single_instance_allowed' | 'no_entry';

/**
 * ConfigFlowResult - Outcome of one config or options flow step
 *
 * - form: show (or re-show) a form with defaults and optional errors
 * - create_entry: the step finished and produced entry data
 * - abort: the flow cannot continue
 */
export type ConfigFlowResult =
  | {
      type: 'form';
      stepId: 'user' | 'init';
      defaults: BrandingEntryData;
      errors: FlowErrors;
    }
  | { type: 'create_entry'; title: string; data: BrandingEntryData | Record<string, never> }
  | { type: 'abort'; reason: FlowAbortReason };

// ============================================================================
// Manifest Types
// ============================================================================

/**
 * ManifestJson - The subset of web app manifest keys the host serves
 */
export interface ManifestJson {
  name: string;
  short_name: string;
  icons: ManifestIcon[];
  [key: string]: unknown;
}
