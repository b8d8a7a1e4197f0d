/**
 * Icon Locator - Discovers favicon files in a configured icon folder
 *
 * Scans the local directory behind a `/local/...` web path (one level, no
 * recursion) and classifies each entry by name:
 *
 * - `favicon.ico`                 -> IconSet.favicon
 * - `favicon-apple-*`             -> IconSet.appleIcon
 * - `favicon-<W>x<H>.<ext>`       -> IconSet.manifestIcons[] (type always image/png)
 *
 * The three checks are independent. Returned `src` values are web paths
 * (folder prefix + bare filename), never local filesystem paths.
 */

import type { IconSet, ManifestIcon } from '@branding/types';
import { createLogger, ConfigurationError, LookupError, getErrorMessage } from '@branding/utils';
import * as secureFs from './secure-fs.js';
import {
  LOCAL_STORAGE_SEGMENT,
  PUBLIC_PREFIX,
  isPublicAssetPath,
  joinAssetPath,
  toLocalStoragePath,
  type StoragePathResolver,
} from './paths.js';

const logger = createLogger('IconLocator');

/** Exact filename of the primary favicon */
export const FAVICON_FILENAME = 'favicon.ico';

/** Apple touch icon naming convention */
export const APPLE_ICON_RE = /^favicon-apple-/;

/**
 * Sized manifest icon naming convention
 *
 * Captures:
 *   [1] WxH size descriptor (e.g. "192x192")
 */
export const SIZED_ICON_RE = /^favicon-(\d+x\d+)\..+/;

/** Declared MIME type of every discovered manifest icon */
export const MANIFEST_ICON_TYPE = 'image/png';

export interface LocateIconsOptions {
  /** Maps a path relative to the configuration directory to a local path */
  resolveStoragePath: StoragePathResolver;
  /**
   * Sort directory entries by name before classifying them.
   * When false (default) the listing order of the file system decides which
   * file wins if several match the favicon or apple icon rules.
   */
  sortEntries?: boolean;
  /** Called with the ConfigurationError or LookupError that emptied the result */
  onError?: (error: ConfigurationError | LookupError) => void;
}

/**
 * Classify a list of bare filenames into an IconSet
 *
 * @param webFolder - Web-facing folder the files are served from
 * @param fileNames - Directory entry names, in scan order
 */
export function classifyIconFiles(webFolder: string, fileNames: readonly string[]): IconSet {
  const icons: IconSet = {};
  const manifestIcons: ManifestIcon[] = [];

  for (const name of fileNames) {
    const assetPath = joinAssetPath(webFolder, name);

    if (name === FAVICON_FILENAME) {
      icons.favicon = assetPath;
      logger.info('Found favicon:', assetPath);
    }

    if (APPLE_ICON_RE.test(name)) {
      icons.appleIcon = assetPath;
      logger.info('Found apple icon:', assetPath);
    }

    const sized = SIZED_ICON_RE.exec(name);
    if (sized) {
      manifestIcons.push({ src: assetPath, sizes: sized[1], type: MANIFEST_ICON_TYPE });
      logger.info('Found icon:', assetPath);
    }
  }

  if (manifestIcons.length > 0) {
    icons.manifestIcons = manifestIcons;
  }
  return icons;
}

/**
 * Scan an icon folder, throwing on invalid configuration or read failure
 *
 * @throws ConfigurationError if the path is absent, not under `/local/`, or
 *   escapes the local storage directory
 * @throws LookupError if the directory cannot be enumerated
 */
export async function scanIconFolder(
  iconFolderPath: string | undefined | null,
  options: LocateIconsOptions
): Promise<IconSet> {
  if (!iconFolderPath || !isPublicAssetPath(iconFolderPath)) {
    throw new ConfigurationError(
      `Invalid Path: ${iconFolderPath ?? '(none)'}; must start with ${PUBLIC_PREFIX}`,
      iconFolderPath ?? undefined
    );
  }

  const storageRoot = options.resolveStoragePath(LOCAL_STORAGE_SEGMENT);
  const localDir = options.resolveStoragePath(toLocalStoragePath(iconFolderPath));
  if (!secureFs.isPathWithin(storageRoot, localDir)) {
    throw new ConfigurationError(
      `Invalid Path: ${iconFolderPath}; resolves outside of ${storageRoot}`,
      iconFolderPath
    );
  }

  logger.info('Looking for icons in:', localDir);

  let names: string[];
  try {
    const entries = await secureFs.readdir(storageRoot, localDir);
    names = entries.map((entry) => entry.name);
  } catch (error) {
    throw new LookupError(
      `Unable to read icon folder ${localDir}: ${getErrorMessage(error)}`,
      localDir,
      { cause: error }
    );
  }

  if (options.sortEntries) {
    names.sort();
  }

  const icons = classifyIconFiles(iconFolderPath, names);
  logger.debug('Icons found:', icons);
  return icons;
}

/**
 * Locate icons for a configured folder
 *
 * Never throws for configuration or lookup problems: those are logged and
 * the result is an empty IconSet, so title and color overrides can still
 * be applied.
 */
export async function locateIcons(
  iconFolderPath: string | undefined | null,
  options: LocateIconsOptions
): Promise<IconSet> {
  try {
    return await scanIconFolder(iconFolderPath, options);
  } catch (error) {
    if (error instanceof ConfigurationError || error instanceof LookupError) {
      logger.error(error.message);
      options.onError?.(error);
      return {};
    }
    throw error;
  }
}
