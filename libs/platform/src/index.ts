/**
 * @branding/platform
 * Storage path mapping and icon discovery
 */

export {
  PUBLIC_PREFIX,
  LOCAL_STORAGE_SEGMENT,
  isPublicAssetPath,
  toLocalStoragePath,
  joinAssetPath,
  createStoragePathResolver,
  type StoragePathResolver,
} from './paths.js';

export {
  FAVICON_FILENAME,
  APPLE_ICON_RE,
  SIZED_ICON_RE,
  MANIFEST_ICON_TYPE,
  classifyIconFiles,
  scanIconFolder,
  locateIcons,
  type LocateIconsOptions,
} from './icon-locator.js';

export * as secureFs from './secure-fs.js';
