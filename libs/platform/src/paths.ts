/**
 * Storage Paths - Mapping between web-facing asset paths and local storage
 *
 * The host serves files from `<configDir>/www/` under the public prefix
 * `/local/`. These helpers translate between the two so icons discovered
 * on disk can be referenced by URL:
 *
 *   /local/icons/favicon.ico  <->  <configDir>/www/icons/favicon.ico
 */

import path from 'path';

/** Public URL prefix under which local storage is served */
export const PUBLIC_PREFIX = '/local/';

/** Local storage directory (relative to the config dir) served under PUBLIC_PREFIX */
export const LOCAL_STORAGE_SEGMENT = 'www';

/**
 * Resolves a relative path inside the host's configuration directory
 */
export type StoragePathResolver = (relativePath: string) => string;

/**
 * Check whether a web path lives under the public prefix.
 *
 * @example
 * isPublicAssetPath('/local/icons/') // => true
 * isPublicAssetPath('/static/icons') // => false
 */
export function isPublicAssetPath(webPath: string): boolean {
  return webPath.startsWith(PUBLIC_PREFIX);
}

/**
 * Replace the leading public segment of a web path with the local storage
 * segment, giving a path relative to the configuration directory.
 *
 * @example
 * toLocalStoragePath('/local/icons/') // => "www/icons/"
 *
 * @throws Error if the path is not under PUBLIC_PREFIX
 */
export function toLocalStoragePath(webPath: string): string {
  if (!isPublicAssetPath(webPath)) {
    throw new Error(`Path must start with ${PUBLIC_PREFIX}: ${webPath}`);
  }
  // Keep the slash that follows "/local" so "www" + "/icons/" stays a path
  return LOCAL_STORAGE_SEGMENT + webPath.slice(PUBLIC_PREFIX.length - 1);
}

/**
 * Join a web-facing folder prefix and a bare filename into an asset path.
 * Uses POSIX separators regardless of platform so the result stays a URL.
 *
 * @example
 * joinAssetPath('/local/icons/', 'favicon.ico') // => "/local/icons/favicon.ico"
 * joinAssetPath('/local/icons', 'favicon.ico')  // => "/local/icons/favicon.ico"
 */
export function joinAssetPath(webFolder: string, fileName: string): string {
  return path.posix.join(webFolder, fileName);
}

/**
 * Create a resolver for paths inside a configuration directory.
 *
 * @param configDir - Absolute (or cwd-relative) configuration directory
 */
export function createStoragePathResolver(configDir: string): StoragePathResolver {
  const root = path.resolve(configDir);
  return (relativePath: string) => path.join(root, relativePath);
}
