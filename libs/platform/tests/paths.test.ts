import { describe, it, expect } from 'vitest';
import path from 'path';
import {
  PUBLIC_PREFIX,
  isPublicAssetPath,
  toLocalStoragePath,
  joinAssetPath,
  createStoragePathResolver,
} from '../src/paths.js';

describe('paths.ts', () => {
  describe('isPublicAssetPath', () => {
    it('should accept paths under the public prefix', () => {
      expect(isPublicAssetPath('/local/icons/')).toBe(true);
      expect(isPublicAssetPath(PUBLIC_PREFIX)).toBe(true);
    });

    it('should reject other prefixes', () => {
      expect(isPublicAssetPath('/other/prefix')).toBe(false);
      expect(isPublicAssetPath('/local')).toBe(false);
      expect(isPublicAssetPath('local/icons/')).toBe(false);
    });
  });

  describe('toLocalStoragePath', () => {
    it('should swap the public segment for the storage segment', () => {
      expect(toLocalStoragePath('/local/icons/')).toBe('www/icons/');
      expect(toLocalStoragePath('/local/favicons')).toBe('www/favicons');
    });

    it('should map the bare prefix to the storage root', () => {
      expect(toLocalStoragePath('/local/')).toBe('www/');
    });

    it('should throw for paths outside the public prefix', () => {
      expect(() => toLocalStoragePath('/static/icons/')).toThrow(
        'Path must start with /local/: /static/icons/'
      );
    });
  });

  describe('joinAssetPath', () => {
    it('should join with or without a trailing slash', () => {
      expect(joinAssetPath('/local/icons/', 'favicon.ico')).toBe('/local/icons/favicon.ico');
      expect(joinAssetPath('/local/icons', 'favicon.ico')).toBe('/local/icons/favicon.ico');
    });
  });

  describe('createStoragePathResolver', () => {
    it('should resolve relative paths inside the config dir', () => {
      const resolve = createStoragePathResolver('/srv/config');
      expect(resolve('www/icons/')).toBe(path.join(path.resolve('/srv/config'), 'www/icons/'));
    });
  });
});
