import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { ConfigurationError, LookupError } from '@branding/utils';
import {
  classifyIconFiles,
  locateIcons,
  scanIconFolder,
  type LocateIconsOptions,
} from '../src/icon-locator.js';
import { createStoragePathResolver } from '../src/paths.js';

describe('icon-locator.ts', () => {
  let configDir: string;
  let options: LocateIconsOptions;

  async function addIcons(folder: string, names: string[]): Promise<void> {
    const dir = path.join(configDir, 'www', folder);
    await fs.mkdir(dir, { recursive: true });
    for (const name of names) {
      await fs.writeFile(path.join(dir, name), '');
    }
  }

  beforeEach(async () => {
    configDir = await fs.mkdtemp(path.join(os.tmpdir(), 'icon-locator-'));
    options = { resolveStoragePath: createStoragePathResolver(configDir) };
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(configDir, { recursive: true, force: true });
  });

  describe('classifyIconFiles', () => {
    it('should ignore files matching no rule', () => {
      expect(classifyIconFiles('/local/icons/', ['logo.png', 'readme.txt', 'apple.png'])).toEqual(
        {}
      );
    });

    it('should keep manifest icons in scan order', () => {
      const icons = classifyIconFiles('/local/icons/', [
        'favicon-192x192.png',
        'favicon-32x32.png',
      ]);
      expect(icons.manifestIcons).toEqual([
        { src: '/local/icons/favicon-192x192.png', sizes: '192x192', type: 'image/png' },
        { src: '/local/icons/favicon-32x32.png', sizes: '32x32', type: 'image/png' },
      ]);
    });

    it('should always declare image/png regardless of extension', () => {
      const icons = classifyIconFiles('/local/icons/', ['favicon-16x16.ico']);
      expect(icons.manifestIcons).toEqual([
        { src: '/local/icons/favicon-16x16.ico', sizes: '16x16', type: 'image/png' },
      ]);
    });

    it('should let the last apple icon in scan order win', () => {
      const icons = classifyIconFiles('/local/icons/', [
        'favicon-apple-120x120.png',
        'favicon-apple-180x180.png',
      ]);
      expect(icons.appleIcon).toBe('/local/icons/favicon-apple-180x180.png');
    });

    it('should not treat an apple icon as a sized icon', () => {
      const icons = classifyIconFiles('/local/icons/', ['favicon-apple-180x180.png']);
      expect(icons).toEqual({ appleIcon: '/local/icons/favicon-apple-180x180.png' });
    });

    it('should require an extension for sized icons', () => {
      expect(classifyIconFiles('/local/icons/', ['favicon-32x32', 'favicon-32x32.'])).toEqual({});
    });
  });

  describe('locateIcons', () => {
    it('should classify favicon, apple icon and sized icons', async () => {
      await addIcons('icons', ['favicon.ico', 'favicon-apple-180x180.png', 'favicon-32x32.png']);

      const icons = await locateIcons('/local/icons/', options);

      expect(icons).toEqual({
        favicon: '/local/icons/favicon.ico',
        appleIcon: '/local/icons/favicon-apple-180x180.png',
        manifestIcons: [
          { src: '/local/icons/favicon-32x32.png', sizes: '32x32', type: 'image/png' },
        ],
      });
    });

    it('should build web paths without a trailing slash on the folder', async () => {
      await addIcons('icons', ['favicon.ico']);

      const icons = await locateIcons('/local/icons', options);

      expect(icons).toEqual({ favicon: '/local/icons/favicon.ico' });
    });

    it('should not descend into subdirectories', async () => {
      await addIcons('icons/nested', ['favicon.ico']);

      expect(await locateIcons('/local/icons/', options)).toEqual({});
    });

    it('should sort entries when asked', async () => {
      await addIcons('icons', ['favicon-64x64.png', 'favicon-16x16.png', 'favicon-32x32.png']);

      const icons = await locateIcons('/local/icons/', { ...options, sortEntries: true });

      expect(icons.manifestIcons?.map((i) => i.sizes)).toEqual(['16x16', '32x32', '64x64']);
    });

    it('should return an empty set and report a ConfigurationError for a missing path', async () => {
      const onError = vi.fn();

      expect(await locateIcons(undefined, { ...options, onError })).toEqual({});
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0][0]).toBeInstanceOf(ConfigurationError);
    });

    it('should return an empty set and report a ConfigurationError for another prefix', async () => {
      const onError = vi.fn();

      expect(await locateIcons('/other/prefix', { ...options, onError })).toEqual({});
      expect(onError.mock.calls[0][0]).toBeInstanceOf(ConfigurationError);
      expect(console.error).toHaveBeenCalledWith(
        '[IconLocator]',
        'Invalid Path: /other/prefix; must start with /local/'
      );
    });

    it('should reject folders that escape local storage', async () => {
      const onError = vi.fn();

      expect(await locateIcons('/local/../../etc/', { ...options, onError })).toEqual({});
      expect(onError.mock.calls[0][0]).toBeInstanceOf(ConfigurationError);
    });

    it('should return an empty set and report a LookupError for a missing directory', async () => {
      const onError = vi.fn();

      expect(await locateIcons('/local/missing/', { ...options, onError })).toEqual({});
      const error = onError.mock.calls[0][0];
      expect(error).toBeInstanceOf(LookupError);
      expect(error.directory).toBe(path.join(configDir, 'www', 'missing/'));
    });
  });

  describe('scanIconFolder', () => {
    it('should throw ConfigurationError for a null path', async () => {
      await expect(scanIconFolder(null, options)).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('should throw LookupError when the directory cannot be read', async () => {
      await expect(scanIconFolder('/local/missing/', options)).rejects.toBeInstanceOf(LookupError);
    });
  });
});
