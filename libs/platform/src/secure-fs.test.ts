/**
 * Unit tests for secure-fs root confinement
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import * as secureFs from './secure-fs.js';

describe('secure-fs confinement', () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'secure-fs-'));
    await fs.mkdir(path.join(root, 'icons'));
    await fs.writeFile(path.join(root, 'icons', 'favicon.ico'), '');
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('isPathWithin', () => {
    it('should accept the root itself', () => {
      expect(secureFs.isPathWithin(root, root)).toBe(true);
    });

    it('should accept nested paths', () => {
      expect(secureFs.isPathWithin(root, path.join(root, 'icons', 'a.png'))).toBe(true);
    });

    it('should reject parent traversal', () => {
      expect(secureFs.isPathWithin(root, path.join(root, '..', 'etc'))).toBe(false);
    });

    it('should reject siblings sharing a name prefix', () => {
      expect(secureFs.isPathWithin(root, root + '-other')).toBe(false);
    });
  });

  describe('readdir', () => {
    it('should list entries inside the root', async () => {
      const entries = await secureFs.readdir(root, path.join(root, 'icons'));
      expect(entries.map((e) => e.name)).toEqual(['favicon.ico']);
    });

    it('should refuse directories outside the root', async () => {
      await expect(secureFs.readdir(root, path.join(root, '..'))).rejects.toBeInstanceOf(
        secureFs.PathNotAllowedError
      );
    });

    it('should surface fs errors for missing directories', async () => {
      await expect(secureFs.readdir(root, path.join(root, 'missing'))).rejects.toMatchObject({
        code: 'ENOENT',
      });
    });
  });
});
