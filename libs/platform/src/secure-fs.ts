/**
 * Secure file system access for storage directories
 *
 * All reads are confined to an allowed root: a target that resolves
 * outside the root (e.g. through `..` segments in a configured path) is
 * rejected before any fs call is made.
 */

import fs from 'fs/promises';
import type { Dirent } from 'fs';
import path from 'path';

/**
 * Thrown when a path resolves outside its allowed root
 */
export class PathNotAllowedError extends Error {
  constructor(
    public readonly target: string,
    public readonly root: string
  ) {
    super(`Path ${target} is outside of allowed directory ${root}`);
    this.name = 'PathNotAllowedError';
  }
}

/**
 * Check whether `target` is `root` itself or nested below it
 */
export function isPathWithin(root: string, target: string): boolean {
  const normalizedRoot = path.resolve(root);
  const normalizedTarget = path.resolve(target);
  return (
    normalizedTarget === normalizedRoot ||
    normalizedTarget.startsWith(normalizedRoot + path.sep)
  );
}

/**
 * Resolve `target` and verify it stays inside `root`
 *
 * @returns The resolved absolute path
 * @throws PathNotAllowedError if the path escapes the root
 */
export function assertPathWithin(root: string, target: string): string {
  const resolved = path.resolve(target);
  if (!isPathWithin(root, resolved)) {
    throw new PathNotAllowedError(resolved, path.resolve(root));
  }
  return resolved;
}

/**
 * List the immediate entries of a directory inside `root`
 */
export async function readdir(root: string, dir: string): Promise<Dirent[]> {
  const resolved = assertPathWithin(root, dir);
  return fs.readdir(resolved, { withFileTypes: true });
}

