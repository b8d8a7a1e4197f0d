/**
 * Config Entry Store - Persists the single branding entry as JSON
 *
 * The entry lives at `{dataDir}/branding-entry.json`. Each write goes to its
 * own `branding-entry.json.tmp.<id>` file first and is renamed into place, so
 * a crash mid-write never leaves a truncated entry behind.
 */

import { randomUUID } from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import type { BrandingEntry } from '@branding/types';
import { createLogger, hasErrorCode } from '@branding/utils';

const logger = createLogger('ConfigEntryStore');

export const ENTRY_FILENAME = 'branding-entry.json';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Structural check for an entry read back from disk
 */
export function isBrandingEntry(value: unknown): value is BrandingEntry {
  if (!isRecord(value)) return false;
  const data = value.data;
  if (!isRecord(data) || !isRecord(value.options)) return false;
  return (
    typeof value.entryId === 'string' &&
    typeof value.title === 'string' &&
    typeof value.createdAt === 'string' &&
    typeof value.updatedAt === 'string' &&
    typeof data.title === 'string' &&
    typeof data.icon_path === 'string' &&
    typeof data.launch_icon_color === 'string'
  );
}

export class ConfigEntryStore {
  constructor(private readonly dataDir: string) {}

  get filePath(): string {
    return path.join(this.dataDir, ENTRY_FILENAME);
  }

  /**
   * Load the stored entry
   *
   * @returns The entry, or null if none has been saved
   * @throws Error if the file exists but does not hold a valid entry
   */
  async load(): Promise<BrandingEntry | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return null;
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(raw);
    if (!isBrandingEntry(parsed)) {
      throw new Error(`Invalid branding entry in ${this.filePath}`);
    }
    logger.debug('Loaded entry', parsed.entryId);
    return parsed;
  }

  async save(entry: BrandingEntry): Promise<void> {
    await fs.mkdir(this.dataDir, { recursive: true });
    const tempPath = `${this.filePath}.tmp.${randomUUID()}`;
    try {
      await fs.writeFile(tempPath, JSON.stringify(entry, null, 2), 'utf-8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
    logger.debug('Saved entry', entry.entryId);
  }

  async remove(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
  }
}
