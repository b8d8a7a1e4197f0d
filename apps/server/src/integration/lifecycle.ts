/**
 * Branding Integration - Plugin lifecycle on top of BrandingHooks
 *
 * Lifecycle, as driven by the server:
 *
 * - setup(): capture the host originals; apply a static config block if given
 * - setupEntry(): register the entry's update listener and run it once
 * - updateEntry(): persist new entry data, then reload the entry
 * - unloadEntry(): drop the entry's update listeners
 * - removeEntry(): restore the host originals and delete the stored entry
 *
 * Overlapping HTTP requests reach the integration concurrently, so every
 * lifecycle operation runs on a single queue, one at a time. Entry state is
 * checked inside the queued step; a step that finds the entry already
 * created or already gone rejects with EntryStateError.
 */

import { randomUUID } from 'crypto';
import type { BrandingEntry, BrandingEntryData, RewriteConfig } from '@branding/types';
import { createLogger, EntryStateError, isHexColor } from '@branding/utils';
import type { BrandingHooks } from '../services/branding-hooks.js';
import type { ConfigEntryStore } from '../services/config-entry-store.js';
import type { EventEmitter } from '../lib/events.js';
import { ENTRY_TITLE } from './const.js';

const logger = createLogger('BrandingIntegration');

/** Listener run on setup and whenever the entry changes */
export type UpdateListener = (entry: BrandingEntry) => Promise<boolean>;

/**
 * Map host-named entry data onto rewrite overrides
 *
 * Empty strings count as unset. A color that is not `#RRGGBB` is dropped
 * with a warning rather than spliced into the page.
 */
export function entryDataToRewriteConfig(data: Partial<BrandingEntryData>): RewriteConfig {
  const config: RewriteConfig = {};
  if (data.title) {
    config.title = data.title;
  }
  if (data.icon_path) {
    config.iconFolder = data.icon_path;
  }
  if (data.launch_icon_color) {
    if (isHexColor(data.launch_icon_color)) {
      config.accentColor = data.launch_icon_color;
    } else {
      logger.warn('Ignoring invalid launch icon color:', data.launch_icon_color);
    }
  }
  return config;
}

export class BrandingIntegration {
  private entry: BrandingEntry | null = null;
  private updateListeners: UpdateListener[] = [];
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly hooks: BrandingHooks,
    private readonly store: ConfigEntryStore,
    private readonly events: EventEmitter
  ) {}

  /** The current config entry, if any */
  getEntry(): BrandingEntry | null {
    return this.entry;
  }

  /**
   * Load the stored entry (if any) and bring the integration up
   */
  start(staticConfig?: Partial<BrandingEntryData>): Promise<void> {
    return this.enqueue(async () => {
      await this.doSetup(staticConfig);
      const stored = await this.store.load();
      if (stored) {
        await this.doSetupEntry(stored);
      }
    });
  }

  /**
   * Initial setup: capture the host originals, then apply a static config
   * block when one is given
   */
  setup(staticConfig?: Partial<BrandingEntryData>): Promise<boolean> {
    return this.enqueue(() => this.doSetup(staticConfig));
  }

  /**
   * Set up from a config entry
   */
  setupEntry(entry: BrandingEntry): Promise<boolean> {
    return this.enqueue(() => this.doSetupEntry(entry));
  }

  /**
   * Re-apply hooks from the entry's data. Runs inside the queued step that
   * triggered it.
   */
  async updateListener(entry: BrandingEntry): Promise<boolean> {
    logger.debug('[updateListener] Starting');
    return this.applyHooks(entry.data, entry.entryId);
  }

  /**
   * Create, persist and set up a new entry
   *
   * @throws EntryStateError if an entry already exists
   */
  createEntry(data: BrandingEntryData): Promise<BrandingEntry> {
    return this.enqueue(async () => {
      if (this.entry) {
        throw new EntryStateError('A branding entry already exists', 'single_instance_allowed');
      }
      const now = new Date().toISOString();
      const entry: BrandingEntry = {
        entryId: randomUUID(),
        title: ENTRY_TITLE,
        data: { ...data },
        options: {},
        createdAt: now,
        updatedAt: now,
      };
      await this.store.save(entry);
      this.events.emit({ type: 'branding:entry-created', payload: entry });
      await this.doSetupEntry(entry);
      return entry;
    });
  }

  /**
   * Replace the entry data, persist it and reload the entry
   *
   * @throws EntryStateError if there is no entry to update
   */
  updateEntry(data: BrandingEntryData): Promise<BrandingEntry> {
    return this.enqueue(async () => {
      const current = this.entry;
      if (!current) {
        throw new EntryStateError('No branding entry to update', 'no_entry');
      }
      const entry: BrandingEntry = {
        ...current,
        data: { ...data },
        updatedAt: new Date().toISOString(),
      };
      await this.store.save(entry);
      this.events.emit({ type: 'branding:entry-updated', payload: entry });
      await this.doReloadEntry(entry);
      return entry;
    });
  }

  /**
   * Unload and set up the entry again
   */
  reloadEntry(entry: BrandingEntry): Promise<boolean> {
    return this.enqueue(() => this.doReloadEntry(entry));
  }

  /**
   * Unload a config entry. Hooks stay installed until the entry is removed.
   */
  unloadEntry(entry: BrandingEntry): Promise<boolean> {
    return this.enqueue(async () => this.doUnloadEntry(entry));
  }

  /**
   * Remove the entry: restore the host originals and delete the stored entry
   *
   * @throws HookNotInstalledError if hooks were never captured
   */
  removeEntry(): Promise<boolean> {
    return this.enqueue(async () => {
      logger.debug('[removeEntry] Starting');
      const entryId = this.entry?.entryId ?? null;
      this.hooks.removeRewrite();
      this.events.emit({ type: 'branding:hooks-removed', payload: { entryId } });

      await this.store.remove();
      this.entry = null;
      this.updateListeners = [];
      if (entryId) {
        this.events.emit({ type: 'branding:entry-removed', payload: { entryId } });
      }
      return true;
    });
  }

  /**
   * Run a task after every previously queued one has settled
   */
  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // The caller gets the rejection through `run`; the queue moves on either way
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async doSetup(staticConfig?: Partial<BrandingEntryData>): Promise<boolean> {
    logger.debug('[setup] Starting');
    this.hooks.captureOriginals();
    if (!staticConfig) {
      return true;
    }
    return this.applyHooks(staticConfig, null);
  }

  private async doSetupEntry(entry: BrandingEntry): Promise<boolean> {
    logger.debug('[setupEntry] Starting. entry.data:', entry.data);
    this.entry = entry;
    this.updateListeners.push((updated) => this.updateListener(updated));
    return this.runUpdateListeners(entry);
  }

  private async doReloadEntry(entry: BrandingEntry): Promise<boolean> {
    this.doUnloadEntry(entry);
    return this.doSetupEntry(entry);
  }

  private doUnloadEntry(entry: BrandingEntry): boolean {
    logger.info('Unloading:', entry.data);
    this.updateListeners = [];
    return true;
  }

  private async runUpdateListeners(entry: BrandingEntry): Promise<boolean> {
    let ok = true;
    for (const listener of this.updateListeners) {
      ok = (await listener(entry)) && ok;
    }
    return ok;
  }

  private async applyHooks(
    data: Partial<BrandingEntryData>,
    entryId: string | null
  ): Promise<boolean> {
    await this.hooks.installRewrite(entryDataToRewriteConfig(data));
    this.events.emit({ type: 'branding:hooks-applied', payload: { entryId } });
    return true;
  }
}
