import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { LogLevel } from '@branding/utils';
import type { ServerConfig } from '@/config.js';
import { createServer, INDEX_PATHS } from '@/server.js';
import { ConfigEntryStore } from '@/services/config-entry-store.js';

describe('server.ts', () => {
  let configDir: string;
  let config: ServerConfig;

  beforeEach(async () => {
    configDir = await fs.mkdtemp(path.join(os.tmpdir(), 'branding-server-'));
    config = {
      port: 0,
      host: '127.0.0.1',
      configDir,
      dataDir: path.join(configDir, '.storage'),
      logLevel: LogLevel.INFO,
      sortIconEntries: false,
    };
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(configDir, { recursive: true, force: true });
  });

  it('should register an index view per dashboard path', async () => {
    const { host } = await createServer(config);

    expect(host.resources().map((view) => view.urlPath)).toEqual([...INDEX_PATHS]);
  });

  it('should start unbranded without a stored entry', async () => {
    const { host, hooks, integration } = await createServer(config);

    expect(integration.getEntry()).toBeNull();
    expect(hooks.isActive).toBe(false);
    expect(host.resources()[0].render()).toContain('<title>Home Assistant</title>');
  });

  it('should apply a stored entry on start', async () => {
    await new ConfigEntryStore(config.dataDir).save({
      entryId: 'entry-1',
      title: 'favicon',
      data: { title: 'My Home', icon_path: '/local/favicons/', launch_icon_color: '#FF0000' },
      options: {},
      createdAt: '2026-01-01T00:00:00.000Z',
      updatedAt: '2026-01-01T00:00:00.000Z',
    });

    const { host } = await createServer(config);
    const html = host.resources()[0].render();

    expect(html).toContain('<title>My Home</title>');
    expect(html).toContain('<link rel="mask-icon" href="/static/icons/mask-icon.svg" color="#FF0000">');
    expect(host.manifest.get('name')).toBe('My Home');
  });
});
