/**
 * Server configuration from environment variables
 *
 * - PORT       - HTTP port (default 8123)
 * - HOST       - Bind address (default 0.0.0.0)
 * - CONFIG_DIR - Host configuration directory; icons live in CONFIG_DIR/www (default ./config)
 * - DATA_DIR   - Where the branding entry is stored (default CONFIG_DIR/.storage)
 * - LOG_LEVEL  - error | warn | info | debug (default info)
 * - SORT_ICON_ENTRIES - "true" to classify icon files in name order
 */

import path from 'path';
import { LogLevel, parseLogLevel } from '@branding/utils';

export interface ServerConfig {
  port: number;
  host: string;
  configDir: string;
  dataDir: string;
  logLevel: LogLevel;
  sortIconEntries: boolean;
}

const DEFAULT_PORT = 8123;

function parsePort(value: string | undefined): number {
  if (!value) return DEFAULT_PORT;
  const port = parseInt(value, 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`Invalid PORT: ${value}`);
  }
  return port;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const configDir = path.resolve(env.CONFIG_DIR || './config');
  return {
    port: parsePort(env.PORT),
    host: env.HOST || '0.0.0.0',
    configDir,
    dataDir: path.resolve(env.DATA_DIR || path.join(configDir, '.storage')),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    sortIconEntries: env.SORT_ICON_ENTRIES === 'true',
  };
}
