/**
 * Branding server entry point
 *
 * Serves the dashboard index page and manifest with branding applied, plus
 * the /api/branding config endpoints.
 */

import { createLogger, setLogLevel } from '@branding/utils';
import { loadConfig } from './config.js';
import { createServer } from './server.js';

const logger = createLogger('Server');

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const { app } = await createServer(config);

  const server = app.listen(config.port, config.host, () => {
    logger.info(`Listening on http://${config.host}:${config.port}`);
    logger.info(`Config directory: ${config.configDir}`);
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    server.close(() => process.exit(0));
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error('Failed to start server:', error);
  process.exit(1);
});
