/**
 * Process entry point: read config, open the JSON store, serve HTTP.
 */

import { createApp, openAppContext } from './server';
import { loadConfig } from './config';
import { logger, setLogLevel } from './logger';
import { JsonFilePersistence } from './storage/json-file-persistence';

async function start(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const persistence = new JsonFilePersistence(config.dataDir);
  await persistence.initialize();

  const context = await openAppContext(persistence);
  const app = createApp(context);

  const server = app.listen(config.port, () => {
    logger.info('Mock cloud API listening', { port: config.port, dataDir: config.dataDir });
  });

  const shutdown = () => {
    logger.info('Shutting down');
    server.close(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

start().catch((err) => {
  logger.error('Failed to start', { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
