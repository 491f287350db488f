import type { Server } from 'node:http';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { configureLogging, createLogger } from './logger.js';
import { createPersistence } from './persistence/index.js';

const log = createLogger('server');

export const startServer = async (): Promise<Server> => {
  const config = loadConfig();
  configureLogging({ level: config.logLevel });

  const store = await createPersistence(config.persistence);
  const app = createApp({ store, bodyLimit: config.bodyLimit });

  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, () => {
      const address = server.address();
      const port = typeof address === 'object' && address ? address.port : config.port;
      log.info(`hoardsync backend listening on port ${port}`, { driver: config.persistence.driver });
      resolve(server);
    });

    server.once('error', reject);
    server.on('close', () => {
      store.close().catch((error: unknown) => {
        log.error('Failed to close store', { error });
      });
    });
  });
};
