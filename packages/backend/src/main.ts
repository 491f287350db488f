import { createLogger } from './logger.js';
import { startServer } from './server.js';

const log = createLogger('main');

startServer().catch((error: unknown) => {
  log.error('Failed to start server', { error });
  process.exitCode = 1;
});
