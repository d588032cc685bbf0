import { createApp } from './app.js';
import { config } from './config/env.js';
import { SEED_ACTIVITIES } from './data/activities.js';
import { ActivityRegistry } from './services/registry.js';
import { logger } from './utils/logger.js';

const registry = new ActivityRegistry(SEED_ACTIVITIES);
const app = createApp({ registry, config });

const server = app.listen(config.port, config.host, () => {
  logger.info(`Server running on http://${config.host}:${config.port}`, {
    environment: config.nodeEnv,
    activities: registry.size,
    staticDir: config.staticDir
  });
});

const shutdown = (signal: NodeJS.Signals) => {
  logger.info(`Received ${signal}, shutting down`);
  server.close(error => {
    if (error) {
      logger.error('Error while closing server', { error: error.message });
      process.exitCode = 1;
    }
  });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
