import dotenv from 'dotenv';

// Load environment variables before any configuration is read
dotenv.config();

import { createApp } from './api/index';
import { ServiceContainer } from './services/index';
import { getConfig } from './utils/config';
import { errorMessage } from './utils/errors';
import { createLogger } from './utils/logger';

const logger = createLogger('Server');

/**
 * Start the Solace API server
 */
function start(): void {
  logger.info('Solace API Server Starting...');

  let services: ServiceContainer;
  try {
    services = new ServiceContainer(getConfig());
  } catch (error) {
    logger.error('Invalid configuration', error);
    process.exit(1);
  }

  services.logCapabilities();
  services.sessions.startSweeping();

  const { host, port } = services.config.api;
  const app = createApp(services);

  const server = app.listen(port, host, () => {
    logger.info('Solace API Server Ready', {
      host,
      port,
      healthCheck: `http://${host}:${port}/health`,
      apiBase: `http://${host}:${port}/api/v1`,
    });
    logger.info('Available endpoints: POST /api/v1/sessions, POST /api/v1/sessions/:id/turns, GET /api/v1/sessions/:id, POST /api/v1/sessions/:id/reset, DELETE /api/v1/sessions/:id');
  });

  server.on('error', (error) => {
    logger.error(`Cannot listen on ${host}:${port}: ${errorMessage(error)}`, error);
    process.exit(1);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}. Starting graceful shutdown...`);
    services.sessions.stop();

    server.close(() => {
      logger.info('HTTP server closed. Goodbye!');
      process.exit(0);
    });

    // Force shutdown after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

start();
