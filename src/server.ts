/**
 * HTTP server entry point
 */

import { Server } from 'http';
import { createApp } from './app';
import { appConfig } from './config/app.config';
import { APP_INFO } from './utils/constants';
import { getErrorMessage } from './utils/errors';
import logger, { loggers } from './utils/logger';

const SHUTDOWN_TIMEOUT_MS = 10000;

const app = createApp();

const server: Server = app.listen(appConfig.port, appConfig.host, () => {
  loggers.system.info(`${APP_INFO.NAME} v${APP_INFO.VERSION} listening`, {
    host: appConfig.host,
    port: appConfig.port,
    environment: appConfig.env,
    detector: appConfig.detector.url
  });
});

server.on('error', (error: Error) => {
  loggers.system.error('Server failed to start', { error: getErrorMessage(error) });
  process.exit(1);
});

const shutdown = (signal: NodeJS.Signals): void => {
  loggers.system.info(`${signal} received, shutting down gracefully`);

  const forceExit = setTimeout(() => {
    loggers.system.error('Forced shutdown after timeout', { timeoutMs: SHUTDOWN_TIMEOUT_MS });
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  forceExit.unref();

  server.close((error?: Error) => {
    if (error) {
      loggers.system.error('Error while closing server', { error: getErrorMessage(error) });
      process.exit(1);
    }
    loggers.system.info('Server closed');
    logger.end();
    process.exit(0);
  });
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught Exception:', { error: error.message, stack: error.stack });
  process.exit(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled Rejection:', { reason: getErrorMessage(reason) });
});

export default server;
