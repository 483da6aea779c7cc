/**
 * HTTP entry point. One engine (and so one market cache) per process.
 */

import { cfg } from '../config.js';
import { createLogger } from '../lib/logger.js';
import { createApp } from './app.js';

const log = createLogger('server');

function start() {
  const app = createApp();
  const server = app.listen(cfg.port, () => {
    log.info(`Pricing engine listening on port ${cfg.port}`, { logLevel: cfg.logLevel });
    log.info(`Health check: http://localhost:${cfg.port}/health`);
  });

  server.on('error', (err) => {
    log.error('Server error', err);
    process.exit(1);
  });

  const shutdown = (signal: string) => {
    log.info(`${signal} received, shutting down...`);
    server.close(() => process.exit(0));
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

process.on('unhandledRejection', (reason) => {
  log.error('Unhandled rejection', reason);
});

start();
