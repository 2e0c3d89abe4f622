#!/usr/bin/env node
import http from 'http';

import { entityStoreFactory } from './adapters.js';
import { BackupService } from './backup.js';
import { CatalogService } from './catalog-service.js';
import { loadConfig } from './config.js';
import { startHttpServer } from './http-server.js';
import { createLogger } from './logger.js';
import { MutationGate } from './mutation-gate.js';
import { QueryEngine } from './query-engine.js';

async function main() {
  const config = loadConfig();
  const logger = createLogger(config);

  const store = entityStoreFactory(config.storage, logger);
  const catalogService = new CatalogService(store, logger);
  await catalogService.initialize();

  const mutationGate = new MutationGate(
    catalogService,
    store,
    new BackupService(config.backupsDir, logger),
    { adminSecret: config.adminSecret, examplesFile: config.examplesFile },
    logger,
  );
  const queryEngine = new QueryEngine(store);

  let httpServer: http.Server;
  try {
    httpServer = await startHttpServer(config.http, { logger, mutationGate, queryEngine, store });
    logger.info(`${config.name} ${config.version} started with ${config.storage.type} storage`);
  } catch (error) {
    logger.error({ err: error }, 'Failed to start server');
    await store.disconnect();
    process.exit(1);
  }

  /**
   * Graceful shutdown handler
   */
  async function shutdown() {
    logger.info('Shutting down prompt catalog...');
    await new Promise<void>(resolve => {
      if (httpServer.listening) {
        httpServer.close(() => resolve());
      } else {
        resolve();
      }
    });
    await store.disconnect();
    logger.info('Server shut down gracefully.');
    process.exit(0);
  }

  const handleSignal = () => {
    shutdown().catch(err => {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    });
  };
  process.on('SIGINT', handleSignal);
  process.on('SIGTERM', handleSignal);

  process.on('unhandledRejection', reason => {
    logger.error({ err: reason }, 'Unhandled rejection');
    handleSignal();
  });
}

main().catch(error => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
