/**
 * Visit Ledger - Main Entry Point
 *
 * Loads config, wires the counter core, serves the HTTP API and drains the
 * write buffer on SIGTERM/SIGINT.
 */

import type { Server } from 'node:http';
import { createApp } from './api/app.js';
import { loadConfig } from './config.js';
import { createVisitCounter, type VisitCounter } from './services/factory.js';
import { CounterMetrics } from './infrastructure/metrics.js';
import { createLogger } from './utils/logger.js';

const config = loadConfig();
const logger = createLogger({ level: config.logLevel });

let counter: VisitCounter | null = null;
let server: Server | null = null;
let shuttingDown = false;

async function main(): Promise<void> {
  logger.info(
    {
      nodes: config.redisNodes,
      virtualNodes: config.virtualNodes,
      cacheTtlMs: config.cacheTtlMs,
      batchIntervalMs: config.batchIntervalMs,
      nodeEnv: config.nodeEnv,
    },
    'Visit ledger starting...'
  );

  const metrics = config.metricsEnabled ? new CounterMetrics({ collectDefaults: true }) : null;
  counter = createVisitCounter({ config, logger, metrics });

  const health = await counter.registry.probeNow();
  logger.info({ nodes: health }, 'Initial storage health probe complete');

  counter.service.start();

  const app = createApp({
    service: counter.service,
    logger,
    apiPrefix: config.apiPrefix,
    metrics,
  });

  server = app.listen(config.port, () => {
    logger.info({ port: config.port, apiPrefix: config.apiPrefix }, 'HTTP server listening');
  });
}

/**
 * Graceful shutdown
 */
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info({ signal }, 'Shutdown signal received, starting graceful shutdown');

  // Stop taking requests before draining the buffer
  const activeServer = server;
  if (activeServer) {
    await new Promise<void>((resolve) => activeServer.close(() => resolve()));
    logger.info('HTTP server closed');
  }

  if (counter) {
    const report = await counter.service.shutdown();
    if (report.droppedVisits > 0) {
      logger.error({ ...report }, 'Shutdown finished with unflushed visits');
    }
  }

  logger.info('Visit ledger shutdown complete');
  process.exit(0);
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((error: unknown) => {
    logger.fatal({ error }, 'Shutdown failed');
    process.exit(1);
  });
});

process.on('SIGINT', () => {
  shutdown('SIGINT').catch((error: unknown) => {
    logger.fatal({ error }, 'Shutdown failed');
    process.exit(1);
  });
});

process.on('uncaughtException', (error) => {
  logger.fatal({ error }, 'Uncaught exception, shutting down');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ reason }, 'Unhandled rejection, shutting down');
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Failed to start visit ledger');
  process.exit(1);
});
