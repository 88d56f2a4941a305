/**
 * HTTP application
 */

import express, { type Express, type Request, type Response } from 'express';
import type { Logger } from 'pino';
import type { CounterMetrics } from '../infrastructure/metrics.js';
import type { VisitCounterService } from '../services/VisitCounterService.js';
import { createErrorHandler } from './errors.js';
import { createVisitsRouter } from './routes/visits.routes.js';

export interface CreateAppOptions {
  service: VisitCounterService;
  logger: Logger;
  apiPrefix: string;
  /** Exposes GET /metrics when set */
  metrics?: CounterMetrics | null;
  startedAt?: number;
}

export function createApp(options: CreateAppOptions): Express {
  const { service, logger, apiPrefix, metrics } = options;
  const startedAt = options.startedAt ?? Date.now();
  const app = express();

  app.disable('x-powered-by');
  app.use(express.json());

  app.get('/', (_req: Request, res: Response) => {
    const now = Date.now();
    res.json({
      status: 'healthy',
      timestamp: new Date(now).toISOString(),
      uptime_ms: now - startedAt,
    });
  });

  if (metrics) {
    app.get('/metrics', async (_req: Request, res: Response) => {
      try {
        res.set('Content-Type', metrics.contentType);
        res.send(await metrics.metrics());
      } catch (error) {
        logger.error({ error }, 'Failed to collect metrics');
        res.status(500).send('Failed to collect metrics');
      }
    });
  }

  app.use(apiPrefix, createVisitsRouter(service));
  app.use(createErrorHandler(logger));

  return app;
}
