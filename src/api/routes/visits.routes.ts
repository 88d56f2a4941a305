/**
 * Visit counter routes
 *
 * POST   /visit/:pageId   record one visit
 * GET    /visits/:pageId  current count and where it was served from
 * DELETE /visits/:pageId  reset the count to zero
 * GET    /status          counter metrics snapshot
 */

import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import type { VisitCounterService } from '../../services/VisitCounterService.js';
import type { CountSource } from '../../types.js';
import { BadRequestError } from '../errors.js';

/**
 * Page ids are opaque; only length is constrained
 */
const pageIdSchema = z.string().min(1).max(512);

function parsePageId(req: Request): string {
  const result = pageIdSchema.safeParse(req.params['pageId']);
  if (!result.success) {
    throw new BadRequestError('Invalid page id', {
      issues: result.error.errors.map((e) => e.message),
    });
  }
  return result.data;
}

/** `in_memory`, `redis_<node>` or `buffered_<node>` */
export function servedVia(source: CountSource): string {
  switch (source.kind) {
    case 'cache':
      return 'in_memory';
    case 'storage':
      return `redis_${source.node}`;
    case 'buffered':
      return `buffered_${source.node}`;
  }
}

export function createVisitsRouter(service: VisitCounterService): Router {
  const router = Router();

  router.post('/visit/:pageId', (req: Request, res: Response, next: NextFunction) => {
    try {
      const pageId = parsePageId(req);
      service.recordVisit(pageId);
      res.json({ status: 'success', message: `Visit recorded for page ${pageId}`, page_id: pageId });
    } catch (error) {
      next(error);
    }
  });

  router.get('/visits/:pageId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const pageId = parsePageId(req);
      const result = await service.getCount(pageId);
      res.json({ visits: result.count, served_via: servedVia(result.source) });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/visits/:pageId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const pageId = parsePageId(req);
      await service.resetCount(pageId);
      res.json({ status: 'success', message: `Visit count reset for page ${pageId}` });
    } catch (error) {
      next(error);
    }
  });

  router.get('/status', (_req: Request, res: Response) => {
    const snapshot = service.metrics();
    res.json({
      status: snapshot.status,
      cache_size: snapshot.cache.size,
      cache_capacity: snapshot.cache.capacity,
      cache_hits: snapshot.cache.hits,
      cache_misses: snapshot.cache.misses,
      cache_hit_rate: snapshot.cache.hitRate,
      write_buffer_size: snapshot.buffer.pendingKeys,
      write_buffer_visits: snapshot.buffer.pendingVisits,
      last_successful_flush_at: snapshot.lastSuccessfulFlushAt,
      dropped_visits_on_shutdown: snapshot.buffer.droppedVisitsOnShutdown,
      nodes: snapshot.nodes,
      virtual_nodes: snapshot.distribution,
    });
  });

  return router;
}
