/**
 * Counter service wiring
 *
 * Builds the shard registry, cache, batch writer and service from config.
 * Every collaborator is created here and passed down; nothing is a
 * module-level singleton.
 */

import type { Logger } from 'pino';
import type { Config } from '../config.js';
import { CountCache } from '../infrastructure/cache/CountCache.js';
import { CounterMetrics } from '../infrastructure/metrics.js';
import { createCounterStoreFactory } from '../infrastructure/storage/index.js';
import type { CounterStoreFactory } from '../infrastructure/storage/types.js';
import { REAL_CLOCK, type Clock } from '../utils/clock.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { BatchWriter } from './BatchWriter.js';
import { ShardRegistry } from './ShardRegistry.js';
import { VisitCounterService } from './VisitCounterService.js';

/** Max backoff between storage retries */
const RETRY_MAX_DELAY_MS = 2000;

export type CounterSettings = Pick<
  Config,
  | 'redisNodes'
  | 'redisPassword'
  | 'redisDb'
  | 'redisKeyPrefix'
  | 'redisCommandTimeoutMs'
  | 'redisConnectTimeoutMs'
  | 'redisRetryAttempts'
  | 'redisRetryBaseDelayMs'
  | 'virtualNodes'
  | 'cacheTtlMs'
  | 'cacheCapacity'
  | 'batchIntervalMs'
  | 'batchSizeLimit'
  | 'healthProbeIntervalMs'
  | 'shutdownGraceMs'
>;

export interface CreateVisitCounterOptions {
  config: CounterSettings;
  logger: Logger;
  /** Overrides address-based store selection */
  storeFactory?: CounterStoreFactory;
  /** Pass null to run without Prometheus metrics */
  metrics?: CounterMetrics | null;
  clock?: Clock;
}

export interface VisitCounter {
  service: VisitCounterService;
  registry: ShardRegistry;
  cache: CountCache;
  batchWriter: BatchWriter;
  metrics: CounterMetrics | null;
}

export function createVisitCounter(options: CreateVisitCounterOptions): VisitCounter {
  const { config, logger } = options;
  const clock = options.clock ?? REAL_CLOCK;
  const metrics = options.metrics === undefined ? new CounterMetrics() : options.metrics;

  const storeFactory =
    options.storeFactory ??
    createCounterStoreFactory(
      {
        password: config.redisPassword,
        db: config.redisDb,
        keyPrefix: config.redisKeyPrefix,
        commandTimeoutMs: config.redisCommandTimeoutMs,
        connectTimeoutMs: config.redisConnectTimeoutMs,
      },
      logger
    );

  const registry = new ShardRegistry({
    config: {
      nodes: config.redisNodes,
      virtualNodes: config.virtualNodes,
      retry: {
        maxAttempts: config.redisRetryAttempts,
        baseDelayMs: config.redisRetryBaseDelayMs,
        maxDelayMs: RETRY_MAX_DELAY_MS,
        timeoutMs: config.redisCommandTimeoutMs,
      },
      probeIntervalMs: config.healthProbeIntervalMs,
      probeTimeoutMs: config.redisCommandTimeoutMs,
    },
    storeFactory,
    logger,
    metrics,
    clock,
  });

  const cache = new CountCache(
    logger,
    { capacity: config.cacheCapacity, ttlMs: config.cacheTtlMs },
    clock
  );

  const mutex = new KeyedMutex();

  const batchWriter = new BatchWriter({
    sink: registry,
    logger,
    config: {
      intervalMs: config.batchIntervalMs,
      sizeLimit: config.batchSizeLimit,
      shutdownGraceMs: config.shutdownGraceMs,
    },
    mutex,
    metrics,
    clock,
  });

  const service = new VisitCounterService({
    registry,
    cache,
    batchWriter,
    mutex,
    logger,
    metrics,
  });

  return { service, registry, cache, batchWriter, metrics };
}
