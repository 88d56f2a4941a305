/**
 * Visit Counter Service
 *
 * Front door of the counter core. Writes go to the cache and the batch
 * writer and return without storage I/O; reads are served from the cache
 * when possible, otherwise from the owning shard plus whatever is still
 * buffered for the key.
 *
 * Staleness: a recorded visit seeds or bumps the cache entry, so a key
 * first seen on this process can read low (the local count only) until the
 * entry expires and a storage read replaces it. The window is bounded by
 * the cache TTL.
 *
 * @module services/VisitCounterService
 */

import type { Logger } from 'pino';
import type { CountCache } from '../infrastructure/cache/CountCache.js';
import type { CounterMetrics } from '../infrastructure/metrics.js';
import {
  CounterError,
  type CountLookup,
  type CountResult,
  type CounterMetricsSnapshot,
  type ServiceStatus,
} from '../types.js';
import type { KeyedMutex } from '../utils/keyed-mutex.js';
import type { BatchWriter, ShutdownReport } from './BatchWriter.js';
import type { ShardRegistry } from './ShardRegistry.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface VisitCounterServiceDeps {
  registry: ShardRegistry;
  cache: CountCache;
  batchWriter: BatchWriter;
  /** Must be the same lock the batch writer snapshots under */
  mutex: KeyedMutex;
  logger: Logger;
  metrics?: CounterMetrics | null;
}

// --------------------------------------------------------------------------
// Service
// --------------------------------------------------------------------------

export class VisitCounterService {
  private readonly log: Logger;
  private readonly registry: ShardRegistry;
  private readonly cache: CountCache;
  private readonly batchWriter: BatchWriter;
  private readonly mutex: KeyedMutex;
  private readonly counterMetrics: CounterMetrics | null;
  private started = false;

  constructor(deps: VisitCounterServiceDeps) {
    this.log = deps.logger.child({ component: 'VisitCounterService' });
    this.registry = deps.registry;
    this.cache = deps.cache;
    this.batchWriter = deps.batchWriter;
    this.mutex = deps.mutex;
    this.counterMetrics = deps.metrics ?? null;
  }

  // --------------------------------------------------------------------------
  // Operations
  // --------------------------------------------------------------------------

  /**
   * Count one visit. Returns synchronously; the increment reaches storage
   * on the next flush.
   */
  recordVisit(key: string): void {
    this.cache.increment(key, 1);
    this.batchWriter.recordIncrement(key, 1);
    this.counterMetrics?.setCacheSize(this.cache.size);
  }

  /**
   * Current count for `key`
   * @throws CounterError STORAGE_UNAVAILABLE when the owning node is down
   *   and the key is not cached
   */
  async getCount(key: string): Promise<CountResult> {
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      this.counterMetrics?.recordCacheLookup('hit');
      return { key, count: cached, source: { kind: 'cache' } };
    }
    this.counterMetrics?.recordCacheLookup('miss');

    return this.mutex.runExclusive(key, async (): Promise<CountResult> => {
      // Filled by a caller that held the lock before us
      const filled = this.cache.peek(key);
      if (filled !== undefined) {
        return { key, count: filled, source: { kind: 'cache' } };
      }

      // A write that already left the buffer must land before we read, or
      // its delta would be missing from both storage and the buffer
      await this.batchWriter.settled(key);

      const { value, node } = await this.registry.get(key);
      const pendingDelta = this.batchWriter.pendingDelta(key);
      const count = (value ?? 0) + pendingDelta;

      this.cache.put(key, count);
      this.counterMetrics?.setCacheSize(this.cache.size);

      const result: CountResult =
        pendingDelta > 0
          ? { key, count, source: { kind: 'buffered', node, pendingDelta } }
          : { key, count, source: { kind: 'storage', node } };

      this.log.debug({ key, count, source: result.source }, 'Count read from storage');
      return result;
    });
  }

  /**
   * Counts for several keys; each key succeeds or fails on its own
   */
  async getCounts(keys: string[]): Promise<CountLookup[]> {
    return Promise.all(
      keys.map(async (key): Promise<CountLookup> => {
        try {
          return { ok: true, result: await this.getCount(key) };
        } catch (error) {
          if (error instanceof CounterError) {
            return { ok: false, key, error };
          }
          throw error;
        }
      })
    );
  }

  /**
   * Set the count for `key` back to zero. On failure nothing local is
   * cleared, so buffered increments are not lost.
   * @throws CounterError STORAGE_UNAVAILABLE
   */
  async resetCount(key: string): Promise<void> {
    await this.mutex.runExclusive(key, async () => {
      await this.batchWriter.settled(key);

      const pendingAtReset = this.batchWriter.pendingDelta(key);
      const { node } = await this.registry.reset(key);

      this.batchWriter.discard(key, pendingAtReset);
      this.cache.invalidate(key);
      this.counterMetrics?.setCacheSize(this.cache.size);

      this.log.info({ key, node, discardedPending: pendingAtReset }, 'Counter reset');
    });
  }

  // --------------------------------------------------------------------------
  // Status
  // --------------------------------------------------------------------------

  metrics(): CounterMetricsSnapshot {
    const nodes = this.registry.healthSnapshot();
    const buffer = this.batchWriter.stats();

    return {
      status: overallStatus(nodes),
      cache: this.cache.stats(),
      buffer,
      nodes,
      nodeStatuses: this.registry.nodeStatuses(),
      distribution: this.registry.distribution(),
      lastSuccessfulFlushAt: buffer.lastSuccessfulFlushAt,
    };
  }

  /** Owning node of `key` */
  ownerOf(key: string): string {
    return this.registry.ownerOf(key);
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  /** Start the flush timer and the health probe */
  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;
    this.batchWriter.start();
    this.registry.startHealthProbe();
    this.log.info('Visit counter service started');
  }

  /**
   * Stop background work, write out the buffer within the grace period and
   * close storage connections
   */
  async shutdown(): Promise<ShutdownReport> {
    this.log.info('Visit counter service shutting down');
    await this.registry.stopHealthProbe();
    const report = await this.batchWriter.stop();
    await this.registry.close();
    this.started = false;

    this.log.info(
      { droppedKeys: report.droppedKeys, droppedVisits: report.droppedVisits },
      'Visit counter service stopped'
    );
    return report;
  }
}

function overallStatus(nodes: Record<string, boolean>): ServiceStatus {
  const flags = Object.values(nodes);
  const healthy = flags.filter(Boolean).length;

  if (healthy === flags.length) return 'healthy';
  if (healthy === 0) return 'unavailable';
  return 'degraded';
}

