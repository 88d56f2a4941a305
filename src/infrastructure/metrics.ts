/**
 * Counter Metrics
 *
 * Prometheus metrics for the counter core. Each instance owns its registry
 * so several services (and tests) can coexist in one process.
 */

import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export type CacheLookupResult = 'hit' | 'miss';
export type StorageOperation = 'get' | 'increment' | 'reset' | 'ping';
export type StorageOutcome = 'success' | 'failure' | 'rejected';
export type FlushOutcome = 'success' | 'partial' | 'failure' | 'empty';

export interface CounterMetricsOptions {
  /** Also collect Node.js process metrics */
  collectDefaults?: boolean;
  prefix?: string;
}

export class CounterMetrics {
  readonly registry: Registry;

  // ==========================================================================
  // Cache
  // ==========================================================================

  private readonly cacheLookups: Counter<'result'>;
  private readonly cacheSize: Gauge;

  // ==========================================================================
  // Batch Writer
  // ==========================================================================

  private readonly pendingKeys: Gauge;
  private readonly flushCycles: Counter<'outcome'>;
  private readonly keysFlushed: Counter;
  private readonly keysFailed: Counter;
  private readonly flushDuration: Histogram;
  private readonly bufferOverflows: Counter;
  private readonly droppedVisits: Counter;

  // ==========================================================================
  // Storage
  // ==========================================================================

  private readonly storageOperations: Counter<'node' | 'operation' | 'outcome'>;
  private readonly storageDuration: Histogram<'node' | 'operation'>;
  private readonly nodeHealthy: Gauge<'node'>;

  constructor(options: CounterMetricsOptions = {}) {
    const prefix = options.prefix ?? 'visit_counter_';
    this.registry = new Registry();

    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry });
    }

    this.cacheLookups = new Counter({
      name: `${prefix}cache_lookups_total`,
      help: 'Cache lookups by result',
      labelNames: ['result'] as const,
      registers: [this.registry],
    });

    this.cacheSize = new Gauge({
      name: `${prefix}cache_entries`,
      help: 'Entries currently in the count cache',
      registers: [this.registry],
    });

    this.pendingKeys = new Gauge({
      name: `${prefix}pending_keys`,
      help: 'Keys with unflushed increments',
      registers: [this.registry],
    });

    this.flushCycles = new Counter({
      name: `${prefix}flush_cycles_total`,
      help: 'Flush cycles by outcome',
      labelNames: ['outcome'] as const,
      registers: [this.registry],
    });

    this.keysFlushed = new Counter({
      name: `${prefix}keys_flushed_total`,
      help: 'Keys whose pending delta was written to storage',
      registers: [this.registry],
    });

    this.keysFailed = new Counter({
      name: `${prefix}keys_flush_failed_total`,
      help: 'Key flushes that failed and stayed pending',
      registers: [this.registry],
    });

    this.flushDuration = new Histogram({
      name: `${prefix}flush_duration_seconds`,
      help: 'Flush cycle duration in seconds',
      buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
      registers: [this.registry],
    });

    this.bufferOverflows = new Counter({
      name: `${prefix}buffer_overflows_total`,
      help: 'Times the pending buffer reached its size limit',
      registers: [this.registry],
    });

    this.droppedVisits = new Counter({
      name: `${prefix}visits_dropped_on_shutdown_total`,
      help: 'Visits still pending when the shutdown grace period ended',
      registers: [this.registry],
    });

    this.storageOperations = new Counter({
      name: `${prefix}storage_operations_total`,
      help: 'Storage operations by node, operation and outcome',
      labelNames: ['node', 'operation', 'outcome'] as const,
      registers: [this.registry],
    });

    this.storageDuration = new Histogram({
      name: `${prefix}storage_operation_duration_seconds`,
      help: 'Storage operation duration in seconds, retries included',
      labelNames: ['node', 'operation'] as const,
      buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 5],
      registers: [this.registry],
    });

    this.nodeHealthy = new Gauge({
      name: `${prefix}node_healthy`,
      help: 'Storage node health (1=healthy, 0=unhealthy)',
      labelNames: ['node'] as const,
      registers: [this.registry],
    });
  }

  // --------------------------------------------------------------------------
  // Recording
  // --------------------------------------------------------------------------

  recordCacheLookup(result: CacheLookupResult): void {
    this.cacheLookups.inc({ result });
  }

  setCacheSize(size: number): void {
    this.cacheSize.set(size);
  }

  setPendingKeys(count: number): void {
    this.pendingKeys.set(count);
  }

  recordFlush(outcome: FlushOutcome, flushed: number, failed: number, durationMs: number): void {
    this.flushCycles.inc({ outcome });
    if (flushed > 0) this.keysFlushed.inc(flushed);
    if (failed > 0) this.keysFailed.inc(failed);
    this.flushDuration.observe(durationMs / 1000);
  }

  recordBufferOverflow(): void {
    this.bufferOverflows.inc();
  }

  recordDroppedVisits(visits: number): void {
    if (visits > 0) this.droppedVisits.inc(visits);
  }

  recordStorageOperation(
    node: string,
    operation: StorageOperation,
    outcome: StorageOutcome,
    durationMs: number
  ): void {
    this.storageOperations.inc({ node, operation, outcome });
    if (outcome !== 'rejected') {
      this.storageDuration.observe({ node, operation }, durationMs / 1000);
    }
  }

  setNodeHealth(node: string, healthy: boolean): void {
    this.nodeHealthy.set({ node }, healthy ? 1 : 0);
  }

  // --------------------------------------------------------------------------
  // Exposition
  // --------------------------------------------------------------------------

  get contentType(): string {
    return this.registry.contentType;
  }

  async metrics(): Promise<string> {
    return this.registry.metrics();
  }
}
