/**
 * Batch Writer
 *
 * Write-behind buffer for visit increments. Increments are coalesced into
 * one pending delta per key and written to the owning shard on a fixed
 * interval, or straight away once the number of pending keys reaches the
 * size limit.
 *
 * Flushing a key:
 * 1. Under the key lock, snapshot its delta and start the storage write
 * 2. Release the lock; the write runs without holding it
 * 3. On success subtract the snapshot, so increments recorded during the
 *    write stay pending; on failure leave the delta for the next cycle
 *
 * Delivery is at-least-once: a write that lands after its attempt timed
 * out is retried and counted twice.
 *
 * @module services/BatchWriter
 */

import type { Logger } from 'pino';
import type { CounterMetrics, FlushOutcome } from '../infrastructure/metrics.js';
import { CounterErrorCode, type BatchWriterStats } from '../types.js';
import { REAL_CLOCK, type Clock } from '../utils/clock.js';
import { KeyedMutex } from '../utils/keyed-mutex.js';
import { PeriodicTask } from '../utils/periodic-task.js';
import { TimeoutError, withTimeout } from '../utils/timeout.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface BatchWriterConfig {
  /** Interval between scheduled flush cycles (ms) */
  intervalMs: number;
  /** Pending key count that triggers an immediate flush */
  sizeLimit: number;
  /** Budget for the final flush on stop (ms) */
  shutdownGraceMs: number;
}

/** Destination for flushed deltas; the shard registry in production */
export interface IncrementSink {
  increment(key: string, delta: number): Promise<unknown>;
}

export interface PendingDelta {
  key: string;
  delta: number;
  firstSeenAt: number;
}

export interface FlushReport {
  /** Keys written successfully */
  flushed: number;
  /** Keys whose write failed and stay pending */
  failed: number;
  failedKeys: string[];
  /** Sum of the deltas written */
  visitsFlushed: number;
}

export interface ShutdownReport {
  finalFlush: FlushReport | null;
  timedOut: boolean;
  droppedKeys: number;
  droppedVisits: number;
}

export interface BatchWriterDeps {
  sink: IncrementSink;
  logger: Logger;
  config?: Partial<BatchWriterConfig>;
  /** Shared with the counter service so reads and resets see consistent deltas */
  mutex?: KeyedMutex;
  metrics?: CounterMetrics | null;
  clock?: Clock;
}

export const DEFAULT_BATCH_WRITER_CONFIG: BatchWriterConfig = {
  intervalMs: 5000,
  sizeLimit: 1000,
  shutdownGraceMs: 10_000,
};

const EMPTY_REPORT: FlushReport = { flushed: 0, failed: 0, failedKeys: [], visitsFlushed: 0 };

// --------------------------------------------------------------------------
// Batch Writer
// --------------------------------------------------------------------------

export class BatchWriter {
  private readonly pending = new Map<string, PendingDelta>();
  private readonly inFlight = new Map<string, Promise<void>>();
  private readonly log: Logger;
  private readonly config: BatchWriterConfig;
  private readonly sink: IncrementSink;
  private readonly mutex: KeyedMutex;
  private readonly metrics: CounterMetrics | null;
  private readonly clock: Clock;
  private readonly task: PeriodicTask;

  private currentFlush: Promise<FlushReport> | null = null;
  /** Set when pending keys cross the size limit; cleared once they drop below */
  private overLimit = false;

  // Statistics
  private lastFlushAt: number | null = null;
  private lastSuccessfulFlushAt: number | null = null;
  private partialFailures = 0;
  private overflows = 0;
  private droppedKeysOnShutdown = 0;
  private droppedVisitsOnShutdown = 0;

  constructor(deps: BatchWriterDeps) {
    this.log = deps.logger.child({ component: 'BatchWriter' });
    this.config = { ...DEFAULT_BATCH_WRITER_CONFIG, ...deps.config };
    this.sink = deps.sink;
    this.mutex = deps.mutex ?? new KeyedMutex();
    this.metrics = deps.metrics ?? null;
    this.clock = deps.clock ?? REAL_CLOCK;

    if (!Number.isInteger(this.config.sizeLimit) || this.config.sizeLimit < 1) {
      throw new RangeError(`Batch size limit must be a positive integer, got ${this.config.sizeLimit}`);
    }

    this.task = new PeriodicTask({
      name: 'batch-flush',
      intervalMs: this.config.intervalMs,
      logger: deps.logger,
      run: async () => {
        await this.flushNow();
      },
    });
  }

  // --------------------------------------------------------------------------
  // Recording
  // --------------------------------------------------------------------------

  /**
   * Add `delta` to the key's pending increment. Never waits on storage.
   */
  recordIncrement(key: string, delta = 1): void {
    if (!Number.isInteger(delta) || delta < 1) {
      throw new RangeError(`Increment must be a positive integer, got ${delta}`);
    }

    if (this.pending.size < this.config.sizeLimit) {
      this.overLimit = false;
    }

    const entry = this.pending.get(key);
    if (entry) {
      entry.delta += delta;
    } else {
      this.pending.set(key, { key, delta, firstSeenAt: this.clock.now() });
      this.metrics?.setPendingKeys(this.pending.size);
    }

    if (this.pending.size >= this.config.sizeLimit && !this.overLimit) {
      this.triggerOverflowFlush();
    }
  }

  /** Unflushed increments for `key` */
  pendingDelta(key: string): number {
    return this.pending.get(key)?.delta ?? 0;
  }

  /**
   * Remove up to `amount` of the key's pending delta. Used after a reset
   * has cleared the stored value.
   */
  discard(key: string, amount: number): void {
    const entry = this.pending.get(key);
    if (!entry || amount <= 0) {
      return;
    }

    entry.delta -= Math.min(amount, entry.delta);
    if (entry.delta === 0) {
      this.pending.delete(key);
      this.metrics?.setPendingKeys(this.pending.size);
    }
  }

  /**
   * Resolves once any in-flight write of `key` has settled, successfully or not
   */
  settled(key: string): Promise<void> {
    return this.inFlight.get(key) ?? Promise.resolve();
  }

  /** Copy of the pending buffer */
  snapshot(): PendingDelta[] {
    return Array.from(this.pending.values(), (entry) => ({ ...entry }));
  }

  // --------------------------------------------------------------------------
  // Flushing
  // --------------------------------------------------------------------------

  /**
   * Write every pending delta now. A call made while a cycle is running
   * joins that cycle.
   */
  flushNow(): Promise<FlushReport> {
    if (this.currentFlush) {
      return this.currentFlush;
    }

    const cycle = this.runFlushCycle().finally(() => {
      this.currentFlush = null;
    });
    this.currentFlush = cycle;
    return cycle;
  }

  private async runFlushCycle(): Promise<FlushReport> {
    const keys = Array.from(this.pending.keys());
    const startedAt = this.clock.now();

    if (keys.length === 0) {
      this.lastFlushAt = startedAt;
      this.lastSuccessfulFlushAt = startedAt;
      this.metrics?.recordFlush('empty', 0, 0, 0);
      return { ...EMPTY_REPORT, failedKeys: [] };
    }

    const results = await Promise.allSettled(keys.map((key) => this.flushKey(key)));

    const report: FlushReport = { flushed: 0, failed: 0, failedKeys: [], visitsFlushed: 0 };
    results.forEach((result, index) => {
      const key = keys[index] ?? '';
      if (result.status === 'fulfilled') {
        if (result.value > 0) {
          report.flushed++;
          report.visitsFlushed += result.value;
        }
      } else {
        report.failed++;
        report.failedKeys.push(key);
      }
    });

    const finishedAt = this.clock.now();
    this.lastFlushAt = finishedAt;
    if (report.failed === 0) {
      this.lastSuccessfulFlushAt = finishedAt;
    }

    let outcome: FlushOutcome = 'success';
    if (report.failed > 0) {
      outcome = report.flushed > 0 ? 'partial' : 'failure';
      this.partialFailures++;
      this.log.warn(
        {
          code: CounterErrorCode.PARTIAL_FLUSH_FAILURE,
          flushed: report.flushed,
          failed: report.failed,
          failedKeys: report.failedKeys.slice(0, 20),
        },
        'Flush cycle left keys pending'
      );
    } else {
      this.log.debug({ flushed: report.flushed, visits: report.visitsFlushed }, 'Flush cycle complete');
    }

    this.metrics?.recordFlush(outcome, report.flushed, report.failed, finishedAt - startedAt);
    this.metrics?.setPendingKeys(this.pending.size);
    return report;
  }

  /**
   * Flush one key; resolves to the delta written (0 when nothing was pending)
   */
  private async flushKey(key: string): Promise<number> {
    const started = await this.mutex.runExclusive(key, async () => this.beginWrite(key));
    if (!started) {
      return 0;
    }
    return started.write;
  }

  /**
   * Snapshot the key's delta and start its write. Runs under the key lock.
   * The write is wrapped in an object so the lock is not held across it.
   */
  private beginWrite(key: string): { write: Promise<number> } | null {
    const entry = this.pending.get(key);
    if (!entry || entry.delta === 0) {
      return null;
    }

    const delta = entry.delta;
    const write = this.sink.increment(key, delta).then(
      () => {
        this.inFlight.delete(key);
        this.subtract(key, delta);
        return delta;
      },
      (error: unknown) => {
        this.inFlight.delete(key);
        throw error;
      }
    );

    this.inFlight.set(
      key,
      write.then(
        () => undefined,
        () => undefined
      )
    );
    return { write };
  }

  private subtract(key: string, delta: number): void {
    const entry = this.pending.get(key);
    if (!entry) {
      return;
    }

    entry.delta -= delta;
    if (entry.delta <= 0) {
      this.pending.delete(key);
    }
  }

  private triggerOverflowFlush(): void {
    this.overLimit = true;
    this.overflows++;
    this.metrics?.recordBufferOverflow();
    this.log.warn(
      {
        code: CounterErrorCode.BUFFER_OVERFLOW,
        pendingKeys: this.pending.size,
        sizeLimit: this.config.sizeLimit,
      },
      'Pending buffer reached size limit, flushing early'
    );

    void this.flushNow().catch((error: unknown) => {
      this.log.error({ error }, 'Overflow flush failed');
    });
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  start(): void {
    this.task.start();
    this.log.info(
      { intervalMs: this.config.intervalMs, sizeLimit: this.config.sizeLimit },
      'Batch writer started'
    );
  }

  /**
   * Stop the timer and write what is left within the grace period. Anything
   * still pending afterwards is dropped and reported.
   */
  async stop(): Promise<ShutdownReport> {
    await this.task.stop();

    let finalFlush: FlushReport | null = null;
    let timedOut = false;

    try {
      finalFlush = await withTimeout(this.drain(), this.config.shutdownGraceMs, 'final flush');
    } catch (error) {
      timedOut = error instanceof TimeoutError;
      this.log.error({ error, timedOut }, 'Final flush did not complete');
    }

    const dropped = Array.from(this.pending.values());
    const droppedVisits = dropped.reduce((sum, entry) => sum + entry.delta, 0);

    if (dropped.length > 0) {
      this.droppedKeysOnShutdown += dropped.length;
      this.droppedVisitsOnShutdown += droppedVisits;
      this.metrics?.recordDroppedVisits(droppedVisits);
      this.log.error(
        {
          droppedKeys: dropped.length,
          droppedVisits,
          keys: dropped.slice(0, 20).map((entry) => entry.key),
        },
        'Dropping unflushed visits on shutdown'
      );
      this.pending.clear();
      this.metrics?.setPendingKeys(0);
    }

    this.log.info({ finalFlush, timedOut }, 'Batch writer stopped');
    return { finalFlush, timedOut, droppedKeys: dropped.length, droppedVisits };
  }

  /** Let a running cycle finish, then flush whatever it did not cover */
  private async drain(): Promise<FlushReport> {
    if (this.currentFlush) {
      await this.currentFlush;
    }
    return this.flushNow();
  }

  // --------------------------------------------------------------------------
  // Stats
  // --------------------------------------------------------------------------

  get size(): number {
    return this.pending.size;
  }

  stats(): BatchWriterStats {
    let pendingVisits = 0;
    for (const entry of this.pending.values()) {
      pendingVisits += entry.delta;
    }

    return {
      pendingKeys: this.pending.size,
      pendingVisits,
      lastFlushAt: this.lastFlushAt,
      lastSuccessfulFlushAt: this.lastSuccessfulFlushAt,
      partialFailures: this.partialFailures,
      overflows: this.overflows,
      droppedKeysOnShutdown: this.droppedKeysOnShutdown,
      droppedVisitsOnShutdown: this.droppedVisitsOnShutdown,
    };
  }
}
