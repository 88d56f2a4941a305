/**
 * Visit Counter Domain Types
 *
 * Shared types for the counter core: provenance of a read, node status,
 * metrics snapshot shapes and the error taxonomy.
 *
 * @module types
 */

// --------------------------------------------------------------------------
// Keys and Counts
// --------------------------------------------------------------------------

/** Opaque, case-sensitive identifier of a counted resource (e.g. a page id) */
export type CounterKey = string;

/** Non-negative integer visit count */
export type Count = number;

// --------------------------------------------------------------------------
// Read Provenance
// --------------------------------------------------------------------------

/**
 * Where a returned count came from.
 *
 * - `cache`: served from the in-process cache without touching storage
 * - `storage`: read from the owning node with nothing pending for the key
 * - `buffered`: storage value plus increments not yet flushed
 */
export type CountSource =
  | { kind: 'cache' }
  | { kind: 'storage'; node: string }
  | { kind: 'buffered'; node: string; pendingDelta: number };

export interface CountResult {
  key: CounterKey;
  count: Count;
  source: CountSource;
}

/** Per-key outcome of a multi-key read */
export type CountLookup =
  | { ok: true; result: CountResult }
  | { ok: false; key: CounterKey; error: CounterError };

// --------------------------------------------------------------------------
// Storage Node Status
// --------------------------------------------------------------------------

export interface StorageNodeStatus {
  /** Node identifier (its configured address) */
  address: string;
  healthy: boolean;
  /** Epoch ms of the last probe or operation that set the health flag */
  lastCheckedAt: number | null;
  consecutiveFailures: number;
}

// --------------------------------------------------------------------------
// Metrics Snapshots
// --------------------------------------------------------------------------

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
  capacity: number;
  evictions: number;
  expirations: number;
  hitRate: number;
}

export interface BatchWriterStats {
  pendingKeys: number;
  pendingVisits: number;
  lastFlushAt: number | null;
  lastSuccessfulFlushAt: number | null;
  partialFailures: number;
  overflows: number;
  droppedKeysOnShutdown: number;
  droppedVisitsOnShutdown: number;
}

export type ServiceStatus = 'healthy' | 'degraded' | 'unavailable';

export interface CounterMetricsSnapshot {
  status: ServiceStatus;
  cache: CacheStats;
  buffer: BatchWriterStats;
  nodes: Record<string, boolean>;
  nodeStatuses: StorageNodeStatus[];
  /** Virtual ring positions held by each node */
  distribution: Record<string, number>;
  lastSuccessfulFlushAt: number | null;
}

// --------------------------------------------------------------------------
// Errors
// --------------------------------------------------------------------------

export enum CounterErrorCode {
  /** Ring has no nodes; fatal at startup */
  NO_AVAILABLE_NODE = 'COUNTER_001',
  /** Owning node unreachable after the retry budget, or currently unhealthy */
  STORAGE_UNAVAILABLE = 'COUNTER_002',
  /** Pending keys reached the size limit; triggers a flush */
  BUFFER_OVERFLOW = 'COUNTER_003',
  /** Some keys in a flush cycle failed and stay pending */
  PARTIAL_FLUSH_FAILURE = 'COUNTER_004',
  /** Configuration did not validate */
  INVALID_CONFIG = 'COUNTER_005',
}

export class CounterError extends Error {
  constructor(
    public readonly code: CounterErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CounterError';
  }
}

