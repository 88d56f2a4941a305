/**
 * Shard Registry
 *
 * Owns the configured storage nodes and the hash ring that assigns keys to
 * them. Every command goes to the key's owning node through the retry
 * policy; a node that exhausts its retry budget is marked unhealthy and
 * further commands for its keys fail fast until the background probe (or
 * an operator) brings it back. Keys are never re-routed to another node.
 *
 * @module services/ShardRegistry
 */

import type { Logger } from 'pino';
import { HashRing } from '../infrastructure/hashing/HashRing.js';
import type { CounterMetrics, StorageOperation } from '../infrastructure/metrics.js';
import {
  RetryExhaustedError,
  withRetry,
  type RetryPolicy,
} from '../infrastructure/storage/RetryPolicy.js';
import type { CounterStore, CounterStoreFactory } from '../infrastructure/storage/types.js';
import { CounterError, CounterErrorCode, type StorageNodeStatus } from '../types.js';
import { REAL_CLOCK, type Clock } from '../utils/clock.js';
import { PeriodicTask } from '../utils/periodic-task.js';
import { withTimeout } from '../utils/timeout.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface ShardRegistryConfig {
  /** Node addresses; each address is also the node id */
  nodes: string[];
  virtualNodes: number;
  retry: RetryPolicy;
  probeIntervalMs: number;
  /** Deadline for a single probe ping */
  probeTimeoutMs: number;
}

export interface ShardRegistryDeps {
  config: ShardRegistryConfig;
  storeFactory: CounterStoreFactory;
  logger: Logger;
  metrics?: CounterMetrics | null;
  clock?: Clock;
}

export interface ShardReadResult {
  value: number | null;
  node: string;
}

export interface ShardWriteResult {
  value: number;
  node: string;
}

interface NodeState {
  store: CounterStore;
  status: StorageNodeStatus;
}

// --------------------------------------------------------------------------
// Registry
// --------------------------------------------------------------------------

export class ShardRegistry {
  private readonly log: Logger;
  private readonly ring: HashRing;
  private readonly nodes = new Map<string, NodeState>();
  private readonly metrics: CounterMetrics | null;
  private readonly clock: Clock;
  private readonly probe: PeriodicTask;
  private readonly config: ShardRegistryConfig;

  constructor(deps: ShardRegistryDeps) {
    this.config = deps.config;
    this.log = deps.logger.child({ component: 'ShardRegistry' });
    this.metrics = deps.metrics ?? null;
    this.clock = deps.clock ?? REAL_CLOCK;
    this.ring = new HashRing({ defaultVirtualCount: this.config.virtualNodes });

    for (const address of this.config.nodes) {
      if (this.nodes.has(address)) {
        this.log.warn({ node: address }, 'Duplicate storage node address ignored');
        continue;
      }

      this.nodes.set(address, {
        store: deps.storeFactory(address),
        status: { address, healthy: true, lastCheckedAt: null, consecutiveFailures: 0 },
      });
      this.ring.addNode(address);
      this.metrics?.setNodeHealth(address, true);
    }

    if (this.ring.isEmpty()) {
      throw new CounterError(
        CounterErrorCode.NO_AVAILABLE_NODE,
        'No storage nodes configured'
      );
    }

    this.probe = new PeriodicTask({
      name: 'health-probe',
      intervalMs: this.config.probeIntervalMs,
      logger: deps.logger,
      run: async () => {
        await this.probeNow();
      },
    });

    this.log.info(
      { nodes: this.ring.nodes(), virtualNodes: this.config.virtualNodes },
      'Shard registry initialized'
    );
  }

  // --------------------------------------------------------------------------
  // Commands
  // --------------------------------------------------------------------------

  /**
   * Stored count for `key` on its owning node; null when never written
   * @throws CounterError STORAGE_UNAVAILABLE
   */
  async get(key: string): Promise<ShardReadResult> {
    return this.execute(key, 'get', (store) => store.get(key));
  }

  /**
   * Add `delta` to `key` on its owning node
   * @throws CounterError STORAGE_UNAVAILABLE
   */
  async increment(key: string, delta: number): Promise<ShardWriteResult> {
    return this.execute(key, 'increment', (store) => store.incrementBy(key, delta));
  }

  /**
   * Delete `key` on its owning node
   * @throws CounterError STORAGE_UNAVAILABLE
   */
  async reset(key: string): Promise<{ node: string }> {
    const { node } = await this.execute(key, 'reset', (store) => store.reset(key));
    return { node };
  }

  /** Node that owns `key` */
  ownerOf(key: string): string {
    return this.ring.route(key);
  }

  // --------------------------------------------------------------------------
  // Health
  // --------------------------------------------------------------------------

  healthSnapshot(): Record<string, boolean> {
    const snapshot: Record<string, boolean> = {};
    for (const [nodeId, state] of this.nodes) {
      snapshot[nodeId] = state.status.healthy;
    }
    return snapshot;
  }

  nodeStatuses(): StorageNodeStatus[] {
    return Array.from(this.nodes.values(), (state) => ({ ...state.status }));
  }

  isNodeHealthy(nodeId: string): boolean {
    return this.nodes.get(nodeId)?.status.healthy ?? false;
  }

  /** Virtual ring positions per node */
  distribution(): Record<string, number> {
    return this.ring.distribution();
  }

  /** Administrative override; returns false for an unknown node */
  markUnhealthy(nodeId: string): boolean {
    const state = this.nodes.get(nodeId);
    if (!state) return false;
    this.recordFailure(nodeId, state);
    return true;
  }

  /** Administrative override; returns false for an unknown node */
  markHealthy(nodeId: string): boolean {
    const state = this.nodes.get(nodeId);
    if (!state) return false;
    this.recordSuccess(nodeId, state);
    return true;
  }

  /**
   * Ping every node once and update health from the result
   */
  async probeNow(): Promise<Record<string, boolean>> {
    await Promise.all(
      Array.from(this.nodes, async ([nodeId, state]) => {
        const startedAt = this.clock.now();
        try {
          await withTimeout(state.store.ping(), this.config.probeTimeoutMs, `ping ${nodeId}`);
          this.metrics?.recordStorageOperation(nodeId, 'ping', 'success', this.clock.now() - startedAt);
          this.recordSuccess(nodeId, state);
        } catch (error) {
          this.metrics?.recordStorageOperation(nodeId, 'ping', 'failure', this.clock.now() - startedAt);
          this.log.debug({ node: nodeId, error }, 'Health probe failed');
          this.recordFailure(nodeId, state);
        }
      })
    );

    return this.healthSnapshot();
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  startHealthProbe(): void {
    this.probe.start();
  }

  async stopHealthProbe(): Promise<void> {
    await this.probe.stop();
  }

  /** Stop the probe and release every node connection */
  async close(): Promise<void> {
    await this.probe.stop();
    await Promise.all(Array.from(this.nodes.values(), (state) => state.store.close()));
    this.log.info('Shard registry closed');
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private async execute<T>(
    key: string,
    operation: StorageOperation,
    command: (store: CounterStore) => Promise<T>
  ): Promise<{ value: T; node: string }> {
    const nodeId = this.ring.route(key);
    const state = this.nodes.get(nodeId);

    if (!state) {
      throw new CounterError(CounterErrorCode.NO_AVAILABLE_NODE, `Node ${nodeId} is not registered`, {
        key,
        node: nodeId,
      });
    }

    if (!state.status.healthy) {
      this.metrics?.recordStorageOperation(nodeId, operation, 'rejected', 0);
      throw new CounterError(
        CounterErrorCode.STORAGE_UNAVAILABLE,
        `Storage node ${nodeId} is unavailable`,
        { key, node: nodeId, operation }
      );
    }

    const startedAt = this.clock.now();
    try {
      const value = await withRetry(
        () => command(state.store),
        this.config.retry,
        `${operation} ${key} on ${nodeId}`,
        {
          onRetry: (attempt, error, delayMs) => {
            this.log.warn({ node: nodeId, key, operation, attempt, delayMs, error }, 'Storage operation failed, retrying');
          },
        }
      );

      this.metrics?.recordStorageOperation(nodeId, operation, 'success', this.clock.now() - startedAt);
      this.recordSuccess(nodeId, state);
      return { value, node: nodeId };
    } catch (error) {
      this.metrics?.recordStorageOperation(nodeId, operation, 'failure', this.clock.now() - startedAt);
      this.recordFailure(nodeId, state);

      const attempts = error instanceof RetryExhaustedError ? error.attempts : 1;
      this.log.error({ node: nodeId, key, operation, attempts, error }, 'Storage operation failed');
      throw new CounterError(
        CounterErrorCode.STORAGE_UNAVAILABLE,
        `Storage node ${nodeId} failed ${operation} after ${attempts} attempt(s)`,
        { key, node: nodeId, operation, attempts }
      );
    }
  }

  private recordSuccess(nodeId: string, state: NodeState): void {
    const wasHealthy = state.status.healthy;
    state.status.healthy = true;
    state.status.consecutiveFailures = 0;
    state.status.lastCheckedAt = this.clock.now();

    if (!wasHealthy) {
      this.log.info({ node: nodeId }, 'Storage node recovered');
      this.metrics?.setNodeHealth(nodeId, true);
    }
  }

  private recordFailure(nodeId: string, state: NodeState): void {
    const wasHealthy = state.status.healthy;
    state.status.healthy = false;
    state.status.consecutiveFailures++;
    state.status.lastCheckedAt = this.clock.now();

    if (wasHealthy) {
      this.log.warn({ node: nodeId }, 'Storage node marked unhealthy');
      this.metrics?.setNodeHealth(nodeId, false);
    }
  }
}
