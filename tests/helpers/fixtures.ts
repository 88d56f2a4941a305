/**
 * Shared test fixtures
 */

import pino from 'pino';
import type { Clock } from '../../src/utils/clock.js';
import type { CounterSettings } from '../../src/services/factory.js';
import { InMemoryCounterStore } from '../../src/infrastructure/storage/InMemoryCounterStore.js';
import type { CounterStoreFactory } from '../../src/infrastructure/storage/types.js';

export const silentLogger = pino({ level: 'silent' });

/** Clock that only moves when told to */
export class ManualClock implements Clock {
  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  set(ms: number): void {
    this.current = ms;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Store factory that keeps every created in-memory store reachable */
export function memoryStores(): {
  factory: CounterStoreFactory;
  stores: Map<string, InMemoryCounterStore>;
  get: (nodeId: string) => InMemoryCounterStore;
} {
  const stores = new Map<string, InMemoryCounterStore>();
  return {
    stores,
    factory: (address) => {
      const store = new InMemoryCounterStore(address);
      stores.set(address, store);
      return store;
    },
    get: (nodeId) => {
      const store = stores.get(nodeId);
      if (!store) {
        throw new Error(`No store for ${nodeId}`);
      }
      return store;
    },
  };
}

export function counterSettings(overrides: Partial<CounterSettings> = {}): CounterSettings {
  return {
    redisNodes: ['memory://node-a', 'memory://node-b', 'memory://node-c'],
    redisPassword: undefined,
    redisDb: 0,
    redisKeyPrefix: 'visits:',
    redisCommandTimeoutMs: 100,
    redisConnectTimeoutMs: 100,
    redisRetryAttempts: 2,
    redisRetryBaseDelayMs: 1,
    virtualNodes: 50,
    cacheTtlMs: 5000,
    cacheCapacity: 100,
    batchIntervalMs: 5000,
    batchSizeLimit: 1000,
    healthProbeIntervalMs: 30_000,
    shutdownGraceMs: 1000,
    ...overrides,
  };
}

/** First `page-<n>` key the given router sends to `nodeId` */
export function keyOwnedBy(ownerOf: (key: string) => string, nodeId: string, prefix = 'page'): string {
  for (let i = 0; i < 10_000; i++) {
    const key = `${prefix}-${i}`;
    if (ownerOf(key) === nodeId) {
      return key;
    }
  }
  throw new Error(`No key routes to ${nodeId}`);
}
