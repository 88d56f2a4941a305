/**
 * VisitCounterService Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createVisitCounter, type VisitCounter } from '../../src/services/factory.js';
import { InMemoryCounterStore } from '../../src/infrastructure/storage/InMemoryCounterStore.js';
import { CounterError, CounterErrorCode } from '../../src/types.js';
import {
  ManualClock,
  counterSettings,
  deferred,
  keyOwnedBy,
  memoryStores,
  silentLogger,
} from '../helpers/fixtures.js';

describe('VisitCounterService', () => {
  let stores: ReturnType<typeof memoryStores>;
  let clock: ManualClock;
  let counter: VisitCounter;

  beforeEach(() => {
    stores = memoryStores();
    clock = new ManualClock(0);
    counter = createVisitCounter({
      config: counterSettings(),
      logger: silentLogger,
      storeFactory: stores.factory,
      metrics: null,
      clock,
    });
  });

  function totalStorageReads(): number {
    let reads = 0;
    for (const store of stores.stores.values()) {
      reads += store.calls.get;
    }
    return reads;
  }

  describe('recordVisit', () => {
    it('should update cache and buffer without storage I/O', () => {
      counter.service.recordVisit('home');
      counter.service.recordVisit('home');

      expect(counter.cache.get('home')).toBe(2);
      expect(counter.batchWriter.pendingDelta('home')).toBe(2);
      for (const store of stores.stores.values()) {
        expect(store.calls).toEqual({ incrementBy: 0, get: 0, reset: 0, ping: 0 });
      }
    });
  });

  describe('getCount', () => {
    it('should serve recorded visits from the cache', async () => {
      counter.service.recordVisit('home');
      counter.service.recordVisit('home');
      counter.service.recordVisit('home');

      await expect(counter.service.getCount('home')).resolves.toEqual({
        key: 'home',
        count: 3,
        source: { kind: 'cache' },
      });
      expect(totalStorageReads()).toBe(0);
    });

    it('should read zero from storage for unseen keys', async () => {
      const node = counter.service.ownerOf('unseen');

      await expect(counter.service.getCount('unseen')).resolves.toEqual({
        key: 'unseen',
        count: 0,
        source: { kind: 'storage', node },
      });
    });

    it('should add unflushed visits to the stored value on a miss', async () => {
      const node = counter.service.ownerOf('home');
      await stores.get(node).incrementBy('home', 10);
      counter.service.recordVisit('home');
      counter.service.recordVisit('home');
      counter.cache.invalidate('home');

      await expect(counter.service.getCount('home')).resolves.toEqual({
        key: 'home',
        count: 12,
        source: { kind: 'buffered', node, pendingDelta: 2 },
      });
    });

    it('should repopulate the cache after a storage read', async () => {
      await counter.service.getCount('home');
      const result = await counter.service.getCount('home');

      expect(result.source).toEqual({ kind: 'cache' });
      expect(totalStorageReads()).toBe(1);
    });

    it('should read storage once for concurrent misses on the same key', async () => {
      const node = counter.service.ownerOf('home');
      await stores.get(node).incrementBy('home', 4);

      const results = await Promise.all(
        Array.from({ length: 5 }, () => counter.service.getCount('home'))
      );

      expect(stores.get(node).calls.get).toBe(1);
      expect(results[0]).toEqual({ key: 'home', count: 4, source: { kind: 'storage', node } });
      for (const result of results.slice(1)) {
        expect(result).toEqual({ key: 'home', count: 4, source: { kind: 'cache' } });
      }
      expect(counter.cache.stats()).toMatchObject({ hits: 0, misses: 5 });
    });

    it('should go back to storage once the entry expires', async () => {
      counter.service.recordVisit('home');
      await counter.batchWriter.flushNow();

      clock.advance(5001);
      const node = counter.service.ownerOf('home');

      await expect(counter.service.getCount('home')).resolves.toEqual({
        key: 'home',
        count: 1,
        source: { kind: 'storage', node },
      });
    });

    it('should wait for an in-flight flush of the key before reading', async () => {
      const node = counter.service.ownerOf('home');
      const store = stores.get(node);
      const gate = deferred();
      const write = store.incrementBy.bind(store);
      const entered = vi.fn();
      vi.spyOn(store, 'incrementBy').mockImplementation(async (key, delta) => {
        entered();
        await gate.promise;
        return write(key, delta);
      });

      counter.service.recordVisit('home');
      counter.service.recordVisit('home');
      const flushing = counter.batchWriter.flushNow();
      await vi.waitFor(() => expect(entered).toHaveBeenCalled(), { interval: 1 });

      counter.cache.invalidate('home');
      const reading = counter.service.getCount('home');
      gate.resolve();

      await expect(reading).resolves.toEqual({ key: 'home', count: 2, source: { kind: 'storage', node } });
      await flushing;
    });

    it('should fail with STORAGE_UNAVAILABLE when the owner is down and nothing is cached', async () => {
      const node = counter.service.ownerOf('home');
      stores.get(node).setAvailable(false);

      await expect(counter.service.getCount('home')).rejects.toMatchObject({
        code: CounterErrorCode.STORAGE_UNAVAILABLE,
      });
    });

    it('should keep serving a cached count while the owner is down', async () => {
      counter.service.recordVisit('home');
      counter.registry.markUnhealthy(counter.service.ownerOf('home'));

      await expect(counter.service.getCount('home')).resolves.toMatchObject({
        count: 1,
        source: { kind: 'cache' },
      });
    });
  });

  describe('getCounts', () => {
    it('should report each key on its own', async () => {
      const [down, up] = ['memory://node-a', 'memory://node-b'];
      const failing = keyOwnedBy((k) => counter.service.ownerOf(k), down);
      const working = keyOwnedBy((k) => counter.service.ownerOf(k), up);
      counter.registry.markUnhealthy(down);

      const results = await counter.service.getCounts([working, failing]);

      expect(results[0]).toEqual({
        ok: true,
        result: { key: working, count: 0, source: { kind: 'storage', node: up } },
      });
      expect(results[1]).toMatchObject({ ok: false, key: failing });
    });
  });

  describe('resetCount', () => {
    it('should clear stored and buffered visits', async () => {
      counter.service.recordVisit('home');
      counter.service.recordVisit('home');
      await counter.batchWriter.flushNow();
      counter.service.recordVisit('home');

      await counter.service.resetCount('home');

      const node = counter.service.ownerOf('home');
      expect(stores.get(node).peek('home')).toBeNull();
      expect(counter.batchWriter.pendingDelta('home')).toBe(0);
      await expect(counter.service.getCount('home')).resolves.toEqual({
        key: 'home',
        count: 0,
        source: { kind: 'storage', node },
      });
    });

    it('should leave buffer and cache alone when storage is down', async () => {
      counter.service.recordVisit('home');
      counter.service.recordVisit('home');
      counter.registry.markUnhealthy(counter.service.ownerOf('home'));

      await expect(counter.service.resetCount('home')).rejects.toBeInstanceOf(CounterError);

      expect(counter.batchWriter.pendingDelta('home')).toBe(2);
      expect(counter.cache.get('home')).toBe(2);
    });
  });

  describe('metrics', () => {
    it('should summarise cache, buffer and node health', async () => {
      counter.service.recordVisit('home');
      counter.service.recordVisit('about');
      await counter.service.getCount('home');

      const snapshot = counter.service.metrics();

      expect(snapshot.status).toBe('healthy');
      expect(snapshot.cache).toMatchObject({ hits: 1, misses: 0, size: 2, capacity: 100 });
      expect(snapshot.buffer).toMatchObject({ pendingKeys: 2, pendingVisits: 2 });
      expect(snapshot.nodes).toEqual({
        'memory://node-a': true,
        'memory://node-b': true,
        'memory://node-c': true,
      });
      expect(snapshot.distribution).toEqual({
        'memory://node-a': 50,
        'memory://node-b': 50,
        'memory://node-c': 50,
      });
      expect(snapshot.lastSuccessfulFlushAt).toBeNull();
    });

    it('should report degraded and unavailable states', () => {
      counter.registry.markUnhealthy('memory://node-a');
      expect(counter.service.metrics().status).toBe('degraded');

      counter.registry.markUnhealthy('memory://node-b');
      counter.registry.markUnhealthy('memory://node-c');
      expect(counter.service.metrics().status).toBe('unavailable');
    });
  });

  describe('shutdown', () => {
    it('should flush the buffer and close every store', async () => {
      counter.service.start();
      counter.service.recordVisit('home');

      const report = await counter.service.shutdown();

      expect(report.droppedVisits).toBe(0);
      expect(stores.get(counter.service.ownerOf('home')).peek('home')).toBe(1);
      for (const store of stores.stores.values()) {
        expect(store).toBeInstanceOf(InMemoryCounterStore);
        expect(store.isClosed).toBe(true);
      }
    });
  });
});
