/**
 * In-Memory Counter Store
 *
 * Map-backed store for local development (`memory://` node addresses) and
 * tests. Map operations are synchronous, so each call is atomic on the
 * event loop. `setAvailable(false)` makes every call reject, standing in
 * for an unreachable node.
 *
 * @module infrastructure/storage/InMemoryCounterStore
 */

import type { CounterStore } from './types.js';

export class InMemoryCounterStore implements CounterStore {
  private readonly counters = new Map<string, number>();
  private available = true;
  private closed = false;

  /** Calls made per operation, for asserting on storage traffic */
  readonly calls = { incrementBy: 0, get: 0, reset: 0, ping: 0 };

  constructor(readonly nodeId: string) {}

  async incrementBy(key: string, delta: number): Promise<number> {
    this.calls.incrementBy++;
    this.assertReachable();
    const next = (this.counters.get(key) ?? 0) + delta;
    this.counters.set(key, next);
    return next;
  }

  async get(key: string): Promise<number | null> {
    this.calls.get++;
    this.assertReachable();
    return this.counters.get(key) ?? null;
  }

  async reset(key: string): Promise<void> {
    this.calls.reset++;
    this.assertReachable();
    this.counters.delete(key);
  }

  async ping(): Promise<void> {
    this.calls.ping++;
    this.assertReachable();
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  setAvailable(available: boolean): void {
    this.available = available;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Direct read that bypasses availability and call counting */
  peek(key: string): number | null {
    return this.counters.get(key) ?? null;
  }

  private assertReachable(): void {
    if (!this.available || this.closed) {
      throw new Error(`Storage node ${this.nodeId} is unreachable`);
    }
  }
}
