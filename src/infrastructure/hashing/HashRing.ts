/**
 * Consistent Hash Ring
 *
 * Maps counter keys onto storage nodes. Each node owns `virtualCount`
 * positions on a 48-bit ring; a key belongs to the first position at or
 * after its own hash, wrapping past the top back to the lowest position.
 * Adding or removing a node only moves the keys whose successor position
 * changed.
 *
 * @module infrastructure/hashing/HashRing
 */

import { createHash } from 'node:crypto';
import { CounterError, CounterErrorCode } from '../../types.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface RingEntry {
  position: number;
  nodeId: string;
}

export interface HashRingOptions {
  /** Virtual positions per node when `addNode` is called without a count */
  defaultVirtualCount: number;
}

const DEFAULT_OPTIONS: HashRingOptions = {
  defaultVirtualCount: 100,
};

// --------------------------------------------------------------------------
// Hashing
// --------------------------------------------------------------------------

/**
 * MD5 of the UTF-8 label, first 6 bytes as an unsigned big-endian integer.
 * 48 bits stay exact in a JS number.
 */
export function ringHash(label: string): number {
  return createHash('md5').update(label, 'utf8').digest().readUIntBE(0, 6);
}

// --------------------------------------------------------------------------
// Hash Ring
// --------------------------------------------------------------------------

export class HashRing {
  private readonly options: HashRingOptions;

  /** Sorted by position ascending */
  private entries: RingEntry[] = [];
  private readonly owners = new Map<number, string>();
  private readonly positionsByNode = new Map<string, number[]>();

  constructor(options: Partial<HashRingOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Place `nodeId` on the ring with `virtualCount` positions.
   * Re-adding a node replaces its previous positions.
   */
  addNode(nodeId: string, virtualCount: number = this.options.defaultVirtualCount): void {
    if (!Number.isInteger(virtualCount) || virtualCount < 1) {
      throw new RangeError(`virtualCount must be a positive integer, got ${virtualCount}`);
    }

    if (this.positionsByNode.has(nodeId)) {
      this.dropPositions(nodeId);
    }

    const positions: number[] = [];
    for (let replica = 0; replica < virtualCount; replica++) {
      const label = `${nodeId}:${replica}`;
      let position = ringHash(label);

      // Another label already sits here; re-hash until the slot is free
      let attempt = 1;
      while (this.owners.has(position)) {
        position = ringHash(`${label}#${attempt}`);
        attempt++;
      }

      this.owners.set(position, nodeId);
      positions.push(position);
    }

    this.positionsByNode.set(nodeId, positions);
    this.rebuild();
  }

  /**
   * Remove `nodeId` and all its positions. Returns false when the node was
   * not on the ring.
   */
  removeNode(nodeId: string): boolean {
    if (!this.positionsByNode.has(nodeId)) {
      return false;
    }

    this.dropPositions(nodeId);
    this.rebuild();
    return true;
  }

  /**
   * Owning node of `key`.
   * @throws CounterError NO_AVAILABLE_NODE when the ring is empty
   */
  route(key: string): string {
    const first = this.entries[0];
    if (!first) {
      throw new CounterError(CounterErrorCode.NO_AVAILABLE_NODE, 'Hash ring has no nodes', {
        key,
      });
    }

    const hash = ringHash(key);
    const index = this.successorIndex(hash);
    const entry = index < this.entries.length ? this.entries[index] : first;
    return (entry ?? first).nodeId;
  }

  /** Node ids in insertion order */
  nodes(): string[] {
    return Array.from(this.positionsByNode.keys());
  }

  /** Virtual positions held by each node */
  distribution(): Record<string, number> {
    const result: Record<string, number> = {};
    for (const [nodeId, positions] of this.positionsByNode) {
      result[nodeId] = positions.length;
    }
    return result;
  }

  /** Snapshot of the sorted ring */
  snapshot(): RingEntry[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  /** Number of physical nodes */
  get size(): number {
    return this.positionsByNode.size;
  }

  isEmpty(): boolean {
    return this.positionsByNode.size === 0;
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private dropPositions(nodeId: string): void {
    for (const position of this.positionsByNode.get(nodeId) ?? []) {
      this.owners.delete(position);
    }
    this.positionsByNode.delete(nodeId);
  }

  private rebuild(): void {
    this.entries = Array.from(this.owners, ([position, nodeId]) => ({ position, nodeId })).sort(
      (a, b) => a.position - b.position
    );
  }

  /** Index of the first entry with position >= hash; entries.length if none */
  private successorIndex(hash: number): number {
    let low = 0;
    let high = this.entries.length;

    while (low < high) {
      const mid = (low + high) >>> 1;
      const entry = this.entries[mid];
      if (entry !== undefined && entry.position < hash) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }

    return low;
  }
}
