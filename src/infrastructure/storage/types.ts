/**
 * Counter Store Port
 *
 * The per-node storage primitive the shard registry drives. One store
 * instance talks to exactly one backing node.
 *
 * @module infrastructure/storage/types
 */

export interface CounterStore {
  /** Node identifier; the configured address of the node */
  readonly nodeId: string;

  /** Atomically add `delta` and return the new value */
  incrementBy(key: string, delta: number): Promise<number>;

  /** Stored value, or null when the key has never been written */
  get(key: string): Promise<number | null>;

  /** Delete the key; a later read returns null */
  reset(key: string): Promise<void>;

  /** Liveness probe; rejects when the node is unreachable */
  ping(): Promise<void>;

  /** Release the connection */
  close(): Promise<void>;
}

export type CounterStoreFactory = (address: string) => CounterStore;
