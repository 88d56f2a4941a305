/**
 * Redis Counter Store
 *
 * One ioredis connection per storage node. Counters are plain string keys
 * under the configured prefix, updated with INCRBY and removed with DEL.
 *
 * @module infrastructure/storage/RedisCounterStore
 */

import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { CounterStore } from './types.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

/** The slice of the ioredis client this store uses */
export interface RedisCounterClient {
  incrby(key: string, increment: number): Promise<number>;
  get(key: string): Promise<string | null>;
  del(key: string): Promise<number>;
  ping(): Promise<string>;
  quit(): Promise<string>;
}

export interface RedisConnectionOptions {
  password?: string;
  db: number;
  keyPrefix: string;
  commandTimeoutMs: number;
  connectTimeoutMs: number;
}

// --------------------------------------------------------------------------
// Store
// --------------------------------------------------------------------------

export class RedisCounterStore implements CounterStore {
  private readonly log: Logger;

  constructor(
    readonly nodeId: string,
    private readonly client: RedisCounterClient,
    logger: Logger
  ) {
    this.log = logger.child({ component: 'RedisCounterStore', node: nodeId });
  }

  async incrementBy(key: string, delta: number): Promise<number> {
    return this.client.incrby(key, delta);
  }

  async get(key: string): Promise<number | null> {
    const raw = await this.client.get(key);
    if (raw === null) {
      return null;
    }

    const value = Number.parseInt(raw, 10);
    if (Number.isNaN(value)) {
      throw new Error(`Non-integer counter value at ${key} on ${this.nodeId}`);
    }
    return value;
  }

  async reset(key: string): Promise<void> {
    await this.client.del(key);
  }

  async ping(): Promise<void> {
    await this.client.ping();
  }

  async close(): Promise<void> {
    try {
      await this.client.quit();
      this.log.info('Redis connection closed');
    } catch (error) {
      this.log.warn({ error }, 'Redis quit failed; connection dropped');
    }
  }
}

// --------------------------------------------------------------------------
// Factory
// --------------------------------------------------------------------------

/**
 * Open an ioredis connection to `address` and wrap it in a store.
 * Reconnects run in the background; per-command failures surface quickly
 * so the shard registry's own retry policy decides what happens next.
 */
export function connectRedisCounterStore(
  address: string,
  options: RedisConnectionOptions,
  logger: Logger
): RedisCounterStore {
  const log = logger.child({ component: 'RedisConnection', node: address });

  const client = new Redis(address, {
    password: options.password,
    db: options.db,
    keyPrefix: options.keyPrefix,
    commandTimeout: options.commandTimeoutMs,
    connectTimeout: options.connectTimeoutMs,
    maxRetriesPerRequest: 1,
    enableOfflineQueue: true,
    retryStrategy: (times) => {
      const delay = Math.min(times * 200, 5000);
      log.warn({ attempt: times, delayMs: delay }, 'Redis connection retry');
      return delay;
    },
  });

  client.on('error', (error) => {
    log.error({ error }, 'Redis error');
  });

  client.on('ready', () => {
    log.info('Redis connected');
  });

  client.on('close', () => {
    log.warn('Redis connection closed');
  });

  return new RedisCounterStore(address, client, logger);
}
