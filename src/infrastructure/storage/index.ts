/**
 * Storage node adapters
 */

import type { Logger } from 'pino';
import { InMemoryCounterStore } from './InMemoryCounterStore.js';
import { connectRedisCounterStore, type RedisConnectionOptions } from './RedisCounterStore.js';
import type { CounterStoreFactory } from './types.js';

export type { CounterStore, CounterStoreFactory } from './types.js';
export { InMemoryCounterStore } from './InMemoryCounterStore.js';
export {
  RedisCounterStore,
  connectRedisCounterStore,
  type RedisCounterClient,
  type RedisConnectionOptions,
} from './RedisCounterStore.js';
export { withRetry, type RetryPolicy, type RetryHooks } from './RetryPolicy.js';

/**
 * Pick the adapter from the address scheme: `redis://` and `rediss://`
 * open a Redis connection, `memory://` keeps counts in process.
 */
export function createCounterStoreFactory(
  options: RedisConnectionOptions,
  logger: Logger
): CounterStoreFactory {
  return (address) => {
    if (address.startsWith('memory://')) {
      return new InMemoryCounterStore(address);
    }
    return connectRedisCounterStore(address, options, logger);
  };
}
