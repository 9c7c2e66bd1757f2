import type { Config } from '../config/index.js';
import { createRedisClient, type RedisClient } from '../redis/client.js';
import { MemoryRegistryStore } from './memoryStore.js';
import { RedisRegistryStore } from './redisStore.js';
import type { RegistryStore } from './types.js';

export { MemoryRegistryStore } from './memoryStore.js';
export { RedisRegistryStore } from './redisStore.js';
export type { RegistryStore, StateChanges, CredentialUpdate } from './types.js';

export interface StoreHandle {
  store: RegistryStore;
  /** Present when the store is Redis-backed; owned by the caller */
  redis: RedisClient | null;
}

export function createStore(config: Pick<Config, 'storeMode' | 'redisUrl' | 'redisKeyPrefix'>): StoreHandle {
  if (config.storeMode === 'redis') {
    const redis = createRedisClient(config.redisUrl);
    return { store: new RedisRegistryStore(redis, config.redisKeyPrefix), redis };
  }
  return { store: new MemoryRegistryStore(), redis: null };
}
