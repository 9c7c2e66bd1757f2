import { Redis } from 'ioredis';
import { createLogger } from '../logger.js';

const log = createLogger('Redis');

export type RedisClient = Redis;

export function createRedisClient(url: string): RedisClient {
  const client = new Redis(url, { maxRetriesPerRequest: 3 });
  client.on('error', (error: Error) => {
    log.error({ err: error }, 'Redis connection error');
  });
  return client;
}
