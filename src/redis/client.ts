import { Redis } from 'ioredis';
import { createLogger } from '../logger.js';

const log = createLogger('Redis');

export type RedisClient = Redis;

export function createRedisClient(url: string): RedisClient {
  const client = new Redis(url);
  client.on('error', (error: Error) => {
    log.error({ action: 'redis.error', error: error.message }, 'Redis connection error');
  });
  return client;
}
