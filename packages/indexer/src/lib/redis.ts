/**
 * Redis client singleton with graceful degradation
 * If REDIS_URL is not set, response caching is disabled
 */

import Redis from 'ioredis';
import type pino from 'pino';
import { getConfig } from './config';
import { getLogger } from './logger';

let redis: Redis | null = null;

/**
 * Create a lazily connecting client that gives up after 10 reconnect attempts
 */
export function createRedisClient(url: string, logger: pino.Logger): Redis {
  const client = new Redis(url, {
    maxRetriesPerRequest: 3,
    retryStrategy(times) {
      if (times > 10) {
        return null; // Stop retrying
      }
      return Math.min(times * 200, 5000);
    },
    lazyConnect: true,
  });

  client.on('connect', () => logger.info('Redis connected'));
  client.on('error', (err) => logger.error({ err }, 'Redis error'));
  client.on('close', () => logger.debug('Redis connection closed'));

  return client;
}

/**
 * Get or create the shared Redis client
 * Returns null if REDIS_URL is not configured
 */
export function getRedis(): Redis | null {
  if (redis) {
    return redis;
  }

  const config = getConfig();
  if (!config.redisUrl) {
    return null;
  }

  const logger = getLogger();
  redis = createRedisClient(config.redisUrl, logger);

  // Connect (non-blocking)
  redis.connect().catch((err) => {
    logger.warn({ err }, 'Redis initial connection failed, caching disabled');
  });

  return redis;
}

/**
 * Close the Redis connection
 */
export async function closeRedis(): Promise<void> {
  if (redis) {
    await redis.quit();
    redis = null;
  }
}
