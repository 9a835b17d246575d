/**
 * Response cache for read endpoints, backed by Redis when configured.
 * Each route picks its own TTL; ingestion clears `/weather/*` after new data lands.
 */

import type { MiddlewareHandler } from 'hono';
import { getRedis } from '../../lib/redis';
import { getLogger } from '../../lib/logger';

export const CACHE_PREFIX = 'weather:cache';

/** Every cached /weather response */
export const WEATHER_CACHE_PATTERN = `${CACHE_PREFIX}:GET:/weather/*`;

/**
 * The slice of the Redis client the cache uses
 */
export interface CacheBackend {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  scan(cursor: string, matchToken: 'MATCH', pattern: string, countToken: 'COUNT', count: number): Promise<[string, string[]]>;
  del(...keys: string[]): Promise<number>;
}

export interface CacheOptions {
  /** Time to live in seconds */
  ttl: number;
  /** Resolved per request; null disables caching. Defaults to the shared Redis client */
  backend?: () => CacheBackend | null;
}

/**
 * Key from method, path and the query sorted by name
 */
export function buildCacheKey(method: string, path: string, queryString: string): string {
  const sorted = [...new URLSearchParams(queryString).entries()].sort(([a], [b]) => a.localeCompare(b));
  const query = new URLSearchParams(sorted).toString();

  return `${CACHE_PREFIX}:${method}:${path}${query ? `:${query}` : ''}`;
}

/**
 * Usage: router.get('/current/:city', cached({ ttl: 300 }), handler);
 * Responses carry X-Cache: HIT, MISS or BYPASS. Only 200s are stored.
 */
export function cached(options: CacheOptions): MiddlewareHandler {
  const resolveBackend = options.backend ?? getRedis;

  return async (c, next) => {
    const backend = resolveBackend();
    if (!backend) {
      c.header('X-Cache', 'BYPASS');
      await next();
      return;
    }

    const url = new URL(c.req.url);
    const key = buildCacheKey(c.req.method, url.pathname, url.search);

    try {
      const hit = await backend.get(key);
      if (hit !== null) {
        c.header('X-Cache', 'HIT');
        c.header('Content-Type', 'application/json');
        return c.body(hit);
      }
    } catch (err) {
      // Unreachable cache serves from the handler
      getLogger().debug({ err, key }, 'Cache read failed');
    }

    c.header('X-Cache', 'MISS');
    await next();

    if (c.res.status !== 200) return;

    try {
      const body = await c.res.clone().text();
      // Not awaited; the response does not wait on the write
      backend.setex(key, options.ttl, body).catch((err: unknown) => {
        getLogger().debug({ err, key }, 'Cache write failed');
      });
    } catch (err) {
      getLogger().debug({ err, key }, 'Cache write failed');
    }
  };
}

/**
 * Delete cached keys matching a glob pattern, walking the keyspace with SCAN.
 * Returns how many keys were deleted; failures are logged, never thrown.
 */
export async function invalidateCache(
  pattern: string,
  backend: CacheBackend | null = getRedis()
): Promise<number> {
  if (!backend) return 0;

  const logger = getLogger();
  let deleted = 0;

  try {
    let cursor = '0';
    do {
      const [nextCursor, keys] = await backend.scan(cursor, 'MATCH', pattern, 'COUNT', 100);
      cursor = nextCursor;
      if (keys.length > 0) {
        deleted += await backend.del(...keys);
      }
    } while (cursor !== '0');

    if (deleted > 0) {
      logger.debug({ deleted, pattern }, 'Cache invalidated');
    }
  } catch (err) {
    logger.warn({ err, pattern }, 'Cache invalidation failed');
  }

  return deleted;
}
