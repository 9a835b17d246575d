/**
 * Monitored cities
 */

import { Hono } from 'hono';
import { z } from 'zod';

const CitiesQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(1000).optional(),
});

export function createCitiesRouter(cities: readonly string[]): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const query = CitiesQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return c.json({ error: 'Invalid query parameters', details: query.error.format() }, 400);
    }

    const { limit } = query.data;
    return c.json({
      total: cities.length,
      cities: limit === undefined ? cities : cities.slice(0, limit),
    });
  });

  return router;
}
