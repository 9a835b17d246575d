/**
 * Weather API endpoints
 */

import { Hono } from 'hono';
import { z } from 'zod';
import type { Measurement } from '@app/api';
import type { SyncOrchestrator } from '../../sync';
import { cached } from '../middleware/cache';

const WindowQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).default(7),
});

function toCurrentView(measurement: Measurement, source: 'store' | 'live') {
  return {
    city: measurement.cityName,
    country: measurement.countryCode,
    temperature: measurement.temperature,
    feelsLike: measurement.feelsLike,
    condition: measurement.conditionMain,
    description: measurement.conditionDescription,
    humidity: measurement.humidity,
    pressure: measurement.pressure,
    windSpeed: measurement.windSpeed,
    timestamp: measurement.observedAt.toISOString(),
    coordinates: {
      latitude: measurement.latitude,
      longitude: measurement.longitude,
    },
    source,
  };
}

function toHistoryView(measurement: Measurement) {
  return {
    date: measurement.observedAt.toISOString(),
    temperature: measurement.temperature,
    feelsLike: measurement.feelsLike,
    condition: measurement.conditionMain,
    description: measurement.conditionDescription,
    humidity: measurement.humidity,
    pressure: measurement.pressure,
    windSpeed: measurement.windSpeed,
  };
}

export function createWeatherRouter(orchestrator: SyncOrchestrator): Hono {
  const router = new Hono();

  /**
   * GET /weather/current/:city - latest stored reading, or a live fetch
   */
  router.get('/current/:city', cached({ ttl: 300 }), async (c) => {
    const city = c.req.param('city');
    const current = await orchestrator.fetchCurrent(city);

    if (!current) {
      return c.json({ error: `No weather data found for ${city}` }, 404);
    }

    return c.json(toCurrentView(current.measurement, current.source));
  });

  /**
   * GET /weather/history/:city?days=7 - readings newest first
   */
  router.get('/history/:city', cached({ ttl: 300 }), async (c) => {
    const query = WindowQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return c.json({ error: 'Invalid query parameters', details: query.error.format() }, 400);
    }

    const city = c.req.param('city');
    const records = await orchestrator.history(city, query.data.days);

    if (records.length === 0) {
      return c.json({ error: `No historical weather data found for ${city}` }, 404);
    }

    return c.json(records.map(toHistoryView));
  });

  /**
   * GET /weather/summary/:city?days=7 - aggregate statistics
   */
  router.get('/summary/:city', cached({ ttl: 600 }), async (c) => {
    const query = WindowQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return c.json({ error: 'Invalid query parameters', details: query.error.format() }, 400);
    }

    const city = c.req.param('city');
    const summary = await orchestrator.summary(city, query.data.days);

    if (!summary) {
      return c.json({ error: `No weather data found for ${city} in the last ${query.data.days} days` }, 404);
    }

    return c.json(summary);
  });

  return router;
}
