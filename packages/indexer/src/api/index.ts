/**
 * Hono API application
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger as honoLogger } from 'hono/logger';
import { timing } from 'hono/timing';
import { prettyJSON } from 'hono/pretty-json';
import type pino from 'pino';
import { EntityNotFoundError, getErrorDetails } from '@app/api';

import { createWeatherRouter } from './routes/weather';
import { createAdminRouter } from './routes/admin';
import { createCitiesRouter } from './routes/cities';
import { createHealthRouter } from './routes/health';
import type { Database } from '../db';
import type { Config } from '../lib/config';
import { SchedulingError } from '../lib/errors';
import type { SyncOrchestrator } from '../sync';

export interface AppDependencies {
  orchestrator: SyncOrchestrator;
  db: Database;
  config: Pick<Config, 'corsOrigins'>;
  logger: pino.Logger;
}

export function createApp({ orchestrator, db, config, logger }: AppDependencies): Hono {
  const app = new Hono();

  // Middleware
  app.use('*', cors({
    origin: config.corsOrigins,
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'Authorization'],
    credentials: true,
  }));
  app.use('*', timing());
  app.use('*', prettyJSON());
  app.use('*', honoLogger((message) => logger.debug(message)));

  // Routes
  app.route('/health', createHealthRouter(db, orchestrator));
  app.route('/weather', createWeatherRouter(orchestrator));
  app.route('/cities', createCitiesRouter(orchestrator.cities));
  app.route('/admin', createAdminRouter(orchestrator));

  // Root endpoint
  app.get('/', (c) => {
    return c.json({
      name: 'Weather Indexer API',
      version: '0.1.0',
      endpoints: {
        health: '/health',
        weather: '/weather',
        cities: '/cities',
        admin: '/admin',
      },
    });
  });

  // 404 handler
  app.notFound((c) => {
    return c.json({ error: 'Not Found', path: c.req.path }, 404);
  });

  // Error handler
  app.onError((err, c) => {
    if (err instanceof EntityNotFoundError) {
      return c.json({ error: 'Not Found', message: err.message }, 404);
    }
    // A manual run collided with one already in flight
    if (err instanceof SchedulingError) {
      return c.json({ error: 'Conflict', message: err.message }, 409);
    }

    logger.error({ err, path: c.req.path, ...getErrorDetails(err) }, 'API Error');
    return c.json(
      {
        error: 'Internal Server Error',
        message: err.message,
      },
      500
    );
  });

  return app;
}
