/**
 * Drizzle database client
 */

import { drizzle } from 'drizzle-orm/postgres-js';
import { sql } from 'drizzle-orm';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import postgres from 'postgres';
import * as schema from './schema';
import { getConfig } from '../lib/config';
import { getLogger } from '../lib/logger';

export * from './schema';

/**
 * Any Postgres-flavoured Drizzle database over this schema:
 * postgres-js in production, PGlite in tests
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

let db: Database | null = null;
let queryClient: postgres.Sql | null = null;

/**
 * Get or create the database connection
 */
export function getDb(): Database {
  if (db) {
    return db;
  }

  const config = getConfig();
  const logger = getLogger();

  logger.info({ url: config.databaseUrl.replace(/:[^:@]+@/, ':****@') }, 'Connecting to database');

  queryClient = postgres(config.databaseUrl, {
    max: config.dbPoolMax,
    idle_timeout: 20,
    connect_timeout: 10,
    onnotice: () => undefined,
    connection: {
      statement_timeout: config.queryTimeoutMs,
    },
  });

  db = drizzle(queryClient, { schema });

  return db;
}

/**
 * Close the database connection
 */
export async function closeDb(): Promise<void> {
  if (queryClient) {
    await queryClient.end();
    queryClient = null;
    db = null;
    getLogger().info('Database connection closed');
  }
}

/**
 * Check database connectivity
 */
export async function checkDbConnection(database: Database = getDb()): Promise<boolean> {
  try {
    await database.execute(sql`SELECT 1`);
    return true;
  } catch (err) {
    getLogger().error({ err }, 'Database connection check failed');
    return false;
  }
}
