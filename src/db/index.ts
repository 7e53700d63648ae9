/**
 * Database connection using Drizzle ORM
 */

import { drizzle } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import { config } from '../config.js';
import { logger } from '../logger.js';
import * as schema from './schema.js';

const { Pool } = pg;

const databaseUrl = config.database.url;

if (!databaseUrl) {
  logger.warn('DATABASE_URL not set, database operations will fail');
}

const pool = new Pool({
  connectionString: databaseUrl,
  ssl: config.database.ssl ? { rejectUnauthorized: false } : false,
});

pool.on('error', (err) => {
  logger.error({ err }, 'Idle database client error');
});

export const db = drizzle(pool, { schema });

export type Database = typeof db;

export * from './schema.js';

// Call once on shutdown; the pool cannot be reused afterwards
export async function closeDb() {
  await pool.end();
}
