import pg from 'pg';
import { drizzle } from 'drizzle-orm/node-postgres';
import { config } from '@config/app.config.js';
import * as schema from './schema.js';

export const pool = new pg.Pool({
  connectionString: config.DATABASE_URL,
  max: config.database.poolSize,
});

export const db = drizzle(pool, {
  schema,
  logger: config.isDevelopment,
});

export type Database = typeof db;

export async function closeDatabase(): Promise<void> {
  await pool.end();
}
