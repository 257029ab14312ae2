/**
 * Database Connection - Drizzle ORM with PostgreSQL
 * Optional: the engine runs without a database and keeps history in memory
 */

import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema.js';
import { structuredLogger } from '../services/logger.js';

export function createDatabase(connectionString: string) {
  const client = postgres(connectionString, {
    max: 10,
    idle_timeout: 20,
    connect_timeout: 10,
  });

  const db = drizzle(client, { schema });

  return {
    db,
    async check(): Promise<boolean> {
      try {
        await client`SELECT 1`;
        return true;
      } catch (error) {
        structuredLogger.error('database', 'Database connection failed', error instanceof Error ? error : null);
        return false;
      }
    },
    async close(): Promise<void> {
      await client.end();
    },
  };
}

export type Database = ReturnType<typeof createDatabase>;

export * from './schema.js';
