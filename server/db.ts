import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import * as schema from '@shared/schema';

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
  pool: Pool;
  db: Database;
}

export function createDatabase(databaseUrl: string): DatabaseHandle {
  const url = new URL(databaseUrl);
  const pool = new Pool({
    connectionString: databaseUrl,
    ssl: url.searchParams.get('sslmode') === 'require' ? { rejectUnauthorized: false } : undefined,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
  });

  pool.on('error', (error) => {
    console.error('[DB] Idle client error:', error);
  });

  console.log(`[DB] Pool created for ${url.hostname}${url.pathname}`);
  return { pool, db: drizzle(pool, { schema }) };
}
