import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import * as schema from './schema';

export type Database = NodePgDatabase<typeof schema>;

let pool: Pool | null = null;
let db: Database | null = null;

export function getDb(connectionString: string | undefined = process.env.DATABASE_URL): Database {
  if (db) return db;
  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is required');
  }
  pool = new Pool({ connectionString });
  db = drizzle(pool, { schema });
  return db;
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
  }
  pool = null;
  db = null;
}
