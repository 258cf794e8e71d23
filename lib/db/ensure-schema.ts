import { sql } from 'drizzle-orm';

import type { Database } from './client';

/**
 * Create the tables on first start. The core schema is additive only, so
 * there is no migration step.
 */
export async function ensureSchema(db: Database): Promise<void> {
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS recording_jobs (
      id varchar PRIMARY KEY,
      status varchar NOT NULL DEFAULT 'new',
      filename varchar NOT NULL,
      title text,
      start_time bigint,
      duration_ms bigint,
      attempts json NOT NULL,
      artifacts json NOT NULL,
      failed_stage varchar,
      last_error json,
      logs json NOT NULL,
      created_at bigint NOT NULL,
      updated_at bigint NOT NULL
    )
  `);
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS history_entries (
      id serial PRIMARY KEY,
      recording_id varchar NOT NULL,
      terminal_status varchar NOT NULL,
      timestamp bigint NOT NULL,
      summary text NOT NULL,
      stage varchar,
      kind varchar
    )
  `);
  await db.execute(sql`CREATE INDEX IF NOT EXISTS idx_history_recording ON history_entries (recording_id, timestamp)`);
  await db.execute(sql`CREATE INDEX IF NOT EXISTS idx_recording_jobs_status ON recording_jobs (status)`);
}
