import { bigint, index, json, pgTable, serial, text, varchar } from 'drizzle-orm/pg-core';

import { FAILURE_KINDS, JOB_STATUSES, STAGES } from '@/lib/pipeline/types';
import type { Artifacts, Attempts, JobError } from '@/lib/pipeline/types';

export const recordingJobs = pgTable('recording_jobs', {
  // Recording id from the source; never generated here
  id: varchar('id').primaryKey(),

  status: varchar('status', { enum: JOB_STATUSES }).notNull().default('new'),

  // Source metadata
  filename: varchar('filename').notNull(),
  title: text('title'),
  start_time: bigint('start_time', { mode: 'number' }),
  duration_ms: bigint('duration_ms', { mode: 'number' }),

  // Stage bookkeeping
  attempts: json('attempts').$type<Attempts>().notNull(),
  artifacts: json('artifacts').$type<Artifacts>().notNull(),
  failed_stage: varchar('failed_stage', { enum: STAGES }),
  last_error: json('last_error').$type<JobError>(),

  logs: json('logs').$type<string[]>().notNull(),

  created_at: bigint('created_at', { mode: 'number' }).notNull(),
  updated_at: bigint('updated_at', { mode: 'number' }).notNull(),
});

export const historyEntries = pgTable(
  'history_entries',
  {
    id: serial('id').primaryKey(),
    recording_id: varchar('recording_id').notNull(),
    terminal_status: varchar('terminal_status', { enum: ['completed', 'failed'] }).notNull(),
    timestamp: bigint('timestamp', { mode: 'number' }).notNull(),
    summary: text('summary').notNull(),
    stage: varchar('stage', { enum: STAGES }),
    kind: varchar('kind', { enum: FAILURE_KINDS }),
  },
  table => ({
    recordingIdx: index('idx_history_recording').on(table.recording_id, table.timestamp),
  }),
);

export type RecordingJobRow = typeof recordingJobs.$inferSelect;
export type NewRecordingJobRow = typeof recordingJobs.$inferInsert;
export type HistoryEntryRow = typeof historyEntries.$inferSelect;
