import { desc, eq, sql } from 'drizzle-orm';

import { MAX_JOB_LOGS, type StatusStore } from '@/lib/pipeline/storage/types';
import { RecordingJobSchema, type RecordingJob, type RecordingSeed } from '@/lib/pipeline/types';
import { assertSafeRecordingId } from '@/lib/pipeline/utils/filename';
import type { Database } from './client';
import { recordingJobs, type NewRecordingJobRow, type RecordingJobRow } from './schema';

function toJob(row: RecordingJobRow): RecordingJob {
  return RecordingJobSchema.parse({
    ...row,
    title: row.title ?? undefined,
    start_time: row.start_time ?? undefined,
    duration_ms: row.duration_ms ?? undefined,
    failed_stage: row.failed_stage ?? undefined,
    last_error: row.last_error ?? undefined,
  });
}

function toRow(job: RecordingJob): NewRecordingJobRow {
  return {
    id: job.id,
    status: job.status,
    filename: job.filename,
    title: job.title ?? null,
    start_time: job.start_time ?? null,
    duration_ms: job.duration_ms ?? null,
    attempts: job.attempts,
    artifacts: job.artifacts,
    failed_stage: job.failed_stage ?? null,
    last_error: job.last_error ?? null,
    logs: job.logs,
    created_at: job.created_at,
    updated_at: job.updated_at,
  };
}

/** Status store on Postgres; each save is a single-row upsert. */
export class PostgresStatusStore implements StatusStore {
  constructor(private readonly db: Database) {}

  async list(): Promise<RecordingJob[]> {
    const rows = await this.db
      .select()
      .from(recordingJobs)
      .orderBy(desc(sql`COALESCE(${recordingJobs.start_time}, ${recordingJobs.created_at})`));
    return rows.map(toJob);
  }

  async get(id: string): Promise<RecordingJob | undefined> {
    const [row] = await this.db.select().from(recordingJobs).where(eq(recordingJobs.id, id)).limit(1);
    return row ? toJob(row) : undefined;
  }

  async create(seed: RecordingSeed): Promise<{ job: RecordingJob; created: boolean }> {
    assertSafeRecordingId(seed.id);
    const now = Date.now();
    const job = RecordingJobSchema.parse({
      id: seed.id,
      status: 'new',
      filename: seed.filename,
      title: seed.title,
      start_time: seed.startTime,
      duration_ms: seed.durationMs,
      created_at: now,
      updated_at: now,
      logs: [`Job created at ${new Date(now).toISOString()}`],
    });

    const inserted = await this.db.insert(recordingJobs).values(toRow(job)).onConflictDoNothing().returning();
    if (inserted.length > 0) {
      return { job: toJob(inserted[0]), created: true };
    }

    const existing = await this.get(seed.id);
    if (!existing) throw new Error(`Job ${seed.id} vanished during creation`);
    return { job: existing, created: false };
  }

  async save(job: RecordingJob): Promise<RecordingJob> {
    const { logs, ...row } = toRow({ ...job, updated_at: Date.now() });
    // an existing row keeps its logs; only appendLog writes them
    const [saved] = await this.db
      .insert(recordingJobs)
      .values({ ...row, logs: logs.slice(-MAX_JOB_LOGS) })
      .onConflictDoUpdate({ target: recordingJobs.id, set: row })
      .returning();
    return toJob(saved);
  }

  async appendLog(id: string, message: string): Promise<void> {
    const entry = `[${new Date().toISOString()}] ${message}`;
    await this.db.transaction(async tx => {
      const [row] = await tx
        .select({ logs: recordingJobs.logs })
        .from(recordingJobs)
        .where(eq(recordingJobs.id, id))
        .for('update');
      if (!row) return;
      await tx
        .update(recordingJobs)
        .set({ logs: [...row.logs, entry].slice(-MAX_JOB_LOGS), updated_at: Date.now() })
        .where(eq(recordingJobs.id, id));
    });
  }
}
