import type { HistoryEntry, RecordingJob, RecordingSeed } from '../types'

/**
 * Durable current-status record, one RecordingJob per recording id.
 * `save` replaces the whole record atomically.
 */
export interface StatusStore {
  list(): Promise<RecordingJob[]>
  get(id: string): Promise<RecordingJob | undefined>
  /** Returns the existing job when the id has been seen before. */
  create(seed: RecordingSeed): Promise<{ job: RecordingJob; created: boolean }>
  save(job: RecordingJob): Promise<RecordingJob>
  appendLog(id: string, message: string): Promise<void>
}

/** Append-only record of terminal transitions. */
export interface HistoryLog {
  append(entry: HistoryEntry): Promise<void>
  /** Newest first. */
  list(options?: { limit?: number; recordingId?: string }): Promise<HistoryEntry[]>
  /** Removes entries older than `before` (all when omitted); returns the count removed. */
  purge(before?: number): Promise<number>
}

export const MAX_JOB_LOGS = 200
