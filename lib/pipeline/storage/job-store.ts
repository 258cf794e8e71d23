import { promises as fs } from 'fs'
import { constants as fsConstants } from 'fs'
import path from 'path'
import { z } from 'zod'

import { RecordingJobSchema, type RecordingJob, type RecordingSeed } from '../types'
import { assertSafeRecordingId } from '../utils/filename'
import { Mutex } from './mutex'
import { MAX_JOB_LOGS, type StatusStore } from './types'

/**
 * File-backed status store. All jobs live in `<dataDir>/jobs.json`, rewritten
 * atomically (temp file + rename) under a mutex on every change.
 */
export class JobStore implements StatusStore {
  private readonly dataDir: string
  private readonly jobsPath: string
  private readonly mutex = new Mutex()
  private readonly ready: Promise<void>

  private jobs = new Map<string, RecordingJob>()

  constructor(dataRoot: string = 'data') {
    this.dataDir = path.resolve(dataRoot)
    this.jobsPath = path.join(this.dataDir, 'jobs.json')

    this.ready = this.initialize()
  }

  private async initialize(): Promise<void> {
    await fs.mkdir(path.join(this.dataDir, 'logs'), { recursive: true })
    await this.mutex.runExclusive(async () => {
      this.jobs = new Map(await this.loadJobsFromDisk())
    })
  }

  private async loadJobsFromDisk(): Promise<Array<[string, RecordingJob]>> {
    let raw: string
    try {
      raw = await fs.readFile(this.jobsPath, 'utf-8')
    } catch (error) {
      if (isMissingFile(error)) return []
      throw error
    }

    try {
      const parsed = z.array(RecordingJobSchema).parse(JSON.parse(raw))
      return parsed.map(job => [job.id, job] as [string, RecordingJob])
    } catch (error) {
      await this.backupCorruptFile(this.jobsPath, error)
      return []
    }
  }

  private async backupCorruptFile(filePath: string, error: unknown): Promise<void> {
    try {
      await fs.access(filePath, fsConstants.F_OK)
    } catch {
      return
    }

    const timestamp = new Date().toISOString().replace(/[:.]/g, '-')
    const backupPath = `${filePath}.backup.${timestamp}`
    await fs.rename(filePath, backupPath)
    console.warn(`[STORE] Backed up corrupt store file ${filePath} → ${backupPath}`, error)
  }

  private async writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
    const tmpPath = `${filePath}.tmp-${process.pid}-${Date.now()}`
    await fs.writeFile(tmpPath, JSON.stringify(data, null, 2), 'utf-8')
    await fs.rename(tmpPath, filePath)
  }

  private cloneJob(job: RecordingJob): RecordingJob {
    return structuredClone(job)
  }

  async list(): Promise<RecordingJob[]> {
    await this.ready
    return this.mutex.runExclusive(() =>
      Array.from(this.jobs.values())
        .sort((a, b) => (b.start_time ?? b.created_at) - (a.start_time ?? a.created_at))
        .map(job => this.cloneJob(job)),
    )
  }

  async get(id: string): Promise<RecordingJob | undefined> {
    await this.ready
    return this.mutex.runExclusive(() => {
      const job = this.jobs.get(id)
      return job ? this.cloneJob(job) : undefined
    })
  }

  async create(seed: RecordingSeed): Promise<{ job: RecordingJob; created: boolean }> {
    assertSafeRecordingId(seed.id)
    await this.ready
    return this.mutex.runExclusive(async () => {
      const existing = this.jobs.get(seed.id)
      if (existing) {
        return { job: this.cloneJob(existing), created: false }
      }

      const now = Date.now()
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
      })

      this.jobs.set(job.id, job)
      await this.persistJobs()
      return { job: this.cloneJob(job), created: true }
    })
  }

  async save(job: RecordingJob): Promise<RecordingJob> {
    await this.ready
    return this.mutex.runExclusive(async () => {
      // the log trail is owned by appendLog; a stale snapshot must not drop lines
      const existing = this.jobs.get(job.id)
      const updated: RecordingJob = {
        ...this.cloneJob(job),
        logs: existing ? existing.logs : job.logs.slice(-MAX_JOB_LOGS),
        updated_at: Date.now(),
      }
      this.jobs.set(updated.id, updated)
      await this.persistJobs()
      return this.cloneJob(updated)
    })
  }

  async appendLog(id: string, message: string): Promise<void> {
    await this.ready
    await this.mutex.runExclusive(async () => {
      const job = this.jobs.get(id)
      if (!job) return

      assertSafeRecordingId(id)
      const entry = `[${new Date().toISOString()}] ${message}`
      job.logs = [...job.logs, entry].slice(-MAX_JOB_LOGS)
      job.updated_at = Date.now()
      await Promise.all([
        this.persistJobs(),
        fs.appendFile(path.join(this.dataDir, 'logs', `${id}.log`), `${entry}\n`, 'utf-8'),
      ])
    })
  }

  private async persistJobs(): Promise<void> {
    await this.writeJsonAtomic(this.jobsPath, Array.from(this.jobs.values()))
  }
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
