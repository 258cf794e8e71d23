import { AttemptsExhaustedError, BusyError, JobNotFoundError, RETRYABLE_KINDS, toPipelineError } from './errors'
import {
  IN_PROGRESS,
  STAGE_DONE,
  STAGE_ENTRY,
  assertTransition,
  isInProgress,
  isRestStatus,
  nextStageFor,
  recoveryTarget,
  weakest,
  type RestStatus,
} from './state-machine'
import { withTimeout } from './stages/retry'
import type { RetryPolicy, StageContext, StageExecutor, StageResult } from './stages/types'
import type { ArtifactStore } from './storage/artifact-store'
import type { HistoryLog, StatusStore } from './storage/types'
import type { Artifacts, Attempts, RecordingJob, Stage } from './types'
import { WorkerPool } from './worker-pool'

export interface OrchestratorConfig {
  /** Runs of one stage allowed before the job needs an explicit reprocess. */
  maxStageAttempts: number
  stageTimeoutMs: number
  retry: RetryPolicy
  /** Stage runs executing at once across all recordings. */
  concurrency: number
}

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  maxStageAttempts: 3,
  stageTimeoutMs: 30 * 60 * 1000,
  retry: { retries: 2, baseDelayMs: 1000 },
  concurrency: 1,
}

export type StageExecutors = { readonly [S in Stage]: StageExecutor }

export interface OrchestratorOptions {
  store: StatusStore
  history: HistoryLog
  artifacts: ArtifactStore
  executors: StageExecutors
  config?: Partial<OrchestratorConfig>
}

export type SubmitAction = 'advance' | 'reprocess'

export interface ArtifactSelection {
  audio?: boolean
  transcript?: boolean
  /** The outline text and the rendered document. */
  document?: boolean
}

function freshAttempts(): Attempts {
  return { download: 0, transcribe: 0, structure: 0, publish: 0 }
}

/**
 * Drives recordings through download → transcribe → structure → publish,
 * one stage per call.
 *
 * Every public operation takes the per-recording lock before its first
 * await, so a second caller for the same id is rejected with BusyError
 * straight away instead of queueing behind the first. A stage run that timed
 * out but has not stopped yet keeps both the lock and its worker slot.
 */
export class Orchestrator {
  readonly config: OrchestratorConfig

  private readonly store: StatusStore
  private readonly history: HistoryLog
  private readonly artifacts: ArtifactStore
  private readonly executors: StageExecutors
  private readonly pool: WorkerPool
  private readonly locks = new Set<string>()
  /** Timed-out runs still winding down, by recording id. */
  private readonly abandoned = new Map<string, Promise<void>>()

  constructor(options: OrchestratorOptions) {
    this.store = options.store
    this.history = options.history
    this.artifacts = options.artifacts
    this.executors = options.executors
    this.config = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...options.config }
    this.pool = new WorkerPool(this.config.concurrency)
  }

  isBusy(id: string): boolean {
    return this.locks.has(id)
  }

  list(): Promise<RecordingJob[]> {
    return this.store.list()
  }

  get(id: string): Promise<RecordingJob> {
    return this.load(id)
  }

  /** Run the next required stage for `id` on the caller's turn. */
  advance(id: string): Promise<RecordingJob> {
    return this.exclusive(id, () => this.advanceLocked(id))
  }

  /**
   * Reset attempts and the last error, re-enter at the latest stage the
   * valid artifacts allow (never past structuring), then advance once.
   */
  reprocess(id: string): Promise<RecordingJob> {
    return this.exclusive(id, () => this.reprocessLocked(id))
  }

  /** Single entry point for HTTP routes and the poller; work runs on the worker pool. */
  submit(id: string, action: SubmitAction): Promise<RecordingJob> {
    return this.exclusive(id, () =>
      this.pool.run(
        () => (action === 'advance' ? this.advanceLocked(id) : this.reprocessLocked(id)),
        () => this.abandoned.get(id),
      ),
    )
  }

  deleteArtifacts(id: string, selection: ArtifactSelection): Promise<RecordingJob> {
    return this.exclusive(id, async () => {
      const job = await this.load(id)
      const artifacts: Artifacts = { ...job.artifacts }
      const removed: string[] = []

      if (selection.audio) {
        await this.artifacts.remove(artifacts.audio)
        delete artifacts.audio
        removed.push('audio')
      }
      if (selection.transcript) {
        await this.artifacts.remove(artifacts.transcript)
        delete artifacts.transcript
        removed.push('transcript')
      }
      if (selection.document) {
        await this.artifacts.remove(artifacts.outline)
        await this.artifacts.remove(artifacts.document)
        delete artifacts.outline
        delete artifacts.document
        delete artifacts.published
        removed.push('document')
      }

      const remaining = { ...job, artifacts }
      const status = weakest(this.restingPoint(job), await this.supportedStatus(remaining))
      const saved = await this.store.save({ ...remaining, status, failed_stage: undefined, last_error: undefined })
      await this.note(id, `Deleted ${removed.join(', ') || 'no'} artifacts, status ${job.status} → ${status}`)
      return saved
    })
  }

  /**
   * Startup pass: in-progress jobs nobody holds a lock for were interrupted
   * and go back to the rest state their stage started from.
   */
  async recover(): Promise<RecordingJob[]> {
    const recovered: RecordingJob[] = []
    for (const job of await this.store.list()) {
      if (!isInProgress(job.status) || this.locks.has(job.id)) continue
      const target = recoveryTarget(job.status)
      if (!target) continue

      const saved = await this.store.save({ ...job, status: target })
      console.warn(`[ORCH] Recovered ${job.id} from interrupted ${job.status} → ${target}`)
      await this.note(job.id, `Interrupted while ${job.status}, resuming from ${target}`)
      recovered.push(saved)
    }
    return recovered
  }

  /** Jobs the background poller may advance without an operator. */
  isAutoAdvanceable(job: RecordingJob): boolean {
    if (job.status === 'failed') {
      const stage = job.failed_stage
      return (
        !!stage &&
        !!job.last_error &&
        RETRYABLE_KINDS.has(job.last_error.kind) &&
        job.attempts[stage] < this.config.maxStageAttempts
      )
    }
    return isRestStatus(job.status) && job.status !== 'completed'
  }

  private async exclusive<T>(id: string, work: () => Promise<T>): Promise<T> {
    if (this.locks.has(id)) {
      throw new BusyError(id)
    }
    this.locks.add(id)
    try {
      return await work()
    } finally {
      const stopped = this.abandoned.get(id)
      if (stopped) {
        console.warn(`[ORCH] ${id} stays locked until its timed-out run stops`)
        stopped.then(() => this.unlock(id), () => this.unlock(id))
      } else {
        this.unlock(id)
      }
    }
  }

  private unlock(id: string): void {
    this.abandoned.delete(id)
    this.locks.delete(id)
  }

  private async load(id: string): Promise<RecordingJob> {
    const job = await this.store.get(id)
    if (!job) throw new JobNotFoundError(id)
    return job
  }

  private async advanceLocked(id: string): Promise<RecordingJob> {
    let job = await this.load(id)
    if (job.status === 'completed') return job

    const supported = await this.supportedStatus(job)
    let entry: RestStatus

    if (job.status === 'failed') {
      const failedStage = job.failed_stage ?? nextStageFor(supported) ?? 'download'
      const attempts = job.attempts[failedStage]
      if (attempts >= this.config.maxStageAttempts) {
        throw new AttemptsExhaustedError(id, failedStage, attempts)
      }
      entry = weakest(STAGE_ENTRY[failedStage], supported)
    } else {
      entry = weakest(this.restingPoint(job), supported)
      if (entry !== job.status) {
        await this.note(id, `Artifacts only support ${entry}, moving back from ${job.status}`)
        job = await this.store.save({ ...job, status: entry })
      }
    }

    const stage = nextStageFor(entry)
    return stage ? this.runStage(job, stage) : job
  }

  private async reprocessLocked(id: string): Promise<RecordingJob> {
    const job = await this.load(id)
    // a valid transcript lets reprocessing skip straight to structuring
    const entry = weakest(await this.supportedStatus(job), 'transcribed')
    await this.store.save({
      ...job,
      status: entry,
      attempts: freshAttempts(),
      failed_stage: undefined,
      last_error: undefined,
    })
    await this.note(id, `Reprocessing from ${entry}`)
    return this.advanceLocked(id)
  }

  private async runStage(job: RecordingJob, stage: Stage): Promise<RecordingJob> {
    const inProgress = IN_PROGRESS[stage]
    assertTransition(job.status, inProgress)

    const attempt = job.attempts[stage] + 1
    const running = await this.store.save({
      ...job,
      status: inProgress,
      attempts: { ...job.attempts, [stage]: attempt },
    })
    await this.note(job.id, `${stage} started (attempt ${attempt})`)

    const result = await this.execute(stage, running)

    if (result.ok) {
      const done = STAGE_DONE[stage]
      assertTransition(inProgress, done)
      const { artifacts, filename, title } = result.delta
      const saved = await this.store.save({
        ...running,
        status: done,
        filename: filename ?? running.filename,
        title: title ?? running.title,
        artifacts: { ...running.artifacts, ...artifacts },
        failed_stage: undefined,
        last_error: undefined,
      })
      await this.note(job.id, `${stage} finished, now ${done}`)

      if (done === 'completed') {
        const skipped = saved.artifacts.published?.skipped ?? []
        await this.history.append({
          recordingId: saved.id,
          terminalStatus: 'completed',
          timestamp: Date.now(),
          summary: `Published ${saved.filename}${skipped.length ? ` (already stored: ${skipped.join(', ')})` : ''}`,
        })
        console.log(`[ORCH] ${saved.id} completed`)
      }
      return saved
    }

    const { failure } = result
    assertTransition(inProgress, 'failed')
    const saved = await this.store.save({
      ...running,
      status: 'failed',
      failed_stage: stage,
      last_error: {
        kind: failure.kind,
        code: failure.code,
        stage,
        message: failure.message,
        at: Date.now(),
      },
    })
    await this.note(job.id, `${stage} failed (${failure.code}): ${failure.message}`)
    await this.history.append({
      recordingId: saved.id,
      terminalStatus: 'failed',
      timestamp: Date.now(),
      summary: `${stage} failed: ${failure.message}`,
      stage,
      kind: failure.kind,
    })
    console.error(`[ORCH] ${saved.id} ${stage} failed (${failure.kind}/${failure.code}): ${failure.message}`)
    return saved
  }

  private async execute(stage: Stage, job: RecordingJob): Promise<StageResult> {
    const controller = new AbortController()
    const ctx: StageContext = {
      artifacts: this.artifacts,
      log: message => this.logLater(job.id, message),
      retry: this.config.retry,
      signal: controller.signal,
    }

    try {
      return await withTimeout(
        stage,
        this.config.stageTimeoutMs,
        controller,
        () => this.executors[stage].run(job, ctx),
        stopped => this.abandoned.set(job.id, stopped),
      )
    } catch (error) {
      return { ok: false, failure: toPipelineError(error) }
    }
  }

  /**
   * The weakest rest status the stored artifacts can back. An intact
   * transcript counts without the audio it came from, unless the audio that
   * is retained has a different fingerprint.
   */
  private async supportedStatus(job: RecordingJob): Promise<RestStatus> {
    const { audio, transcript, outline, document, published } = job.artifacts

    const audioValid = await this.artifacts.verify(audio)
    const transcriptValid =
      !!transcript &&
      (!audioValid || transcript.sourceFingerprint === audio?.fingerprint) &&
      (await this.artifacts.verify(transcript))
    if (!transcriptValid) return audioValid ? 'downloaded' : 'new'
    if (!(await this.artifacts.verify(outline))) return 'transcribed'
    if (!published || !(await this.artifacts.verify(document))) return 'structured'
    return 'completed'
  }

  /** Rest status a job sits at, or would return to if its current run were dropped. */
  private restingPoint(job: RecordingJob): RestStatus {
    if (isRestStatus(job.status)) return job.status
    if (job.status === 'failed') return STAGE_ENTRY[job.failed_stage ?? 'download']
    return recoveryTarget(job.status) ?? 'new'
  }

  private async note(id: string, message: string): Promise<void> {
    console.log(`[${id}] ${message}`)
    await this.store.appendLog(id, message)
  }

  private logLater(id: string, message: string): void {
    console.log(`[${id}] ${message}`)
    this.store.appendLog(id, message).catch(error => {
      console.error(`[ORCH] Could not record log line for ${id}:`, error)
    })
  }
}
