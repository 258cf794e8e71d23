import type { PipelineError } from '../errors'
import type { ArtifactStore } from '../storage/artifact-store'
import type { Artifacts, LogFunction, RecordingJob, RecordingSeed, Stage } from '../types'

export interface RetryPolicy {
  /** Extra attempts after the first call fails with a retryable kind. */
  retries: number
  baseDelayMs: number
}

export interface StageContext {
  artifacts: ArtifactStore
  log: LogFunction
  retry: RetryPolicy
  /** Aborted when the stage run exceeds its timeout. */
  signal: AbortSignal
}

/** Fields a stage may change on the job; artifacts are merged, never replaced wholesale. */
export interface StageDelta {
  filename?: string
  title?: string
  artifacts: Partial<Artifacts>
}

export type StageResult = { ok: true; delta: StageDelta } | { ok: false; failure: PipelineError }

export interface StageExecutor {
  readonly stage: Stage
  run(job: RecordingJob, ctx: StageContext): Promise<StageResult>
}

export interface RecordingPage {
  items: RecordingSeed[]
  nextPage: number | null
}

export interface ConnectionStatus {
  ok: boolean
  message: string
  recordingCount: number
}

export interface RecordingSource {
  listRecordings(page: number): Promise<RecordingPage>
  download(id: string, options: { maxBytes: number; signal?: AbortSignal }): Promise<Uint8Array>
  /** Reachability check for operators; never throws. */
  testConnection(): Promise<ConnectionStatus>
}

export interface TranscriptionEngine {
  /** Engines stop their work and reject once `signal` is aborted. */
  transcribe(audio: Uint8Array, language?: string, signal?: AbortSignal): Promise<string>
}

export interface StructuringService {
  structure(transcript: string, promptTemplate: string, signal?: AbortSignal): Promise<string>
}

export interface RemoteStorage {
  /** Resolves a `/`-separated folder path, creating missing folders; returns the folder id. */
  ensureFolder(folderPath: string): Promise<string>
  upload(folderId: string, filename: string, content: Uint8Array, fingerprint: string): Promise<string>
  /** Fingerprint → object id for everything already stored in the folder. */
  listExisting(folderId: string): Promise<ReadonlyMap<string, string>>
}
