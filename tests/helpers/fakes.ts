import { mkdtemp, rm } from 'fs/promises'
import { tmpdir } from 'os'
import path from 'path'

import {
  ArtifactStore,
  DownloadExecutor,
  FileHistoryLog,
  JobStore,
  Orchestrator,
  PublishExecutor,
  RecordingJobSchema,
  StructureExecutor,
  TranscribeExecutor,
  type OrchestratorConfig,
  type RecordingJob,
  type RecordingPage,
  type RecordingSeed,
  type ConnectionStatus,
  type RecordingSource,
  type RemoteStorage,
  type RetryPolicy,
  type StageContext,
  type StructuringService,
  type TranscriptionEngine,
} from '@/lib/pipeline'

export const OUTLINE_TEXT = [
  '# Team sync',
  '',
  'Discussed the **launch** plan.',
  '',
  '- Ship beta',
  '  - Collect feedback',
  '',
  '| Owner | Task |',
  '|---|---|',
  '| Sam | Docs |',
].join('\n')

export const TRANSCRIPT_TEXT = '[00:00] We agreed to ship the beta next week.'

export const PROMPT_TEMPLATE = 'Structure this transcript:\n\n{{transcript}}'

export async function makeTempDir(prefix = 'scribeflow-test-'): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix))
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true })
}

export function makeJob(overrides: Partial<RecordingJob> = {}): RecordingJob {
  const now = Date.now()
  return RecordingJobSchema.parse({
    id: 'rec-1',
    status: 'new',
    filename: 'Team sync.mp3',
    created_at: now,
    updated_at: now,
    ...overrides,
  })
}

export function stageContext(dataDir: string, retry: RetryPolicy = { retries: 0, baseDelayMs: 0 }) {
  const lines: string[] = []
  const ctx: StageContext = {
    artifacts: new ArtifactStore(dataDir),
    log: message => {
      lines.push(message)
    },
    retry,
    signal: new AbortController().signal,
  }
  return { ctx, lines }
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = () => {}
  const promise = new Promise<void>(done => {
    resolve = done
  })
  return { promise, resolve }
}

export class FakeSource implements RecordingSource {
  readonly downloads: string[] = []
  /** Thrown by the next downloads, one per call. */
  failures: Error[] = []
  /** Downloads of these ids wait for the promise before answering. */
  readonly holds = new Map<string, Promise<void>>()
  /** Downloads never finish on their own; they reject once aborted. */
  hang = false
  audio: Uint8Array = new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8])

  constructor(
    private readonly recordings: RecordingSeed[] = [],
    private readonly pageSize = 2,
  ) {}

  async listRecordings(page: number): Promise<RecordingPage> {
    const start = page * this.pageSize
    const items = this.recordings.slice(start, start + this.pageSize)
    return { items, nextPage: start + this.pageSize < this.recordings.length ? page + 1 : null }
  }

  async download(id: string, options: { maxBytes: number; signal?: AbortSignal }): Promise<Uint8Array> {
    this.downloads.push(id)
    if (this.hang) {
      return new Promise((_, reject) => {
        options.signal?.addEventListener('abort', () => reject(new Error('download aborted')))
      })
    }
    await this.holds.get(id)
    const failure = this.failures.shift()
    if (failure) throw failure
    return this.audio
  }

  async testConnection(): Promise<ConnectionStatus> {
    return { ok: true, message: `${this.recordings.length} recordings available`, recordingCount: this.recordings.length }
  }
}

/** Ignores the abort signal, like an engine that cannot be interrupted. */
export class FakeEngine implements TranscriptionEngine {
  readonly calls: Array<{ bytes: number; language?: string }> = []
  failures: Error[] = []
  text = TRANSCRIPT_TEXT
  /** Calls wait for this promise before answering while it is set. */
  hold: Promise<void> | null = null
  active = 0
  maxActive = 0

  async transcribe(audio: Uint8Array, language?: string): Promise<string> {
    this.calls.push({ bytes: audio.byteLength, language })
    this.active++
    this.maxActive = Math.max(this.maxActive, this.active)
    try {
      if (this.hold) await this.hold
      const failure = this.failures.shift()
      if (failure) throw failure
      return this.text
    } finally {
      this.active--
    }
  }
}

export class FakeStructuring implements StructuringService {
  readonly prompts: string[] = []
  failures: Error[] = []
  /** Thrown by every call while set. */
  error: Error | null = null
  outline = OUTLINE_TEXT

  async structure(transcript: string, promptTemplate: string): Promise<string> {
    this.prompts.push(promptTemplate.replace('{{transcript}}', transcript))
    if (this.error) throw this.error
    const failure = this.failures.shift()
    if (failure) throw failure
    return this.outline
  }
}

export class MemoryStorage implements RemoteStorage {
  readonly folders = new Map<string, string>()
  readonly uploads: Array<{ folderId: string; filename: string; fingerprint: string }> = []
  private readonly objects = new Map<string, Map<string, string>>()

  async ensureFolder(folderPath: string): Promise<string> {
    let id = this.folders.get(folderPath)
    if (!id) {
      id = `folder-${this.folders.size + 1}`
      this.folders.set(folderPath, id)
    }
    return id
  }

  async upload(folderId: string, filename: string, _content: Uint8Array, fingerprint: string): Promise<string> {
    this.uploads.push({ folderId, filename, fingerprint })
    const id = `object-${this.uploads.length}`
    this.folderObjects(folderId).set(fingerprint, id)
    return id
  }

  async listExisting(folderId: string): Promise<ReadonlyMap<string, string>> {
    return new Map(this.folderObjects(folderId))
  }

  private folderObjects(folderId: string): Map<string, string> {
    let objects = this.objects.get(folderId)
    if (!objects) {
      objects = new Map()
      this.objects.set(folderId, objects)
    }
    return objects
  }
}

export interface Harness {
  dataDir: string
  store: JobStore
  history: FileHistoryLog
  artifacts: ArtifactStore
  source: FakeSource
  engine: FakeEngine
  structuring: FakeStructuring
  storage: MemoryStorage
  orchestrator: Orchestrator
}

const TEST_CONFIG: Partial<OrchestratorConfig> = {
  maxStageAttempts: 3,
  stageTimeoutMs: 5_000,
  retry: { retries: 0, baseDelayMs: 0 },
  concurrency: 2,
}

/** Orchestrator over file stores in `dataDir` with in-memory collaborators. */
export function createHarness(
  dataDir: string,
  config: Partial<OrchestratorConfig> = {},
  parts: Partial<Pick<Harness, 'store' | 'source' | 'engine' | 'structuring' | 'storage'>> = {},
): Harness {
  const store = parts.store ?? new JobStore(dataDir)
  const history = new FileHistoryLog(dataDir)
  const artifacts = new ArtifactStore(dataDir)
  const source = parts.source ?? new FakeSource()
  const engine = parts.engine ?? new FakeEngine()
  const structuring = parts.structuring ?? new FakeStructuring()
  const storage = parts.storage ?? new MemoryStorage()

  const orchestrator = new Orchestrator({
    store,
    history,
    artifacts,
    config: { ...TEST_CONFIG, ...config },
    executors: {
      download: new DownloadExecutor(source, 1024),
      transcribe: new TranscribeExecutor(engine, { language: 'en', maxTranscriptChars: 1_000 }),
      structure: new StructureExecutor(structuring, PROMPT_TEMPLATE),
      publish: new PublishExecutor(storage, 'ScribeFlow'),
    },
  })

  return { dataDir, store, history, artifacts, source, engine, structuring, storage, orchestrator }
}
