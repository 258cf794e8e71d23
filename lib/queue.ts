import path from 'path'

import { loadConfig, type AppConfig } from '@/lib/config'
import { getDb } from '@/lib/db/client'
import { DropFolderSource } from '@/lib/dropfolder/source'
import { ensureSchema } from '@/lib/db/ensure-schema'
import { PostgresHistoryLog } from '@/lib/db/history-log'
import { PostgresStatusStore } from '@/lib/db/status-store'
import { DriveStorage } from '@/lib/gdrive/client'
import {
  ArtifactStore,
  AssemblyAIEngine,
  DownloadExecutor,
  FileHistoryLog,
  JobStore,
  OpenAIStructuringService,
  Orchestrator,
  PublishExecutor,
  SourceUnavailableError,
  StorageUnavailableError,
  StructureExecutor,
  TranscribeExecutor,
  WhisperCliEngine,
  loadPromptTemplate,
  type HistoryLog,
  type RecordingSource,
  type RemoteStorage,
  type StatusStore,
  type TranscriptionEngine,
} from '@/lib/pipeline'
import { PlaudClient } from '@/lib/plaud/client'

export interface Runtime {
  config: AppConfig
  store: StatusStore
  history: HistoryLog
  orchestrator: Orchestrator
  artifacts: ArtifactStore
  /** Undefined until a Plaud token or a drop folder is configured. */
  source?: RecordingSource
}

const NO_SOURCE = 'Neither PLAUD_TOKEN nor DROP_FOLDER is set'

const missingSource: RecordingSource = {
  listRecordings: () => Promise.reject(new SourceUnavailableError(NO_SOURCE)),
  download: () => Promise.reject(new SourceUnavailableError(NO_SOURCE)),
  testConnection: () => Promise.resolve({ ok: false, message: NO_SOURCE, recordingCount: 0 }),
}

function recordingSource(config: AppConfig): RecordingSource | undefined {
  if (config.plaud) return new PlaudClient(config.plaud)
  if (config.dropFolder) {
    console.log(`[DROP] Watching ${config.dropFolder.dir} for audio files`)
    return new DropFolderSource({ ...config.dropFolder, maxBytes: config.limits.maxAudioBytes })
  }
  return undefined
}

const missingStorage: RemoteStorage = {
  ensureFolder: () => Promise.reject(new StorageUnavailableError('Google Drive credentials are not set')),
  upload: () => Promise.reject(new StorageUnavailableError('Google Drive credentials are not set')),
  listExisting: () => Promise.reject(new StorageUnavailableError('Google Drive credentials are not set')),
}

function transcriptionEngine(config: AppConfig): TranscriptionEngine {
  const settings = config.transcription
  return settings.engine === 'assemblyai'
    ? new AssemblyAIEngine({ apiKey: settings.apiKey })
    : new WhisperCliEngine({ binary: settings.binary, model: settings.model, modelDir: settings.modelDir })
}

async function persistence(config: AppConfig): Promise<{ store: StatusStore; history: HistoryLog }> {
  if (config.databaseUrl) {
    const db = getDb(config.databaseUrl)
    await ensureSchema(db)
    console.log('[STORE] Using Postgres status store')
    return { store: new PostgresStatusStore(db), history: new PostgresHistoryLog(db) }
  }
  console.log(`[STORE] Using file status store in ${path.resolve(config.dataDir)}`)
  return { store: new JobStore(config.dataDir), history: new FileHistoryLog(config.dataDir) }
}

async function createRuntime(config: AppConfig): Promise<Runtime> {
  const { store, history } = await persistence(config)
  const source = recordingSource(config)
  const storage = config.drive ? DriveStorage.fromCredentials(config.drive) : missingStorage
  const artifacts = new ArtifactStore(config.dataDir)
  const promptTemplate = await loadPromptTemplate(path.resolve(process.cwd(), config.structuring.promptPath))

  const orchestrator = new Orchestrator({
    store,
    history,
    artifacts,
    config: config.orchestrator,
    executors: {
      download: new DownloadExecutor(source ?? missingSource, config.limits.maxAudioBytes),
      transcribe: new TranscribeExecutor(transcriptionEngine(config), {
        language: config.transcription.language,
        maxTranscriptChars: config.limits.maxTranscriptChars,
      }),
      structure: new StructureExecutor(
        new OpenAIStructuringService({
          apiKey: config.structuring.apiKey ?? '',
          baseUrl: config.structuring.baseUrl,
          model: config.structuring.model,
        }),
        promptTemplate,
      ),
      publish: new PublishExecutor(storage, config.driveRootFolder),
    },
  })

  return { config, store, history, orchestrator, artifacts, source }
}

let runtime: Promise<Runtime> | null = null

/** Process-wide runtime, built from the environment on first use. */
export function getRuntime(): Promise<Runtime> {
  if (!runtime) {
    runtime = createRuntime(loadConfig()).catch(error => {
      runtime = null
      throw error
    })
  }
  return runtime
}
