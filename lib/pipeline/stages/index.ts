export { DownloadExecutor, DEFAULT_MAX_AUDIO_BYTES } from './download'
export { TranscribeExecutor, DEFAULT_MAX_TRANSCRIPT_CHARS } from './transcribe'
export { StructureExecutor, loadPromptTemplate, unwrapFence } from './structure'
export { PublishExecutor, DOCUMENTS_FOLDER, RECORDINGS_FOLDER } from './publish'
export { callUpstream, settle, withTimeout } from './retry'

export type {
  ConnectionStatus,
  RecordingPage,
  RecordingSource,
  RemoteStorage,
  RetryPolicy,
  StageContext,
  StageDelta,
  StageExecutor,
  StageResult,
  StructuringService,
  TranscriptionEngine,
} from './types'
export type { TranscribeOptions } from './transcribe'
