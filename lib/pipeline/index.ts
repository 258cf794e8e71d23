// Core
export { Orchestrator, DEFAULT_ORCHESTRATOR_CONFIG } from './orchestrator'
export { WorkerPool } from './worker-pool'
export { discoverRecordings } from './discovery'
export * from './errors'
export * from './state-machine'

// Storage
export { JobStore } from './storage/job-store'
export { FileHistoryLog } from './storage/history-log'
export { ArtifactStore } from './storage/artifact-store'

// Stages and their collaborators
export * from './stages'
export { WhisperCliEngine } from './whisper/engine'
export { AssemblyAIEngine } from './assemblyai/client'
export { OpenAIStructuringService } from './openai/client'

export { RecordingJobSchema, HistoryEntrySchema, STAGES, JOB_STATUSES, FAILURE_KINDS } from './types'

export type {
  ArtifactSelection,
  OrchestratorConfig,
  OrchestratorOptions,
  StageExecutors,
  SubmitAction,
} from './orchestrator'
export type { DiscoveryResult } from './discovery'
export type { HistoryLog, StatusStore } from './storage/types'
export type { ArtifactKind } from './storage/artifact-store'
export type {
  Artifact,
  Artifacts,
  FailureKind,
  HistoryEntry,
  JobError,
  JobStatus,
  LogFunction,
  RecordingJob,
  RecordingSeed,
  Stage,
} from './types'
