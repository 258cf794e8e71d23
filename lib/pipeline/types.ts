import { z } from 'zod'

export const STAGES = ['download', 'transcribe', 'structure', 'publish'] as const
export type Stage = (typeof STAGES)[number]

export const JOB_STATUSES = [
  'new',
  'downloading',
  'downloaded',
  'transcribing',
  'transcribed',
  'structuring',
  'structured',
  'publishing',
  'completed',
  'failed',
] as const
export type JobStatus = (typeof JOB_STATUSES)[number]

export const FAILURE_KINDS = [
  'TransientIO',
  'ResourceLimit',
  'MalformedOutline',
  'SourceUnavailable',
  'StructuringUnavailable',
  'StorageUnavailable',
  'Internal',
] as const
export type FailureKind = (typeof FAILURE_KINDS)[number]

const ArtifactSchema = z.object({
  path: z.string(),
  bytes: z.number().int().nonnegative(),
  fingerprint: z.string(),
  createdAt: z.number(),
})
export type Artifact = z.infer<typeof ArtifactSchema>

const TranscriptArtifactSchema = ArtifactSchema.extend({
  // fingerprint of the audio the transcript was produced from
  sourceFingerprint: z.string(),
  chars: z.number().int().nonnegative(),
})
export type TranscriptArtifact = z.infer<typeof TranscriptArtifactSchema>

const PublishedSchema = z.object({
  documentId: z.string(),
  /** Absent when the audio was no longer kept locally at publish time. */
  audioId: z.string().optional(),
  transcriptId: z.string(),
  skipped: z.array(z.enum(['document', 'audio', 'transcript'])).default([]),
  publishedAt: z.number(),
})
export type PublishedObjects = z.infer<typeof PublishedSchema>

export const ArtifactsSchema = z.object({
  audio: ArtifactSchema.optional(),
  transcript: TranscriptArtifactSchema.optional(),
  outline: ArtifactSchema.optional(),
  document: ArtifactSchema.optional(),
  published: PublishedSchema.optional(),
})
export type Artifacts = z.infer<typeof ArtifactsSchema>

export const JobErrorSchema = z.object({
  kind: z.enum(FAILURE_KINDS),
  code: z.string(),
  stage: z.enum(STAGES),
  message: z.string(),
  at: z.number(),
})
export type JobError = z.infer<typeof JobErrorSchema>

export const AttemptsSchema = z.object({
  download: z.number().int().nonnegative().default(0),
  transcribe: z.number().int().nonnegative().default(0),
  structure: z.number().int().nonnegative().default(0),
  publish: z.number().int().nonnegative().default(0),
})
export type Attempts = z.infer<typeof AttemptsSchema>

export const RecordingJobSchema = z.object({
  id: z.string().min(1),
  status: z.enum(JOB_STATUSES),
  filename: z.string(),
  title: z.string().optional(),
  start_time: z.number().optional(),
  duration_ms: z.number().optional(),
  attempts: AttemptsSchema.default({}),
  artifacts: ArtifactsSchema.default({}),
  failed_stage: z.enum(STAGES).optional(),
  last_error: JobErrorSchema.optional(),
  logs: z.array(z.string()).default([]),
  created_at: z.number(),
  updated_at: z.number(),
})

export type RecordingJob = z.infer<typeof RecordingJobSchema>

/** What the recording lister knows about a recording before any stage has run. */
export interface RecordingSeed {
  id: string
  filename: string
  title?: string
  startTime?: number
  durationMs?: number
}

export const HistoryEntrySchema = z.object({
  recordingId: z.string(),
  terminalStatus: z.enum(['completed', 'failed']),
  timestamp: z.number(),
  summary: z.string(),
  stage: z.enum(STAGES).optional(),
  kind: z.enum(FAILURE_KINDS).optional(),
})
export type HistoryEntry = z.infer<typeof HistoryEntrySchema>

export type LogFunction = (message: string) => void
