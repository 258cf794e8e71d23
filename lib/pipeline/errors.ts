import type { FailureKind, JobStatus, Stage } from './types'

/**
 * Typed failure raised inside a stage. The orchestrator persists `kind`,
 * `code` and `message` on the job as `last_error`.
 */
export class PipelineError extends Error {
  readonly kind: FailureKind
  readonly code: string
  readonly retryable: boolean

  constructor(kind: FailureKind, message: string, options: { code?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'PipelineError'
    this.kind = kind
    this.code = options.code ?? kind
    this.retryable = RETRYABLE_KINDS.has(kind)
  }
}

export const RETRYABLE_KINDS: ReadonlySet<FailureKind> = new Set<FailureKind>([
  'TransientIO',
  'SourceUnavailable',
  'StructuringUnavailable',
  'StorageUnavailable',
])

export class TooLargeError extends PipelineError {
  constructor(message: string) {
    super('ResourceLimit', message, { code: 'TooLarge' })
    this.name = 'TooLargeError'
  }
}

export class TimedOutError extends PipelineError {
  constructor(stage: Stage, timeoutMs: number) {
    super('TransientIO', `${stage} stage timed out after ${timeoutMs}ms`, { code: 'TimedOut' })
    this.name = 'TimedOutError'
  }
}

export class MalformedOutlineError extends PipelineError {
  readonly line: number

  constructor(message: string, line: number) {
    super('MalformedOutline', `${message} (line ${line})`)
    this.name = 'MalformedOutlineError'
    this.line = line
  }
}

export class SourceUnavailableError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('SourceUnavailable', message, { cause })
    this.name = 'SourceUnavailableError'
  }
}

export class StructuringUnavailableError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('StructuringUnavailable', message, { cause })
    this.name = 'StructuringUnavailableError'
  }
}

export class StorageUnavailableError extends PipelineError {
  constructor(message: string, cause?: unknown) {
    super('StorageUnavailable', message, { cause })
    this.name = 'StorageUnavailableError'
  }
}

// Caller-facing errors below are not job states.

export class BusyError extends Error {
  readonly jobId: string

  constructor(jobId: string) {
    super(`Recording ${jobId} is already being processed`)
    this.name = 'BusyError'
    this.jobId = jobId
  }
}

export class JobNotFoundError extends Error {
  constructor(jobId: string) {
    super(`Job ${jobId} not found`)
    this.name = 'JobNotFoundError'
  }
}

export class AttemptsExhaustedError extends Error {
  readonly stage: Stage

  constructor(jobId: string, stage: Stage, attempts: number) {
    super(`${stage} failed ${attempts} time(s) for ${jobId}; reprocess to try again`)
    this.name = 'AttemptsExhaustedError'
    this.stage = stage
  }
}

export class InvalidTransitionError extends Error {
  constructor(from: JobStatus, to: JobStatus) {
    super(`Invalid status transition: ${from} → ${to}`)
    this.name = 'InvalidTransitionError'
  }
}

/** Classify anything thrown by a collaborator into a PipelineError. */
export function toPipelineError(error: unknown, fallback: FailureKind = 'Internal'): PipelineError {
  if (error instanceof PipelineError) return error
  const message = error instanceof Error ? error.message : String(error)
  return new PipelineError(fallback, message, { cause: error })
}
