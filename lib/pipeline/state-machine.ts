import { InvalidTransitionError } from './errors'
import { STAGES, type JobStatus, type Stage } from './types'

/**
 * Valid status transitions for a RecordingJob.
 *
 * - each stage moves rest → in-progress → rest
 * - any in-progress state → failed
 * - failed → the in-progress state of the failed stage (manual retry)
 * - operator resets (reprocess, delete-artifacts) and startup recovery are
 *   not transitions: they save a rest status no later than the one the
 *   artifacts support, picked with `weakest` and `recoveryTarget`
 */
export const VALID_TRANSITIONS: Readonly<Record<JobStatus, ReadonlyArray<JobStatus>>> = {
  new: ['downloading'],
  downloading: ['downloaded', 'failed'],
  downloaded: ['transcribing'],
  transcribing: ['transcribed', 'failed'],
  transcribed: ['structuring'],
  structuring: ['structured', 'failed'],
  structured: ['publishing'],
  publishing: ['completed', 'failed'],
  completed: [],
  failed: ['downloading', 'transcribing', 'structuring', 'publishing'],
}

/** Ordered rest states; index is the number of stages already done. */
export const REST_STATES = ['new', 'downloaded', 'transcribed', 'structured', 'completed'] as const
export type RestStatus = (typeof REST_STATES)[number]

export const IN_PROGRESS: Readonly<Record<Stage, JobStatus>> = {
  download: 'downloading',
  transcribe: 'transcribing',
  structure: 'structuring',
  publish: 'publishing',
}

export const STAGE_DONE: Readonly<Record<Stage, RestStatus>> = {
  download: 'downloaded',
  transcribe: 'transcribed',
  structure: 'structured',
  publish: 'completed',
}

/** Rest status a stage starts from; also where an orphaned run is reset to. */
export const STAGE_ENTRY: Readonly<Record<Stage, RestStatus>> = {
  download: 'new',
  transcribe: 'downloaded',
  structure: 'transcribed',
  publish: 'structured',
}

const NEXT_STAGE: Readonly<Record<RestStatus, Stage | null>> = {
  new: 'download',
  downloaded: 'transcribe',
  transcribed: 'structure',
  structured: 'publish',
  completed: null,
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to)
}

export function assertTransition(from: JobStatus, to: JobStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to)
  }
}

export function isRestStatus(status: JobStatus): status is RestStatus {
  return REST_STATES.some(rest => rest === status)
}

export function isInProgress(status: JobStatus): boolean {
  return !isRestStatus(status) && status !== 'failed'
}

export function isTerminal(status: JobStatus): boolean {
  return status === 'completed' || status === 'failed'
}

export function nextStageFor(status: RestStatus): Stage | null {
  return NEXT_STAGE[status]
}

/** Rest status to resume from when a run of `status` was interrupted. */
export function recoveryTarget(status: JobStatus): RestStatus | null {
  const stage = STAGES.find(candidate => IN_PROGRESS[candidate] === status)
  return stage ? STAGE_ENTRY[stage] : null
}

/** The weaker (earlier) of two rest states. */
export function weakest(a: RestStatus, b: RestStatus): RestStatus {
  return REST_STATES.indexOf(a) <= REST_STATES.indexOf(b) ? a : b
}
