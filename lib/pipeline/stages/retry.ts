import { setTimeout as sleep } from 'timers/promises'

import { TimedOutError, toPipelineError } from '../errors'
import type { FailureKind, Stage } from '../types'
import type { StageContext, StageDelta, StageResult } from './types'

/**
 * Call an upstream collaborator, retrying retryable failures with exponential
 * backoff. Errors that are not already typed are classified as `fallback`.
 */
export async function callUpstream<T>(
  ctx: StageContext,
  label: string,
  fallback: FailureKind,
  call: () => Promise<T>,
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await call()
    } catch (error) {
      const failure = toPipelineError(error, fallback)
      if (!failure.retryable || attempt >= ctx.retry.retries || ctx.signal.aborted) {
        throw failure
      }
      const delay = ctx.retry.baseDelayMs * 2 ** attempt
      ctx.log(`${label} failed (${failure.message}), retrying in ${delay}ms`)
      await sleep(delay)
    }
  }
}

/** Turn a stage body into a StageResult; anything thrown becomes a typed failure. */
export async function settle(work: () => Promise<StageDelta>): Promise<StageResult> {
  try {
    return { ok: true, delta: await work() }
  } catch (error) {
    return { ok: false, failure: toPipelineError(error) }
  }
}

/**
 * Race a stage run against its timeout. On expiry the controller is aborted
 * and the run is reported as TimedOut; a late result is discarded.
 *
 * `onAbandon` receives a promise that resolves once the abandoned run has
 * actually stopped, whether or not it honoured the abort.
 */
export async function withTimeout<T>(
  stage: Stage,
  timeoutMs: number,
  controller: AbortController,
  work: () => Promise<T>,
  onAbandon?: (stopped: Promise<void>) => void,
): Promise<T> {
  const running = work()
  let timer: ReturnType<typeof setTimeout> | undefined

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort()
      const stopped = running.then(
        () => console.warn(`[ORCH] ${stage} finished after timing out, result discarded`),
        error => console.warn(`[ORCH] ${stage} settled after timing out:`, error),
      )
      onAbandon?.(stopped)
      reject(new TimedOutError(stage, timeoutMs))
    }, timeoutMs)
  })

  try {
    return await Promise.race([running, timeout])
  } finally {
    clearTimeout(timer)
  }
}
