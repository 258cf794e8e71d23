import cron from 'node-cron'
import type { ScheduledTask } from 'node-cron'

import { BusyError, type Orchestrator } from '@/lib/pipeline'
import { getRuntime } from '@/lib/queue'

let autoCron: ScheduledTask | null = null

export interface AutoProcessResult {
  submitted: string[]
  busy: string[]
}

/**
 * Submit one `advance` for up to `maxBatch` eligible jobs, oldest first.
 * Each submission moves a job by a single stage; later ticks pick up the
 * next one. Busy jobs are simply left for the next tick.
 */
export async function autoProcessOnce(orchestrator: Orchestrator, maxBatch: number): Promise<AutoProcessResult> {
  const candidates = (await orchestrator.list())
    .filter(job => !orchestrator.isBusy(job.id) && orchestrator.isAutoAdvanceable(job))
    .sort((a, b) => (a.start_time ?? a.created_at) - (b.start_time ?? b.created_at))
    .slice(0, maxBatch)

  const result: AutoProcessResult = { submitted: [], busy: [] }
  await Promise.all(
    candidates.map(async job => {
      try {
        const updated = await orchestrator.submit(job.id, 'advance')
        result.submitted.push(job.id)
        console.log(`[AUTO] ${job.id}: ${job.status} → ${updated.status}`)
      } catch (error) {
        if (error instanceof BusyError) {
          result.busy.push(job.id)
          return
        }
        console.error(`[AUTO] ${job.id} could not be advanced:`, error)
      }
    }),
  )
  return result
}

async function runOnce(): Promise<void> {
  try {
    const { orchestrator, config } = await getRuntime()
    if (!config.schedule.autoProcessEnabled) return

    const { submitted } = await autoProcessOnce(orchestrator, config.schedule.autoMaxBatch)
    if (submitted.length > 0) {
      console.log(`[AUTO] Advanced ${submitted.length} job(s)`)
    }
  } catch (error) {
    console.error('[AUTO] Processor tick failed:', error)
  }
}

export function startAutoProcessorCron(schedule: string): void {
  if (autoCron) {
    console.log('[AUTO] Auto-processor cron already running; skipping re-init')
    return
  }

  autoCron = cron.schedule(schedule, () => {
    void runOnce()
  })

  console.log(`[AUTO] Auto-processing scheduled at '${schedule}'`)

  // Kick once on startup to reduce latency
  void runOnce()
}

export function stopAutoProcessorCron(): void {
  if (autoCron) {
    autoCron.stop()
    autoCron = null
    console.log('[AUTO] Auto-processor cron stopped')
  }
}
