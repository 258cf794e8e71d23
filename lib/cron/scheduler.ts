import cron from 'node-cron'
import type { ScheduledTask } from 'node-cron'

import { discoverRecordings, type DiscoveryResult } from '@/lib/pipeline'
import { getRuntime } from '@/lib/queue'

let cronJob: ScheduledTask | null = null

/** One discovery pass; a no-op until a recording source is configured. */
export async function runDiscovery(): Promise<DiscoveryResult | null> {
  const { source, store, config } = await getRuntime()
  if (!source) {
    console.log('[POLL] No recording source configured, skipping discovery')
    return null
  }
  return discoverRecordings(source, store, { maxPages: config.schedule.discoveryMaxPages })
}

function tick(label: string): void {
  runDiscovery()
    .then(result => {
      if (result) {
        console.log(`[POLL] ${label} complete: ${result.discovered} new, ${result.skipped} known`)
      }
    })
    .catch(error => {
      console.error(`[POLL] ${label} failed:`, error)
    })
}

/**
 * Start the discovery cron job
 */
export function startDiscoveryCron(schedule: string): void {
  // Prevent multiple cron jobs in development (hot reload)
  if (cronJob) {
    console.log('[POLL] Discovery cron already running, skipping initialization')
    return
  }

  cronJob = cron.schedule(schedule, () => tick('Discovery'))
  console.log(`[POLL] Discovery scheduled at '${schedule}'`)

  tick('Initial discovery')
}

export function stopDiscoveryCron(): void {
  if (cronJob) {
    cronJob.stop()
    cronJob = null
    console.log('[POLL] Discovery cron stopped')
  }
}
