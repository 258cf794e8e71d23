import type { RecordingSource } from './stages/types'
import { isSafeRecordingId } from './utils/filename'
import type { StatusStore } from './storage/types'

export interface DiscoveryResult {
  discovered: number
  skipped: number
  pages: number
  newJobs: string[]
}

/**
 * Walk the source's recording list and create a `new` job for every id the
 * store has not seen. Known ids are left untouched.
 */
export async function discoverRecordings(
  source: RecordingSource,
  store: StatusStore,
  options: { maxPages?: number } = {},
): Promise<DiscoveryResult> {
  const maxPages = options.maxPages ?? 20
  const result: DiscoveryResult = { discovered: 0, skipped: 0, pages: 0, newJobs: [] }

  let page: number | null = 0
  while (page !== null && result.pages < maxPages) {
    const listing = await source.listRecordings(page)
    result.pages++

    for (const seed of listing.items) {
      if (!isSafeRecordingId(seed.id)) {
        console.warn(`[POLL] Ignoring recording with unusable id ${JSON.stringify(seed.id)}`)
        continue
      }
      const { job, created } = await store.create(seed)
      if (created) {
        result.discovered++
        result.newJobs.push(job.id)
        console.log(`[POLL] Discovered ${job.filename} → ${job.id}`)
      } else {
        result.skipped++
      }
    }
    page = listing.nextPage
  }

  if (page !== null) {
    console.warn(`[POLL] Stopped after ${maxPages} page(s); more recordings remain`)
  }
  return result
}
