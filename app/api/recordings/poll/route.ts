import { NextResponse } from 'next/server'

import { runDiscovery } from '@/lib/cron/scheduler'
import { getRuntime } from '@/lib/queue'
import { hasCronSecret } from '@/lib/server/access'
import { errorResponse } from '@/lib/server/security'

export const runtime = 'nodejs'

/**
 * POST /api/recordings/poll
 * Discover new recordings from the recording source.
 * Protected by CRON_SECRET for automated polling.
 */
export async function POST(request: Request) {
  try {
    const { config } = await getRuntime()
    if (!hasCronSecret(request, config.cronSecret)) {
      return NextResponse.json({ error: 'Unauthorized' }, { status: 401 })
    }

    const result = await runDiscovery()
    if (!result) {
      return NextResponse.json({ error: 'No recording source configured' }, { status: 503 })
    }

    return NextResponse.json({
      success: true,
      discovery: {
        discovered: result.discovered,
        skipped: result.skipped,
        pages: result.pages,
      },
    })
  } catch (error) {
    return errorResponse(error, 'Discovery')
  }
}
