import { NextRequest, NextResponse } from 'next/server'

import { getRuntime } from '@/lib/queue'
import { enforceRateLimit, errorResponse } from '@/lib/server/security'

export const runtime = 'nodejs'

// GET /api/recordings/status - Check that the recording source answers
export async function GET(request: NextRequest) {
  const limited = enforceRateLimit(request)
  if (limited) return limited

  try {
    const { source } = await getRuntime()
    if (!source) {
      return NextResponse.json(
        { ok: false, message: 'No recording source configured', recordingCount: 0 },
        { status: 503 },
      )
    }

    const status = await source.testConnection()
    return NextResponse.json(status, { status: status.ok ? 200 : 502 })
  } catch (error) {
    return errorResponse(error, 'Source check')
  }
}
