import { NextRequest, NextResponse } from 'next/server'
import { z } from 'zod'

import { getRuntime } from '@/lib/queue'
import { enforceRateLimit, errorResponse } from '@/lib/server/security'

export const runtime = 'nodejs'

const ListQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(1000).default(50),
  recordingId: z.string().min(1).optional(),
})

const PurgeQuerySchema = z.object({
  // epoch milliseconds; entries older than this are removed, all when omitted
  before: z.coerce.number().int().nonnegative().optional(),
})

// GET /api/history - Terminal transitions, newest first
export async function GET(request: NextRequest) {
  const limited = enforceRateLimit(request)
  if (limited) return limited

  try {
    const { searchParams } = new URL(request.url)
    const query = ListQuerySchema.parse({
      limit: searchParams.get('limit') ?? undefined,
      recordingId: searchParams.get('recordingId') ?? undefined,
    })
    const { history } = await getRuntime()
    return NextResponse.json({ entries: await history.list(query) })
  } catch (error) {
    return errorResponse(error, 'Listing history')
  }
}

// DELETE /api/history?before=<ms> - Purge history entries
export async function DELETE(request: NextRequest) {
  const limited = enforceRateLimit(request)
  if (limited) return limited

  try {
    const { searchParams } = new URL(request.url)
    const { before } = PurgeQuerySchema.parse({ before: searchParams.get('before') ?? undefined })
    const { history } = await getRuntime()
    const removed = await history.purge(before)
    console.log(`[HISTORY] Purged ${removed} entries${before !== undefined ? ` older than ${new Date(before).toISOString()}` : ''}`)
    return NextResponse.json({ success: true, removed })
  } catch (error) {
    return errorResponse(error, 'Purging history')
  }
}
