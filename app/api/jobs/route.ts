import { NextRequest, NextResponse } from 'next/server'
import { z } from 'zod'

import { JOB_STATUSES } from '@/lib/pipeline'
import { getRuntime } from '@/lib/queue'
import { enforceRateLimit, errorResponse } from '@/lib/server/security'

export const runtime = 'nodejs'

const ListQuerySchema = z.object({
  status: z.enum(JOB_STATUSES).optional(),
})

// GET /api/jobs - List recording jobs, newest recording first
export async function GET(request: NextRequest) {
  const limited = enforceRateLimit(request)
  if (limited) return limited

  try {
    const { searchParams } = new URL(request.url)
    const query = ListQuerySchema.parse({ status: searchParams.get('status') ?? undefined })

    const { orchestrator } = await getRuntime()
    const jobs = await orchestrator.list()
    const filtered = query.status ? jobs.filter(job => job.status === query.status) : jobs

    return NextResponse.json({
      jobs: filtered.map(job => ({ ...job, busy: orchestrator.isBusy(job.id) })),
    })
  } catch (error) {
    return errorResponse(error, 'Listing jobs')
  }
}
