import { NextRequest, NextResponse } from 'next/server'

import { ConfigError, loadConfig } from '@/lib/config'
import { enforceRateLimit } from '@/lib/server/security'

export const runtime = 'nodejs'

// GET /api/health - Health check endpoint
export async function GET(request: NextRequest) {
  const limited = enforceRateLimit(request)
  if (limited) return limited

  try {
    const config = loadConfig()
    return NextResponse.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      env: {
        store: config.databaseUrl ? 'postgres' : 'file',
        dataDir: config.dataDir,
        source: config.plaud ? 'plaud' : config.dropFolder ? 'folder' : null,
        transcription: config.transcription.engine,
        structuring: !!config.structuring.apiKey,
        drive: config.drive?.type ?? null,
      },
    })
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error
    return NextResponse.json(
      { status: 'misconfigured', timestamp: new Date().toISOString(), issues: error.issues },
      { status: 503 },
    )
  }
}
