/**
 * Next.js Instrumentation
 * Runs once when the server starts
 */
export async function register() {
  // Only run on server
  if (process.env.NEXT_RUNTIME === 'nodejs') {
    const { getRuntime } = await import('./lib/queue')
    const { startDiscoveryCron } = await import('./lib/cron/scheduler')
    const { startAutoProcessorCron } = await import('./lib/cron/auto-processor')

    const { orchestrator, config } = await getRuntime()
    const recovered = await orchestrator.recover()
    if (recovered.length > 0) {
      console.log(`[ORCH] Recovered ${recovered.length} interrupted job(s)`)
    }

    startDiscoveryCron(config.schedule.discoveryCron)
    startAutoProcessorCron(config.schedule.autoProcessCron)
  }
}
