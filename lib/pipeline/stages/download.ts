import { TooLargeError } from '../errors'
import type { RecordingJob } from '../types'
import { audioFilename } from '../utils/filename'
import { callUpstream, settle } from './retry'
import type { RecordingSource, StageContext, StageExecutor, StageResult } from './types'

export const DEFAULT_MAX_AUDIO_BYTES = 500 * 1024 * 1024

export class DownloadExecutor implements StageExecutor {
  readonly stage = 'download'

  constructor(
    private readonly source: RecordingSource,
    private readonly maxAudioBytes: number = DEFAULT_MAX_AUDIO_BYTES,
  ) {}

  run(job: RecordingJob, ctx: StageContext): Promise<StageResult> {
    return settle(async () => {
      const filename = audioFilename(job.filename, job.id)
      ctx.log(`Downloading ${filename}`)

      const bytes = await callUpstream(ctx, 'Download', 'SourceUnavailable', () =>
        this.source.download(job.id, { maxBytes: this.maxAudioBytes, signal: ctx.signal }),
      )
      if (bytes.byteLength > this.maxAudioBytes) {
        throw new TooLargeError(`Recording is ${bytes.byteLength} bytes (max ${this.maxAudioBytes})`)
      }

      const audio = await ctx.artifacts.write('audio', job.id, filename, bytes)
      ctx.log(`Downloaded ${audio.bytes} bytes (${audio.fingerprint})`)
      return { filename, artifacts: { audio } }
    })
  }
}
