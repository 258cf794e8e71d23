import { PipelineError, TooLargeError } from '../errors'
import type { RecordingJob } from '../types'
import { baseName } from '../utils/filename'
import { callUpstream, settle } from './retry'
import type { StageContext, StageExecutor, StageResult, TranscriptionEngine } from './types'

export const DEFAULT_MAX_TRANSCRIPT_CHARS = 500_000

export interface TranscribeOptions {
  language?: string
  maxTranscriptChars?: number
}

export class TranscribeExecutor implements StageExecutor {
  readonly stage = 'transcribe'
  private readonly maxChars: number

  constructor(
    private readonly engine: TranscriptionEngine,
    private readonly options: TranscribeOptions = {},
  ) {
    this.maxChars = options.maxTranscriptChars ?? DEFAULT_MAX_TRANSCRIPT_CHARS
  }

  run(job: RecordingJob, ctx: StageContext): Promise<StageResult> {
    return settle(async () => {
      const audio = job.artifacts.audio
      if (!audio) {
        throw new PipelineError('Internal', 'No audio artifact to transcribe', { code: 'MissingArtifact' })
      }

      const bytes = await ctx.artifacts.read(audio)
      ctx.log(`Transcribing ${bytes.byteLength} bytes${this.options.language ? ` (${this.options.language})` : ''}`)

      const text = (
        await callUpstream(ctx, 'Transcription', 'Internal', () =>
          this.engine.transcribe(bytes, this.options.language, ctx.signal),
        )
      ).trim()

      // never truncated: a cut transcript would silently corrupt the outline
      if (text.length > this.maxChars) {
        throw new TooLargeError(`Transcript is ${text.length} characters (max ${this.maxChars})`)
      }
      if (!text) {
        throw new PipelineError('Internal', 'Transcription produced no text', { code: 'EmptyTranscript' })
      }

      const written = await ctx.artifacts.write('transcript', job.id, `${baseName(job.filename)}.txt`, text)
      ctx.log(`Transcript saved (${text.length} chars)`)
      return {
        artifacts: {
          transcript: { ...written, sourceFingerprint: audio.fingerprint, chars: text.length },
        },
      }
    })
  }
}
