import { execFile } from 'child_process'
import { promises as fs } from 'fs'
import os from 'os'
import path from 'path'
import { promisify } from 'util'
import { z } from 'zod'

import { PipelineError } from '../errors'
import type { TranscriptionEngine } from '../stages/types'

const execFileAsync = promisify(execFile)

/** Segment from whisper's JSON output */
const WhisperOutputSchema = z.object({
  text: z.string().default(''),
  segments: z
    .array(z.object({ start: z.number(), end: z.number(), text: z.string() }))
    .default([]),
})
export type WhisperOutput = z.infer<typeof WhisperOutputSchema>

export interface WhisperConfig {
  binary: string
  model: string
  /** Directory whisper downloads models into; kept across restarts. */
  modelDir?: string
}

function timestamp(seconds: number): string {
  const whole = Math.floor(seconds)
  const mm = String(Math.floor(whole / 60)).padStart(2, '0')
  const ss = String(whole % 60).padStart(2, '0')
  return `[${mm}:${ss}]`
}

/** One `[MM:SS] text` line per segment; the plain text when there are none. */
export function formatSegments(output: WhisperOutput): string {
  const lines = output.segments
    .map(segment => ({ start: segment.start, text: segment.text.trim() }))
    .filter(segment => segment.text)
    .map(segment => `${timestamp(segment.start)} ${segment.text}`)
  return lines.length > 0 ? lines.join('\n') : output.text.trim()
}

/**
 * Local speech-to-text through the whisper command line. The child process
 * keeps the CPU-heavy work off the server's event loop.
 */
export class WhisperCliEngine implements TranscriptionEngine {
  constructor(private readonly config: WhisperConfig) {}

  async transcribe(audio: Uint8Array, language?: string, signal?: AbortSignal): Promise<string> {
    const workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'scribeflow-whisper-'))
    const inputPath = path.join(workDir, 'audio')

    try {
      await fs.writeFile(inputPath, audio)
      const args = [
        inputPath,
        '--model', this.config.model,
        '--output_format', 'json',
        '--output_dir', workDir,
        ...(this.config.modelDir ? ['--model_dir', this.config.modelDir] : []),
        ...(language ? ['--language', language] : []),
      ]

      try {
        // aborting kills the child process
        await execFileAsync(this.config.binary, args, { maxBuffer: 64 * 1024 * 1024, signal })
      } catch (error) {
        throw new PipelineError('Internal', `whisper failed: ${error instanceof Error ? error.message : String(error)}`, {
          code: 'EngineError',
          cause: error,
        })
      }

      const raw = await fs.readFile(path.join(workDir, 'audio.json'), 'utf-8')
      return formatSegments(WhisperOutputSchema.parse(JSON.parse(raw)))
    } finally {
      await fs.rm(workDir, { recursive: true, force: true })
    }
  }
}
