import { setTimeout as sleep } from 'timers/promises'
import { fetch, type RequestInit, type Response } from 'undici'
import { z } from 'zod'

import { PipelineError } from '../errors'
import type { TranscriptionEngine } from '../stages/types'

const BASE_URL = 'https://api.assemblyai.com/v2'

const UtteranceSchema = z.object({
  speaker: z.string(),
  text: z.string(),
  start: z.number(),
  end: z.number(),
})
export type Utterance = z.infer<typeof UtteranceSchema>

const TranscriptSchema = z.object({
  id: z.string(),
  status: z.enum(['queued', 'processing', 'completed', 'error']),
  text: z.string().nullish(),
  error: z.string().nullish(),
  utterances: z.array(UtteranceSchema).nullish(),
})

export interface AssemblyAIConfig {
  apiKey: string
  baseUrl?: string
  pollIntervalMs?: number
}

/** Remote transcription with speaker diarization. */
export class AssemblyAIEngine implements TranscriptionEngine {
  private readonly baseUrl: string
  private readonly pollIntervalMs: number

  constructor(private readonly config: AssemblyAIConfig) {
    this.baseUrl = (config.baseUrl || BASE_URL).replace(/\/$/, '')
    this.pollIntervalMs = config.pollIntervalMs ?? 2000
  }

  async transcribe(audio: Uint8Array, language?: string, signal?: AbortSignal): Promise<string> {
    if (!this.config.apiKey) {
      throw new PipelineError('Internal', 'ASSEMBLYAI_API_KEY is not set', { code: 'NotConfigured' })
    }
    const headers = { authorization: this.config.apiKey }

    const upload = await this.request(`${this.baseUrl}/upload`, { method: 'POST', headers, body: audio, signal })
    const { upload_url } = z.object({ upload_url: z.string() }).parse(await upload.json())

    const created = await this.request(`${this.baseUrl}/transcript`, {
      method: 'POST',
      headers: { ...headers, 'Content-Type': 'application/json' },
      body: JSON.stringify({
        audio_url: upload_url,
        speaker_labels: true,
        format_text: true,
        ...(language ? { language_code: language } : {}),
      }),
      signal,
    })
    let result = TranscriptSchema.parse(await created.json())

    while (result.status === 'queued' || result.status === 'processing') {
      await sleep(this.pollIntervalMs, undefined, { signal })
      const poll = await this.request(`${this.baseUrl}/transcript/${result.id}`, { headers, signal })
      result = TranscriptSchema.parse(await poll.json())
    }

    if (result.status === 'error') {
      throw new PipelineError('Internal', `Transcription failed: ${result.error ?? 'unknown error'}`, {
        code: 'EngineError',
      })
    }

    if (result.utterances && result.utterances.length > 0) {
      return formatTranscriptWithSpeakers(result.utterances)
    }
    return result.text ?? ''
  }

  private async request(url: string, init: RequestInit): Promise<Response> {
    let response: Response
    try {
      response = await fetch(url, init)
    } catch (error) {
      throw new PipelineError('TransientIO', `AssemblyAI unreachable: ${String(error)}`, { cause: error })
    }
    if (!response.ok) {
      const kind = response.status >= 500 || response.status === 429 ? 'TransientIO' : 'Internal'
      throw new PipelineError(kind, `AssemblyAI request failed: ${response.status}`, { code: `HTTP${response.status}` })
    }
    return response
  }
}

export function formatTranscriptWithSpeakers(utterances: Utterance[]): string {
  let formatted = ''
  let lastSpeaker = ''

  for (const utterance of utterances) {
    if (utterance.speaker !== lastSpeaker) {
      if (formatted) formatted += '\n'
      formatted += `[Speaker ${utterance.speaker}]:\n`
      lastSpeaker = utterance.speaker
    }
    formatted += `${utterance.text}\n`
  }

  return formatted
}
