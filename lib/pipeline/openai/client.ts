import { fetch, type Response } from 'undici'
import { z } from 'zod'

import { StructuringUnavailableError } from '../errors'
import type { StructuringService } from '../stages/types'

export interface OpenAIConfig {
  apiKey: string
  baseUrl?: string
  model?: string
  temperature?: number
}

const TRANSCRIPT_PLACEHOLDER = '{{transcript}}'

const SYSTEM_PROMPT =
  'You turn recording transcripts into well-structured documents. Answer with the document only, ' +
  'using markdown headings, lists, pipe tables and links.'

const StreamChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z.object({ content: z.string().nullish() }).partial().optional(),
      }),
    )
    .default([]),
})

/** Insert the transcript at the template's placeholder, or append it. */
export function renderPrompt(template: string, transcript: string): string {
  return template.includes(TRANSCRIPT_PLACEHOLDER)
    ? template.split(TRANSCRIPT_PLACEHOLDER).join(transcript)
    : `${template.trimEnd()}\n\n## Transcript\n${transcript}`
}

/**
 * Structuring through an OpenAI-compatible Chat Completions endpoint,
 * consumed as a server-sent event stream.
 */
export class OpenAIStructuringService implements StructuringService {
  private readonly baseUrl: string
  private readonly model: string

  constructor(private readonly config: OpenAIConfig) {
    this.baseUrl = (config.baseUrl || 'https://api.openai.com/v1').replace(/\/$/, '')
    this.model = config.model || 'gpt-4o-mini'
  }

  async structure(transcript: string, promptTemplate: string, signal?: AbortSignal): Promise<string> {
    if (!this.config.apiKey) {
      throw new StructuringUnavailableError('OPENAI_API_KEY is not set')
    }

    let response: Response
    try {
      response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.config.apiKey}`,
        },
        body: JSON.stringify({
          model: this.model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: renderPrompt(promptTemplate, transcript) },
          ],
          temperature: this.config.temperature ?? 0.2,
          stream: true,
        }),
        signal,
      })
    } catch (error) {
      throw new StructuringUnavailableError(`Structuring request failed: ${errorMessage(error)}`, error)
    }

    if (!response.ok) {
      const body = await response.text()
      throw new StructuringUnavailableError(`Structuring API failed: ${response.status} ${body.slice(0, 200)}`)
    }
    if (!response.body) {
      throw new StructuringUnavailableError('Structuring API returned no body')
    }

    let fullText = ''
    let buffer = ''
    const decoder = new TextDecoder()
    const consume = (line: string) => {
      if (!line.startsWith('data: ')) return
      const data = line.slice(6).trim()
      if (!data || data === '[DONE]') return
      const chunk = parseChunk(data)
      for (const choice of chunk?.choices ?? []) {
        const text = choice.delta?.content
        if (text) fullText += text
      }
    }

    const reader = response.body.getReader()
    while (true) {
      const { done, value } = await reader.read()
      if (done) break
      buffer += decoder.decode(value, { stream: true })
      const lines = buffer.split('\n')
      buffer = lines.pop() ?? ''
      lines.forEach(consume)
    }
    consume(buffer + decoder.decode())

    return fullText
  }
}

function parseChunk(data: string): z.infer<typeof StreamChunkSchema> | undefined {
  try {
    const parsed = StreamChunkSchema.safeParse(JSON.parse(data))
    return parsed.success ? parsed.data : undefined
  } catch {
    console.warn(`[STRUCTURE] Ignoring unparsable stream chunk: ${data.slice(0, 80)}`)
    return undefined
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
