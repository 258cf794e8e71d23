import { describe, it, beforeEach, afterEach, expect } from 'vitest'
import { MockAgent, getGlobalDispatcher, setGlobalDispatcher, type Dispatcher } from 'undici'

import {
  AssemblyAIEngine,
  OpenAIStructuringService,
  PipelineError,
  SourceUnavailableError,
  StructuringUnavailableError,
  TooLargeError,
} from '@/lib/pipeline'
import { formatTranscriptWithSpeakers } from '@/lib/pipeline/assemblyai/client'
import { renderPrompt } from '@/lib/pipeline/openai/client'
import { formatSegments } from '@/lib/pipeline/whisper/engine'
import { PlaudClient } from '@/lib/plaud/client'

const PLAUD_ORIGIN = 'https://api.plaud.test'
const listPath = (path: string) => path.startsWith('/file/simple/web')

describe('HTTP clients', () => {
  let agent: MockAgent
  let original: Dispatcher

  beforeEach(() => {
    original = getGlobalDispatcher()
    agent = new MockAgent()
    agent.disableNetConnect()
    setGlobalDispatcher(agent)
  })

  afterEach(async () => {
    setGlobalDispatcher(original)
    await agent.close()
  })

  describe('PlaudClient', () => {
    const client = () => new PlaudClient({ token: 'test-token', baseUrl: PLAUD_ORIGIN, pageSize: 2 })

    it('lists a page of recordings', async () => {
      agent
        .get(PLAUD_ORIGIN)
        .intercept({ path: listPath, method: 'GET' })
        .reply(200, {
          status: 0,
          data_file_total: 3,
          data_file_list: [
            { id: 'a', filename: 'Standup', start_time: 1_000, duration: 60_000 },
            { id: 'b', filename: '' },
          ],
        })

      const page = await client().listRecordings(0)

      expect(page).toEqual({
        items: [
          { id: 'a', filename: 'Standup', title: 'Standup', startTime: 1_000, durationMs: 60_000 },
          { id: 'b', filename: 'b', title: undefined, startTime: undefined, durationMs: undefined },
        ],
        nextPage: 1,
      })
    })

    it('follows a region redirect', async () => {
      agent
        .get(PLAUD_ORIGIN)
        .intercept({ path: listPath, method: 'GET' })
        .reply(200, { status: -302, data: { domains: { api: 'https://api-eu.plaud.test' } } })
      agent
        .get('https://api-eu.plaud.test')
        .intercept({ path: listPath, method: 'GET' })
        .reply(200, { status: 0, data_file_total: 0, data_file_list: [] })

      const plaud = client()
      const page = await plaud.listRecordings(0)

      expect(page).toEqual({ items: [], nextPage: null })
      expect(plaud.currentBaseUrl).toBe('https://api-eu.plaud.test')
    })

    it('reports a rejected token as source unavailable', async () => {
      agent.get(PLAUD_ORIGIN).intercept({ path: listPath, method: 'GET' }).reply(401, {})

      const listing = client().listRecordings(0)
      await expect(listing).rejects.toBeInstanceOf(SourceUnavailableError)
      await expect(listing).rejects.toThrow('Token rejected (401), expired or invalid')
    })

    it('checks the connection with a one-item listing', async () => {
      agent
        .get(PLAUD_ORIGIN)
        .intercept({ path: listPath, method: 'GET' })
        .reply(200, { status: 0, data_file_total: 5, data_file_list: [] })

      expect(await client().testConnection()).toEqual({
        ok: true,
        message: 'Connected to Plaud. 5 recordings available',
        recordingCount: 5,
      })
    })

    it('reports a failed connection check without throwing', async () => {
      agent.get(PLAUD_ORIGIN).intercept({ path: listPath, method: 'GET' }).reply(401, {})

      expect(await client().testConnection()).toEqual({
        ok: false,
        message: 'Token rejected (401), expired or invalid',
        recordingCount: 0,
      })
    })

    it('downloads audio bytes', async () => {
      agent
        .get(PLAUD_ORIGIN)
        .intercept({ path: '/file/download/a', method: 'GET' })
        .reply(200, Buffer.from('abcd'), { headers: { 'content-type': 'audio/mpeg' } })

      const bytes = await client().download('a', { maxBytes: 10 })

      expect(Buffer.from(bytes).toString('utf-8')).toBe('abcd')
    })

    it('stops downloads above the size cap', async () => {
      agent
        .get(PLAUD_ORIGIN)
        .intercept({ path: '/file/download/a', method: 'GET' })
        .reply(200, Buffer.from('abcd'), { headers: { 'content-type': 'audio/mpeg' } })

      await expect(client().download('a', { maxBytes: 3 })).rejects.toBeInstanceOf(TooLargeError)
    })

    it('turns a JSON error body into a failure', async () => {
      agent
        .get(PLAUD_ORIGIN)
        .intercept({ path: '/file/download/a', method: 'GET' })
        .reply(200, { status: 1, msg: 'file not found' }, { headers: { 'content-type': 'application/json' } })

      await expect(client().download('a', { maxBytes: 10 })).rejects.toThrow(
        'Download of a returned status 1 (file not found)',
      )
    })
  })

  describe('OpenAIStructuringService', () => {
    const service = () =>
      new OpenAIStructuringService({ apiKey: 'test-key', baseUrl: 'https://llm.test/v1', model: 'test-model' })

    it('collects the streamed answer', async () => {
      agent
        .get('https://llm.test')
        .intercept({ path: '/v1/chat/completions', method: 'POST' })
        .reply(
          200,
          [
            'data: {"choices":[{"delta":{"role":"assistant"}}]}',
            'data: {"choices":[{"delta":{"content":"# Ti"}}]}',
            'data: {"choices":[{"delta":{"content":"tle"}}]}',
            'data: [DONE]',
            '',
          ].join('\n\n'),
          { headers: { 'content-type': 'text/event-stream' } },
        )

      expect(await service().structure('transcript', 'Template {{transcript}}')).toBe('# Title')
    })

    it('reports HTTP failures as structuring unavailable', async () => {
      agent
        .get('https://llm.test')
        .intercept({ path: '/v1/chat/completions', method: 'POST' })
        .reply(429, 'rate limited')

      const structuring = service().structure('transcript', 'Template')
      await expect(structuring).rejects.toBeInstanceOf(StructuringUnavailableError)
      await expect(structuring).rejects.toThrow('Structuring API failed: 429 rate limited')
    })

    it('requires an API key', async () => {
      const unconfigured = new OpenAIStructuringService({ apiKey: '' })
      await expect(unconfigured.structure('t', 'p')).rejects.toThrow('OPENAI_API_KEY is not set')
    })
  })

  describe('AssemblyAIEngine', () => {
    const engine = () =>
      new AssemblyAIEngine({ apiKey: 'test-key', baseUrl: 'https://stt.test/v2', pollIntervalMs: 0 })

    it('uploads, polls and formats speakers', async () => {
      const pool = agent.get('https://stt.test')
      pool.intercept({ path: '/v2/upload', method: 'POST' }).reply(200, { upload_url: 'https://cdn.test/a' })
      pool.intercept({ path: '/v2/transcript', method: 'POST' }).reply(200, { id: 't1', status: 'processing' })
      pool.intercept({ path: '/v2/transcript/t1', method: 'GET' }).reply(200, {
        id: 't1',
        status: 'completed',
        utterances: [
          { speaker: 'A', text: 'Hello', start: 0, end: 1 },
          { speaker: 'B', text: 'Hi', start: 1, end: 2 },
        ],
      })

      expect(await engine().transcribe(new Uint8Array([1, 2]), 'en')).toBe('[Speaker A]:\nHello\n\n[Speaker B]:\nHi\n')
    })

    it('classifies server errors as transient', async () => {
      agent.get('https://stt.test').intercept({ path: '/v2/upload', method: 'POST' }).reply(503, 'busy')

      const transcription = engine().transcribe(new Uint8Array([1]))
      await expect(transcription).rejects.toBeInstanceOf(PipelineError)
      await expect(transcription).rejects.toMatchObject({ kind: 'TransientIO', code: 'HTTP503' })
    })
  })
})

describe('transcript formatting', () => {
  it('prefixes whisper segments with their start time', () => {
    expect(
      formatSegments({
        text: 'ignored',
        segments: [
          { start: 0, end: 2, text: ' Hello ' },
          { start: 75.6, end: 80, text: 'Later' },
          { start: 80, end: 81, text: '  ' },
        ],
      }),
    ).toBe('[00:00] Hello\n[01:15] Later')
  })

  it('falls back to the plain whisper text', () => {
    expect(formatSegments({ text: ' Just text ', segments: [] })).toBe('Just text')
  })

  it('groups consecutive utterances of one speaker', () => {
    expect(
      formatTranscriptWithSpeakers([
        { speaker: 'A', text: 'One', start: 0, end: 1 },
        { speaker: 'A', text: 'Two', start: 1, end: 2 },
      ]),
    ).toBe('[Speaker A]:\nOne\nTwo\n')
  })
})

describe('renderPrompt', () => {
  it('fills the transcript placeholder', () => {
    expect(renderPrompt('Before {{transcript}} after', 'TEXT')).toBe('Before TEXT after')
  })

  it('appends the transcript when the template has no placeholder', () => {
    expect(renderPrompt('Summarize this.\n', 'TEXT')).toBe('Summarize this.\n\n## Transcript\nTEXT')
  })
})
