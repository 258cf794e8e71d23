import { fetch, type Response } from 'undici'
import { z } from 'zod'

import { SourceUnavailableError, TooLargeError } from '@/lib/pipeline/errors'
import type { ConnectionStatus, RecordingPage, RecordingSource } from '@/lib/pipeline/stages/types'
import type { RecordingSeed } from '@/lib/pipeline/types'

export const DEFAULT_PLAUD_BASE_URL = 'https://api.plaud.ai'
const MAX_REGION_REDIRECTS = 2

const PlaudRecordingSchema = z.object({
  id: z.string().min(1),
  filename: z.string().default(''),
  duration: z.number().optional(),
  start_time: z.number().optional(),
})

const PlaudEnvelopeSchema = z
  .object({
    status: z.number(),
    msg: z.string().optional(),
    data: z.object({ domains: z.object({ api: z.string().optional() }).optional() }).passthrough().optional(),
  })
  .passthrough()

const PlaudListSchema = z.object({
  status: z.number(),
  data_file_total: z.number().optional(),
  data_file_list: z.array(PlaudRecordingSchema).default([]),
})

export interface PlaudConfig {
  token: string
  baseUrl?: string
  pageSize?: number
}

/**
 * Client for the Plaud web API.
 *
 * Regional endpoints may answer `status: -302` with the domain to use
 * instead; the client switches its base URL and repeats the call.
 */
export class PlaudClient implements RecordingSource {
  private baseUrl: string
  private readonly authorization: string
  private readonly pageSize: number

  constructor(config: PlaudConfig) {
    const token = config.token.trim()
    // tokens copied from the web app already carry the scheme
    this.authorization = /^bearer /i.test(token) ? token : `bearer ${token}`
    this.baseUrl = (config.baseUrl || DEFAULT_PLAUD_BASE_URL).replace(/\/$/, '')
    this.pageSize = config.pageSize ?? 100
  }

  get currentBaseUrl(): string {
    return this.baseUrl
  }

  async listRecordings(page: number): Promise<RecordingPage> {
    const query = new URLSearchParams({
      skip: String(page * this.pageSize),
      limit: String(this.pageSize),
      is_trash: '0',
      sort_by: 'start_time',
      is_desc: 'true',
    })
    const body = await this.getJson(`/file/simple/web?${query}`)
    const parsed = PlaudListSchema.safeParse(body)
    if (!parsed.success || parsed.data.status !== 0) {
      throw new SourceUnavailableError(`Unexpected recording list response: ${describe(body)}`)
    }

    const items: RecordingSeed[] = parsed.data.data_file_list.map(item => ({
      id: item.id,
      filename: item.filename || item.id,
      title: item.filename || undefined,
      startTime: item.start_time,
      durationMs: item.duration,
    }))
    const seen = page * this.pageSize + items.length
    const total = parsed.data.data_file_total
    const more = total !== undefined ? seen < total : items.length === this.pageSize
    return { items, nextPage: more && items.length > 0 ? page + 1 : null }
  }

  async download(id: string, options: { maxBytes: number; signal?: AbortSignal }): Promise<Uint8Array> {
    for (let redirects = 0; ; redirects++) {
      const response = await this.request(`/file/download/${encodeURIComponent(id)}`, options.signal)

      if ((response.headers.get('content-type') || '').includes('application/json')) {
        const body: unknown = await response.json()
        if (this.followRegionRedirect(body) && redirects < MAX_REGION_REDIRECTS) continue
        throw new SourceUnavailableError(`Download of ${id} returned ${describe(body)}`)
      }

      const declared = Number.parseInt(response.headers.get('content-length') || '', 10)
      if (Number.isFinite(declared) && declared > options.maxBytes) {
        throw new TooLargeError(`Recording ${id} is ${declared} bytes (max ${options.maxBytes})`)
      }
      return readCapped(response, options.maxBytes, id)
    }
  }

  async testConnection(): Promise<ConnectionStatus> {
    try {
      const body = await this.getJson('/file/simple/web?skip=0&limit=1&is_trash=0')
      const parsed = PlaudListSchema.safeParse(body)
      if (!parsed.success || parsed.data.status !== 0) {
        return { ok: false, message: `API error: ${describe(body)}`, recordingCount: 0 }
      }
      const count = parsed.data.data_file_total ?? parsed.data.data_file_list.length
      return { ok: true, message: `Connected to Plaud. ${count} recordings available`, recordingCount: count }
    } catch (error) {
      return { ok: false, message: error instanceof Error ? error.message : String(error), recordingCount: 0 }
    }
  }

  private async getJson(pathAndQuery: string): Promise<unknown> {
    for (let redirects = 0; ; redirects++) {
      const response = await this.request(pathAndQuery)
      let body: unknown
      try {
        body = await response.json()
      } catch (error) {
        throw new SourceUnavailableError(`Invalid JSON from ${pathAndQuery}`, error)
      }
      if (this.followRegionRedirect(body) && redirects < MAX_REGION_REDIRECTS) continue
      return body
    }
  }

  private async request(pathAndQuery: string, signal?: AbortSignal): Promise<Response> {
    let response: Response
    try {
      response = await fetch(`${this.baseUrl}${pathAndQuery}`, {
        headers: { Authorization: this.authorization },
        signal,
      })
    } catch (error) {
      throw new SourceUnavailableError(`Cannot reach ${this.baseUrl}`, error)
    }

    if (response.status === 401 || response.status === 403) {
      throw new SourceUnavailableError(`Token rejected (${response.status}), expired or invalid`)
    }
    if (!response.ok) {
      throw new SourceUnavailableError(`Plaud API error: ${response.status} ${response.statusText}`)
    }
    return response
  }

  private followRegionRedirect(body: unknown): boolean {
    const parsed = PlaudEnvelopeSchema.safeParse(body)
    if (!parsed.success || parsed.data.status !== -302) return false
    const domain = parsed.data.data?.domains?.api
    if (!domain) return false
    console.log(`[PLAUD] Region redirect: ${this.baseUrl} → ${domain}`)
    this.baseUrl = domain.replace(/\/$/, '')
    return true
  }
}

async function readCapped(response: Response, maxBytes: number, id: string): Promise<Uint8Array> {
  if (!response.body) {
    throw new SourceUnavailableError(`Download of ${id} returned an empty body`)
  }

  const chunks: Uint8Array[] = []
  let total = 0
  const reader = response.body.getReader()
  while (true) {
    const { done, value } = await reader.read()
    if (done) break
    total += value.byteLength
    if (total > maxBytes) {
      await reader.cancel()
      throw new TooLargeError(`Recording ${id} exceeds ${maxBytes} bytes`)
    }
    chunks.push(value)
  }
  return Buffer.concat(chunks, total)
}

function describe(body: unknown): string {
  const parsed = PlaudEnvelopeSchema.safeParse(body)
  if (parsed.success) return `status ${parsed.data.status}${parsed.data.msg ? ` (${parsed.data.msg})` : ''}`
  return 'an unrecognised payload'
}
