import { promises as fs } from 'fs'
import path from 'path'

import { HistoryEntrySchema, type HistoryEntry } from '../types'
import { isMissingFile } from './job-store'
import { Mutex } from './mutex'
import type { HistoryLog } from './types'

const DEFAULT_LIST_LIMIT = 50

/**
 * Append-only JSON-lines history at `<dataDir>/history.jsonl`.
 * Lines that fail validation are skipped on read, never rewritten.
 */
export class FileHistoryLog implements HistoryLog {
  private readonly filePath: string
  private readonly mutex = new Mutex()

  constructor(dataRoot: string = 'data') {
    this.filePath = path.join(path.resolve(dataRoot), 'history.jsonl')
  }

  async append(entry: HistoryEntry): Promise<void> {
    const line = JSON.stringify(HistoryEntrySchema.parse(entry))
    await this.mutex.runExclusive(async () => {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true })
      await fs.appendFile(this.filePath, `${line}\n`, 'utf-8')
    })
  }

  async list(options: { limit?: number; recordingId?: string } = {}): Promise<HistoryEntry[]> {
    const limit = options.limit ?? DEFAULT_LIST_LIMIT
    const entries = await this.mutex.runExclusive(() => this.readAll())
    return entries
      .filter(entry => !options.recordingId || entry.recordingId === options.recordingId)
      .reverse()
      .slice(0, limit)
  }

  async purge(before?: number): Promise<number> {
    return this.mutex.runExclusive(async () => {
      const entries = await this.readAll()
      const kept = before === undefined ? [] : entries.filter(entry => entry.timestamp >= before)
      const body = kept.map(entry => `${JSON.stringify(entry)}\n`).join('')
      const tmpPath = `${this.filePath}.tmp-${process.pid}-${Date.now()}`
      await fs.mkdir(path.dirname(this.filePath), { recursive: true })
      await fs.writeFile(tmpPath, body, 'utf-8')
      await fs.rename(tmpPath, this.filePath)
      return entries.length - kept.length
    })
  }

  private async readAll(): Promise<HistoryEntry[]> {
    let raw: string
    try {
      raw = await fs.readFile(this.filePath, 'utf-8')
    } catch (error) {
      if (isMissingFile(error)) return []
      throw error
    }

    const entries: HistoryEntry[] = []
    for (const line of raw.split('\n')) {
      if (!line.trim()) continue
      try {
        const parsed = HistoryEntrySchema.safeParse(JSON.parse(line))
        if (parsed.success) entries.push(parsed.data)
      } catch {
        console.warn(`[HISTORY] Skipping unreadable line in ${this.filePath}`)
      }
    }
    return entries
  }
}
