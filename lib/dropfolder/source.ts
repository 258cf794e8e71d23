import { createHash } from 'crypto'
import { promises as fs } from 'fs'
import path from 'path'

import { SourceUnavailableError, TooLargeError } from '@/lib/pipeline/errors'
import { DEFAULT_MAX_AUDIO_BYTES } from '@/lib/pipeline/stages/download'
import type { ConnectionStatus, RecordingPage, RecordingSource } from '@/lib/pipeline/stages/types'
import type { RecordingSeed } from '@/lib/pipeline/types'
import { baseName, hasAudioExtension } from '@/lib/pipeline/utils/filename'

export const DEFAULT_SETTLE_MS = 10_000

export interface DropFolderConfig {
  dir: string
  /** A file counts as complete once it has not been modified for this long. */
  settleMs?: number
  maxBytes?: number
  pageSize?: number
  now?: () => number
}

interface DroppedFile {
  name: string
  filePath: string
  size: number
  mtimeMs: number
}

/** Stable recording id for a dropped file; safe as a path segment. */
export function dropFileId(name: string): string {
  return `drop-${createHash('sha256').update(name).digest('hex').slice(0, 16)}`
}

/**
 * Audio files copied into a local folder, for recordings that do not come
 * from the Plaud API. Files still being written are left for a later pass.
 */
export class DropFolderSource implements RecordingSource {
  private readonly dir: string
  private readonly settleMs: number
  private readonly maxBytes: number
  private readonly pageSize: number
  private readonly now: () => number

  constructor(config: DropFolderConfig) {
    this.dir = path.resolve(config.dir)
    this.settleMs = config.settleMs ?? DEFAULT_SETTLE_MS
    this.maxBytes = config.maxBytes ?? DEFAULT_MAX_AUDIO_BYTES
    this.pageSize = config.pageSize ?? 100
    this.now = config.now ?? Date.now
  }

  async listRecordings(page: number): Promise<RecordingPage> {
    const cutoff = this.now() - this.settleMs
    const ready: DroppedFile[] = []

    for (const file of await this.audioFiles()) {
      if (file.size === 0 || file.mtimeMs > cutoff) {
        continue
      }
      if (file.size > this.maxBytes) {
        console.warn(`[DROP] Ignoring ${file.name}: ${file.size} bytes (max ${this.maxBytes})`)
        continue
      }
      ready.push(file)
    }

    const start = page * this.pageSize
    const items: RecordingSeed[] = ready.slice(start, start + this.pageSize).map(file => ({
      id: dropFileId(file.name),
      filename: file.name,
      title: baseName(file.name),
      startTime: Math.floor(file.mtimeMs),
    }))
    return { items, nextPage: start + this.pageSize < ready.length ? page + 1 : null }
  }

  async download(id: string, options: { maxBytes: number; signal?: AbortSignal }): Promise<Uint8Array> {
    const file = (await this.audioFiles()).find(candidate => dropFileId(candidate.name) === id)
    if (!file) {
      throw new SourceUnavailableError(`No file for ${id} in ${this.dir}`)
    }
    if (file.size > options.maxBytes) {
      throw new TooLargeError(`Recording ${id} is ${file.size} bytes (max ${options.maxBytes})`)
    }
    return fs.readFile(file.filePath, { signal: options.signal })
  }

  async testConnection(): Promise<ConnectionStatus> {
    try {
      const count = (await this.audioFiles()).length
      return { ok: true, message: `Watching ${this.dir}. ${count} audio files present`, recordingCount: count }
    } catch (error) {
      return { ok: false, message: error instanceof Error ? error.message : String(error), recordingCount: 0 }
    }
  }

  /** Regular audio files in the folder, by name; symlinks and sub-directories are skipped. */
  private async audioFiles(): Promise<DroppedFile[]> {
    let entries: string[]
    try {
      entries = await fs.readdir(this.dir)
    } catch (error) {
      throw new SourceUnavailableError(`Cannot read drop folder ${this.dir}`, error)
    }

    const files: DroppedFile[] = []
    for (const name of entries.filter(hasAudioExtension).sort()) {
      const filePath = path.join(this.dir, name)
      try {
        const stats = await fs.lstat(filePath)
        if (!stats.isFile()) continue
        files.push({ name, filePath, size: stats.size, mtimeMs: stats.mtimeMs })
      } catch (error) {
        // removed between readdir and lstat
        console.warn(`[DROP] Could not stat ${name}:`, error)
      }
    }
    return files
  }
}
