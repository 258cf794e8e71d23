import { promises as fs } from 'fs'
import path from 'path'

import type { Artifact } from '../types'
import { assertSafeRecordingId } from '../utils/filename'
import { fingerprint } from '../utils/fingerprint'
import { isMissingFile } from './job-store'

export type ArtifactKind = 'audio' | 'transcript' | 'outline' | 'document'

const KIND_DIRS: Record<ArtifactKind, string> = {
  audio: 'files',
  transcript: 'transcripts',
  outline: 'outlines',
  document: 'documents',
}

/**
 * Local artifact files under the data directory, one sub-directory per kind
 * and one directory per recording id inside it.
 */
export class ArtifactStore {
  private readonly dataDir: string

  constructor(dataRoot: string = 'data') {
    this.dataDir = path.resolve(dataRoot)
  }

  pathFor(kind: ArtifactKind, jobId: string, filename: string): string {
    assertSafeRecordingId(jobId)
    const dir = path.join(this.dataDir, KIND_DIRS[kind], jobId)
    const target = path.resolve(dir, filename)
    if (!target.startsWith(dir + path.sep)) {
      throw new Error(`Artifact path escapes ${dir}: ${filename}`)
    }
    return target
  }

  async write(kind: ArtifactKind, jobId: string, filename: string, content: Uint8Array | string): Promise<Artifact> {
    const target = this.pathFor(kind, jobId, filename)
    const bytes = typeof content === 'string' ? Buffer.from(content, 'utf-8') : content
    await fs.mkdir(path.dirname(target), { recursive: true })
    const tmpPath = `${target}.partial`
    await fs.writeFile(tmpPath, bytes)
    await fs.rename(tmpPath, target)
    return {
      path: target,
      bytes: bytes.byteLength,
      fingerprint: fingerprint(bytes),
      createdAt: Date.now(),
    }
  }

  async read(artifact: Artifact): Promise<Buffer> {
    return fs.readFile(artifact.path)
  }

  async readText(artifact: Artifact): Promise<string> {
    return fs.readFile(artifact.path, 'utf-8')
  }

  /** True when the file exists with the recorded size and fingerprint. */
  async verify(artifact: Artifact | undefined): Promise<boolean> {
    if (!artifact) return false
    try {
      const content = await fs.readFile(artifact.path)
      return content.byteLength === artifact.bytes && fingerprint(content) === artifact.fingerprint
    } catch (error) {
      if (isMissingFile(error)) return false
      throw error
    }
  }

  async remove(artifact: Artifact | undefined): Promise<boolean> {
    if (!artifact) return false
    try {
      await fs.rm(artifact.path, { force: true })
      return true
    } catch (error) {
      console.warn(`[ARTIFACTS] Failed to remove ${artifact.path}:`, error)
      return false
    }
  }
}
