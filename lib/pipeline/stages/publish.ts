import { outlineFingerprint, renderDocument } from '@/lib/renderer/docx'
import { outlineTitle } from '@/lib/renderer/outline'
import { parseOutline } from '@/lib/renderer/parser'
import { PipelineError } from '../errors'
import type { Artifact, PublishedObjects, RecordingJob } from '../types'
import { baseName } from '../utils/filename'
import { callUpstream, settle } from './retry'
import type { RemoteStorage, StageContext, StageExecutor, StageResult } from './types'

export const DOCUMENTS_FOLDER = 'Documents'
export const RECORDINGS_FOLDER = 'Recordings'

type UploadKind = PublishedObjects['skipped'][number]

function requireArtifact(artifact: Artifact | undefined, kind: string): Artifact {
  if (!artifact) {
    throw new PipelineError('Internal', `No ${kind} artifact to publish`, { code: 'MissingArtifact' })
  }
  return artifact
}

/**
 * Renders the outline, stores the document locally, then uploads document,
 * audio and transcript. An object whose fingerprint is already present in
 * the target folder is not uploaded again and is reported as skipped.
 * Audio that is no longer kept locally is left out; an earlier upload of it
 * stays recorded.
 */
export class PublishExecutor implements StageExecutor {
  readonly stage = 'publish'

  constructor(
    private readonly storage: RemoteStorage,
    private readonly rootFolder: string,
  ) {}

  run(job: RecordingJob, ctx: StageContext): Promise<StageResult> {
    return settle(async () => {
      const transcript = requireArtifact(job.artifacts.transcript, 'transcript')
      const outlineArtifact = requireArtifact(job.artifacts.outline, 'outline')

      const outline = parseOutline(await ctx.artifacts.readText(outlineArtifact))
      const base = baseName(job.filename)
      const bytes = await renderDocument(outline, {
        title: job.title ?? outlineTitle(outline) ?? base,
        description: `Recording ${job.id}`,
      })
      const document = await ctx.artifacts.write('document', job.id, `${base}.docx`, bytes)
      ctx.log(`Rendered ${document.bytes} byte document`)

      const [documentsId, recordingsId] = await Promise.all([
        this.folder(ctx, DOCUMENTS_FOLDER),
        this.folder(ctx, RECORDINGS_FOLDER),
      ])

      const skipped: UploadKind[] = []
      const upload = async (kind: UploadKind, folderId: string, filename: string, content: Uint8Array, fp: string) => {
        const existing = await callUpstream(ctx, 'Listing remote folder', 'StorageUnavailable', () =>
          this.storage.listExisting(folderId),
        )
        const found = existing.get(fp)
        if (found) {
          ctx.log(`Skipped ${kind} upload, ${filename} already stored as ${found}`)
          skipped.push(kind)
          return found
        }
        const objectId = await callUpstream(ctx, `Uploading ${kind}`, 'StorageUnavailable', () =>
          this.storage.upload(folderId, filename, content, fp),
        )
        ctx.log(`Uploaded ${filename} (${objectId})`)
        return objectId
      }

      // the rendered bytes carry timestamps, so the document is keyed by its outline
      const documentId = await upload('document', documentsId, `${base}.docx`, bytes, outlineFingerprint(outline))
      const audio = job.artifacts.audio
      let audioId = job.artifacts.published?.audioId
      if (audio && (await ctx.artifacts.verify(audio))) {
        audioId = await upload('audio', recordingsId, job.filename, await ctx.artifacts.read(audio), audio.fingerprint)
      } else {
        ctx.log(`No local audio for ${job.filename}, audio upload left out`)
      }
      const transcriptId = await upload(
        'transcript',
        recordingsId,
        `${base}.txt`,
        await ctx.artifacts.read(transcript),
        transcript.fingerprint,
      )

      return {
        artifacts: {
          document,
          published: { documentId, audioId, transcriptId, skipped, publishedAt: Date.now() },
        },
      }
    })
  }

  private folder(ctx: StageContext, name: string): Promise<string> {
    const folderPath = [this.rootFolder, name].filter(Boolean).join('/')
    return callUpstream(ctx, `Resolving ${folderPath}`, 'StorageUnavailable', () => this.storage.ensureFolder(folderPath))
  }
}
