import { describe, it, beforeEach, afterEach, expect } from 'vitest'
import { readFile } from 'fs/promises'
import path from 'path'

import {
  DownloadExecutor,
  PublishExecutor,
  SourceUnavailableError,
  StructureExecutor,
  TranscribeExecutor,
  unwrapFence,
  type RecordingJob,
  type StageResult,
  type TranscriptionEngine,
} from '@/lib/pipeline'
import { fingerprint } from '@/lib/pipeline/utils/fingerprint'
import { outlineFingerprint, parseOutline } from '@/lib/renderer'
import {
  FakeEngine,
  FakeSource,
  FakeStructuring,
  MemoryStorage,
  OUTLINE_TEXT,
  PROMPT_TEMPLATE,
  TRANSCRIPT_TEXT,
  makeJob,
  makeTempDir,
  removeDir,
  stageContext,
} from './helpers/fakes'

function delta(result: StageResult) {
  if (!result.ok) throw new Error(`expected success, got ${result.failure.kind}: ${result.failure.message}`)
  return result.delta
}

function failure(result: StageResult) {
  if (result.ok) throw new Error('expected a failure')
  return result.failure
}

describe('stage executors', () => {
  let dataDir: string

  beforeEach(async () => {
    dataDir = await makeTempDir('scribeflow-stages-')
  })

  afterEach(async () => {
    await removeDir(dataDir)
  })

  /** A job that has been through download and transcribe. */
  async function transcribedJob(): Promise<RecordingJob> {
    const { ctx } = stageContext(dataDir)
    const audio = await ctx.artifacts.write('audio', 'rec-1', 'Team sync.mp3', new Uint8Array([1, 2, 3]))
    const written = await ctx.artifacts.write('transcript', 'rec-1', 'Team sync.txt', TRANSCRIPT_TEXT)
    return makeJob({
      status: 'transcribed',
      artifacts: {
        audio,
        transcript: { ...written, sourceFingerprint: audio.fingerprint, chars: TRANSCRIPT_TEXT.length },
      },
    })
  }

  describe('DownloadExecutor', () => {
    it('stores the audio under a sanitized filename', async () => {
      const source = new FakeSource()
      const { ctx } = stageContext(dataDir)

      const result = delta(await new DownloadExecutor(source, 1024).run(makeJob({ filename: '../../etc/Team:sync' }), ctx))

      expect(result.filename).toBe('Teamsync.mp3')
      expect(result.artifacts.audio?.path).toBe(path.join(dataDir, 'files', 'rec-1', 'Teamsync.mp3'))
      expect(result.artifacts.audio?.bytes).toBe(8)
      expect(result.artifacts.audio?.fingerprint).toBe(fingerprint(source.audio))
      expect(source.downloads).toEqual(['rec-1'])
    })

    it('rejects audio over the size cap', async () => {
      const source = new FakeSource()
      const { ctx } = stageContext(dataDir)

      const result = failure(await new DownloadExecutor(source, 4).run(makeJob(), ctx))

      expect(result.kind).toBe('ResourceLimit')
      expect(result.code).toBe('TooLarge')
      expect(result.message).toBe('Recording is 8 bytes (max 4)')
    })

    it('retries transient source failures with backoff', async () => {
      const source = new FakeSource()
      source.failures = [new SourceUnavailableError('gateway hiccup')]
      const { ctx, lines } = stageContext(dataDir, { retries: 1, baseDelayMs: 1 })

      delta(await new DownloadExecutor(source, 1024).run(makeJob(), ctx))

      expect(source.downloads).toHaveLength(2)
      expect(lines).toContain('Download failed (gateway hiccup), retrying in 1ms')
    })

    it('gives up once the retries are spent', async () => {
      const source = new FakeSource()
      source.failures = [new SourceUnavailableError('down'), new SourceUnavailableError('still down')]
      const { ctx } = stageContext(dataDir, { retries: 1, baseDelayMs: 0 })

      const result = failure(await new DownloadExecutor(source, 1024).run(makeJob(), ctx))

      expect(result.kind).toBe('SourceUnavailable')
      expect(result.message).toBe('still down')
    })
  })

  describe('TranscribeExecutor', () => {
    it('records the fingerprint of the audio it came from', async () => {
      const engine = new FakeEngine()
      engine.text = `  ${TRANSCRIPT_TEXT}\n`
      const { ctx } = stageContext(dataDir)
      const audio = await ctx.artifacts.write('audio', 'rec-1', 'Team sync.mp3', new Uint8Array([9, 9]))

      const result = delta(
        await new TranscribeExecutor(engine, { language: 'de' }).run(makeJob({ artifacts: { audio } }), ctx),
      )

      const transcript = result.artifacts.transcript
      expect(transcript?.sourceFingerprint).toBe(audio.fingerprint)
      expect(transcript?.chars).toBe(TRANSCRIPT_TEXT.length)
      expect(transcript && (await readFile(transcript.path, 'utf-8'))).toBe(TRANSCRIPT_TEXT)
      expect(engine.calls).toEqual([{ bytes: 2, language: 'de' }])
    })

    it('hands the stage abort signal to the engine', async () => {
      const signals: Array<AbortSignal | undefined> = []
      const engine: TranscriptionEngine = {
        async transcribe(_audio, _language, signal) {
          signals.push(signal)
          return TRANSCRIPT_TEXT
        },
      }
      const { ctx } = stageContext(dataDir)
      const audio = await ctx.artifacts.write('audio', 'rec-1', 'Team sync.mp3', new Uint8Array([4]))

      delta(await new TranscribeExecutor(engine).run(makeJob({ artifacts: { audio } }), ctx))

      expect(signals).toEqual([ctx.signal])
    })

    it('fails instead of truncating a long transcript', async () => {
      const engine = new FakeEngine()
      engine.text = 'x'.repeat(11)
      const { ctx } = stageContext(dataDir)
      const audio = await ctx.artifacts.write('audio', 'rec-1', 'Team sync.mp3', new Uint8Array([1]))

      const result = failure(
        await new TranscribeExecutor(engine, { maxTranscriptChars: 10 }).run(makeJob({ artifacts: { audio } }), ctx),
      )

      expect(result.code).toBe('TooLarge')
      expect(result.message).toBe('Transcript is 11 characters (max 10)')
    })

    it('fails without an audio artifact', async () => {
      const { ctx } = stageContext(dataDir)

      const result = failure(await new TranscribeExecutor(new FakeEngine()).run(makeJob(), ctx))

      expect(result.kind).toBe('Internal')
      expect(result.code).toBe('MissingArtifact')
    })
  })

  describe('StructureExecutor', () => {
    it('stores the validated outline text and derives the title', async () => {
      const structuring = new FakeStructuring()
      structuring.outline = '```markdown\n# Quarterly plan\n\nBody text\n```'
      const { ctx } = stageContext(dataDir)

      const result = delta(await new StructureExecutor(structuring, PROMPT_TEMPLATE).run(await transcribedJob(), ctx))

      expect(result.title).toBe('Quarterly plan')
      const outline = result.artifacts.outline
      expect(outline?.path).toBe(path.join(dataDir, 'outlines', 'rec-1', 'Team sync.md'))
      expect(outline && (await readFile(outline.path, 'utf-8'))).toBe('# Quarterly plan\n\nBody text\n')
      expect(structuring.prompts).toEqual([`Structure this transcript:\n\n${TRANSCRIPT_TEXT}`])
    })

    it('reports a malformed outline and writes nothing', async () => {
      const structuring = new FakeStructuring()
      structuring.outline = 'a|b\n--|--\nc'
      const { ctx } = stageContext(dataDir)

      const result = failure(await new StructureExecutor(structuring, PROMPT_TEMPLATE).run(await transcribedJob(), ctx))

      expect(result.kind).toBe('MalformedOutline')
      expect(result.message).toBe('Table row has 1 cell(s), header has 2 (line 3)')
    })

    it('treats an empty answer as malformed', async () => {
      const structuring = new FakeStructuring()
      structuring.outline = '   '
      const { ctx } = stageContext(dataDir)

      const result = failure(await new StructureExecutor(structuring, PROMPT_TEMPLATE).run(await transcribedJob(), ctx))

      expect(result.kind).toBe('MalformedOutline')
    })
  })

  describe('PublishExecutor', () => {
    async function structuredJob(): Promise<RecordingJob> {
      const job = await transcribedJob()
      const { ctx } = stageContext(dataDir)
      const outline = await ctx.artifacts.write('outline', 'rec-1', 'Team sync.md', `${OUTLINE_TEXT}\n`)
      return { ...job, status: 'structured', artifacts: { ...job.artifacts, outline } }
    }

    it('uploads document, audio and transcript into their folders', async () => {
      const storage = new MemoryStorage()
      const { ctx } = stageContext(dataDir)
      const job = await structuredJob()

      const result = delta(await new PublishExecutor(storage, 'ScribeFlow').run(job, ctx))

      expect([...storage.folders.keys()].sort()).toEqual(['ScribeFlow/Documents', 'ScribeFlow/Recordings'])
      expect(storage.uploads.map(upload => upload.filename)).toEqual(['Team sync.docx', 'Team sync.mp3', 'Team sync.txt'])
      expect(storage.uploads[0].fingerprint).toBe(outlineFingerprint(parseOutline(OUTLINE_TEXT)))
      expect(storage.uploads[1].fingerprint).toBe(job.artifacts.audio?.fingerprint)
      expect(result.artifacts.published).toMatchObject({
        documentId: 'object-1',
        audioId: 'object-2',
        transcriptId: 'object-3',
        skipped: [],
      })
      expect(result.artifacts.document?.path).toBe(path.join(dataDir, 'documents', 'rec-1', 'Team sync.docx'))
    })

    it('skips objects whose fingerprint is already stored', async () => {
      const storage = new MemoryStorage()
      const executor = new PublishExecutor(storage, 'ScribeFlow')
      const job = await structuredJob()

      delta(await executor.run(job, stageContext(dataDir).ctx))
      const second = delta(await executor.run(job, stageContext(dataDir).ctx))

      expect(storage.uploads).toHaveLength(3)
      expect(second.artifacts.published).toMatchObject({
        documentId: 'object-1',
        audioId: 'object-2',
        transcriptId: 'object-3',
        skipped: ['document', 'audio', 'transcript'],
      })
    })

    it('leaves the audio out when it is no longer kept locally', async () => {
      const storage = new MemoryStorage()
      const { ctx, lines } = stageContext(dataDir)
      const job = await structuredJob()
      const withoutAudio: RecordingJob = {
        ...job,
        artifacts: {
          ...job.artifacts,
          audio: undefined,
          published: { documentId: 'old-doc', audioId: 'old-audio', transcriptId: 'old-txt', skipped: [], publishedAt: 1 },
        },
      }

      const result = delta(await new PublishExecutor(storage, 'ScribeFlow').run(withoutAudio, ctx))

      expect(storage.uploads.map(upload => upload.filename)).toEqual(['Team sync.docx', 'Team sync.txt'])
      expect(result.artifacts.published).toMatchObject({
        documentId: 'object-1',
        audioId: 'old-audio',
        transcriptId: 'object-2',
        skipped: [],
      })
      expect(lines).toContain('No local audio for Team sync.mp3, audio upload left out')
    })

    it('fails without an outline', async () => {
      const { ctx } = stageContext(dataDir)

      const result = failure(await new PublishExecutor(new MemoryStorage(), 'ScribeFlow').run(await transcribedJob(), ctx))

      expect(result.code).toBe('MissingArtifact')
    })
  })
})

describe('unwrapFence', () => {
  it('strips one surrounding code fence', () => {
    expect(unwrapFence('```md\n# A\n```')).toBe('# A')
    expect(unwrapFence('  # A\n')).toBe('# A')
    expect(unwrapFence('# A\n```js\nx\n```')).toBe('# A\n```js\nx\n```')
  })
})
