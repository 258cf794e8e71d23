import { promises as fs } from 'fs'

import { parseOutline } from '@/lib/renderer/parser'
import { outlineTitle } from '@/lib/renderer/outline'
import { MalformedOutlineError, PipelineError } from '../errors'
import type { RecordingJob } from '../types'
import { baseName } from '../utils/filename'
import { callUpstream, settle } from './retry'
import type { StageContext, StageExecutor, StageResult, StructuringService } from './types'

const CODE_FENCE_RE = /^```[\w-]*\n([\s\S]*?)\n```$/

/** Models often wrap the whole answer in a fenced block. */
export function unwrapFence(raw: string): string {
  const trimmed = raw.trim()
  const fenced = trimmed.match(CODE_FENCE_RE)
  return fenced ? fenced[1] : trimmed
}

export async function loadPromptTemplate(templatePath: string): Promise<string> {
  return fs.readFile(templatePath, 'utf-8')
}

export class StructureExecutor implements StageExecutor {
  readonly stage = 'structure'

  constructor(
    private readonly service: StructuringService,
    private readonly promptTemplate: string,
  ) {}

  run(job: RecordingJob, ctx: StageContext): Promise<StageResult> {
    return settle(async () => {
      const transcript = job.artifacts.transcript
      if (!transcript) {
        throw new PipelineError('Internal', 'No transcript artifact to structure', { code: 'MissingArtifact' })
      }

      const text = await ctx.artifacts.readText(transcript)
      ctx.log(`Structuring ${text.length} characters of transcript`)

      const raw = await callUpstream(ctx, 'Structuring', 'StructuringUnavailable', () =>
        this.service.structure(text, this.promptTemplate, ctx.signal),
      )

      // throws MalformedOutlineError; the transcript stays for a later reprocess
      const outlineText = unwrapFence(raw)
      const outline = parseOutline(outlineText)
      if (outline.blocks.length === 0) {
        throw new MalformedOutlineError('Structuring service returned no outline content', 1)
      }

      const written = await ctx.artifacts.write('outline', job.id, `${baseName(job.filename)}.md`, `${outlineText}\n`)
      ctx.log(`Outline accepted (${outline.blocks.length} blocks)`)
      return {
        title: job.title ?? outlineTitle(outline),
        artifacts: { outline: written },
      }
    })
  }
}
