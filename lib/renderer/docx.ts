import {
  AlignmentType,
  Document,
  ExternalHyperlink,
  HeadingLevel as DocxHeadingLevel,
  LevelFormat,
  Packer,
  Paragraph,
  ShadingType,
  Table,
  TableCell,
  TableRow,
  TextRun,
  WidthType,
} from 'docx'

import { fingerprint } from '@/lib/pipeline/utils/fingerprint'
import { MAX_LIST_DEPTH, type Block, type HeadingLevel, type InlineRun, type Outline } from './outline'

export const BULLET_REFERENCE = 'outline-bullets'
export const NUMBERED_REFERENCE = 'outline-numbered'

const INDENT_STEP_TWIPS = 360
const BULLET_GLYPHS = ['•', '◦', '▪'] as const
const HEADER_FILL = 'D9E2F3'

export interface RenderOptions {
  title?: string
  description?: string
}

function headingStyle(level: HeadingLevel) {
  switch (level) {
    case 1:
      return DocxHeadingLevel.HEADING_1
    case 2:
      return DocxHeadingLevel.HEADING_2
    case 3:
      return DocxHeadingLevel.HEADING_3
    case 4:
      return DocxHeadingLevel.HEADING_4
    case 5:
      return DocxHeadingLevel.HEADING_5
    case 6:
      return DocxHeadingLevel.HEADING_6
  }
}

function runChildren(runs: InlineRun[]): Array<TextRun | ExternalHyperlink> {
  return runs.map(run => {
    switch (run.type) {
      case 'text':
        return new TextRun({ text: run.text })
      case 'bold':
        return new TextRun({ text: run.text, bold: true })
      case 'italic':
        return new TextRun({ text: run.text, italics: true })
      case 'link':
        return new ExternalHyperlink({
          link: run.href,
          children: [new TextRun({ text: run.text, style: 'Hyperlink' })],
        })
    }
  })
}

function listLevels(ordered: boolean) {
  return Array.from({ length: MAX_LIST_DEPTH + 1 }, (_, level) => ({
    level,
    format: ordered ? LevelFormat.DECIMAL : LevelFormat.BULLET,
    text: ordered ? `%${level + 1}.` : BULLET_GLYPHS[level % BULLET_GLYPHS.length],
    alignment: AlignmentType.LEFT,
    style: {
      paragraph: {
        indent: { left: INDENT_STEP_TWIPS * (level + 1), hanging: INDENT_STEP_TWIPS },
      },
    },
  }))
}

function renderTable(rows: InlineRun[][][]): Table {
  return new Table({
    width: { size: 100, type: WidthType.PERCENTAGE },
    rows: rows.map(
      (cells, rowIndex) =>
        new TableRow({
          tableHeader: rowIndex === 0,
          children: cells.map(
            runs =>
              new TableCell({
                children: [new Paragraph({ children: runChildren(runs) })],
                shading:
                  rowIndex === 0
                    ? { type: ShadingType.CLEAR, color: 'auto', fill: HEADER_FILL }
                    : undefined,
              }),
          ),
        }),
    ),
  })
}

function renderBlocks(blocks: Block[]): Array<Paragraph | Table> {
  const children: Array<Paragraph | Table> = []
  // each contiguous run of ordered items restarts at 1
  let listInstance = 0
  let inList = false

  for (const block of blocks) {
    if (block.type !== 'list_item' && inList) {
      inList = false
    }

    switch (block.type) {
      case 'heading':
        children.push(new Paragraph({ heading: headingStyle(block.level), children: runChildren(block.runs) }))
        break
      case 'paragraph':
        children.push(new Paragraph({ children: runChildren(block.runs) }))
        break
      case 'list_item':
        if (!inList) {
          listInstance++
          inList = true
        }
        children.push(
          new Paragraph({
            numbering: {
              reference: block.ordered ? NUMBERED_REFERENCE : BULLET_REFERENCE,
              level: block.depth,
              instance: block.ordered ? listInstance : 0,
            },
            children: runChildren(block.runs),
          }),
        )
        break
      case 'table':
        children.push(renderTable(block.rows))
        break
    }
  }

  return children
}

/**
 * Render an Outline as .docx bytes. No I/O; the same outline always yields
 * the same body, numbering and relationships (core-property timestamps and
 * generated relationship ids aside).
 */
export async function renderDocument(outline: Outline, options: RenderOptions = {}): Promise<Buffer> {
  const doc = new Document({
    creator: 'ScribeFlow',
    title: options.title,
    description: options.description,
    numbering: {
      config: [
        { reference: BULLET_REFERENCE, levels: listLevels(false) },
        { reference: NUMBERED_REFERENCE, levels: listLevels(true) },
      ],
    },
    sections: [{ children: renderBlocks(outline.blocks) }],
  })

  return Packer.toBuffer(doc)
}

/** Fingerprint of the rendered structure; stable across renders of the same outline. */
export function outlineFingerprint(outline: Outline): string {
  return fingerprint(JSON.stringify(outline))
}
