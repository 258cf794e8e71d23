import { MalformedOutlineError } from '@/lib/pipeline/errors'
import {
  LIST_INDENT_WIDTH,
  MAX_LIST_DEPTH,
  isHeadingLevel,
  type Block,
  type InlineRun,
  type Outline,
} from './outline'

const HEADING_RE = /^(#{1,6})\s+(.+)$/
const LIST_ITEM_RE = /^([ \t]*)([-*]|\d+\.)\s+(.*)$/
const TABLE_SEPARATOR_RE = /^\|?\s*:?-+:?\s*(\|\s*:?-+:?\s*)*\|?$/
const THEMATIC_BREAK_RE = /^(?:-{3,}|_{3,}|\*{3,})$/
const LINK_RE = /^\[([^\]]+)\]\(([^)\s]+)\)/
const BARE_URL_RE = /^https?:\/\/[^\s<>"')\]]+/
const URL_TRAILING_PUNCTUATION_RE = /[.,;:!?]+$/

/**
 * Parse markdown-like outline text into an Outline.
 *
 * Block-level problems (ragged tables) throw MalformedOutlineError; inline
 * problems (unmatched `*`, `**`, `[`) degrade to literal text.
 */
export function parseOutline(markdown: string): Outline {
  const lines = markdown.replace(/\r\n?/g, '\n').split('\n')
  const blocks: Block[] = []

  let i = 0
  while (i < lines.length) {
    const line = lines[i].trim()

    if (!line || THEMATIC_BREAK_RE.test(line)) {
      i++
      continue
    }

    if (isTableStart(lines, i)) {
      const table = parseTable(lines, i)
      blocks.push(table.block)
      i = table.nextIndex
      continue
    }

    const heading = line.match(HEADING_RE)
    const level = heading ? heading[1].length : 0
    if (heading && isHeadingLevel(level)) {
      blocks.push({ type: 'heading', level, runs: parseInline(heading[2].trim()) })
      i++
      continue
    }

    const listItem = lines[i].match(LIST_ITEM_RE)
    if (listItem) {
      blocks.push({
        type: 'list_item',
        ordered: listItem[2] !== '-' && listItem[2] !== '*',
        depth: Math.min(indentDepth(listItem[1]), MAX_LIST_DEPTH),
        runs: parseInline(listItem[3].trim()),
      })
      i++
      continue
    }

    // Paragraph: consecutive plain lines are joined with a space
    const parts = [stripQuote(line)]
    i++
    while (i < lines.length && lines[i].trim() && !startsBlock(lines, i)) {
      parts.push(stripQuote(lines[i].trim()))
      i++
    }
    blocks.push({ type: 'paragraph', runs: parseInline(parts.join(' ')) })
  }

  return { blocks }
}

function indentDepth(indent: string): number {
  let width = 0
  for (const ch of indent) {
    width += ch === '\t' ? LIST_INDENT_WIDTH : 1
  }
  return Math.floor(width / LIST_INDENT_WIDTH)
}

function stripQuote(line: string): string {
  return line.startsWith('> ') ? line.slice(2) : line
}

function startsBlock(lines: string[], index: number): boolean {
  const line = lines[index].trim()
  return (
    HEADING_RE.test(line) ||
    LIST_ITEM_RE.test(lines[index]) ||
    THEMATIC_BREAK_RE.test(line) ||
    isTableStart(lines, index)
  )
}

function isTableStart(lines: string[], index: number): boolean {
  const line = lines[index].trim()
  if (!line.includes('|') || index + 1 >= lines.length) return false
  const separator = lines[index + 1].trim()
  return separator.includes('|') && separator.includes('-') && TABLE_SEPARATOR_RE.test(separator)
}

function splitRow(line: string): string[] {
  let row = line.trim()
  if (row.startsWith('|')) row = row.slice(1)
  if (row.endsWith('|')) row = row.slice(0, -1)
  return row.split('|').map(cell => cell.trim())
}

function parseTable(lines: string[], startIndex: number): { block: Block; nextIndex: number } {
  const header = splitRow(lines[startIndex])
  const separator = splitRow(lines[startIndex + 1])
  if (separator.length !== header.length) {
    throw new MalformedOutlineError(
      `Table separator has ${separator.length} cell(s), header has ${header.length}`,
      startIndex + 2,
    )
  }

  const rows: string[][] = [header]
  let i = startIndex + 2
  while (i < lines.length) {
    const line = lines[i].trim()
    if (!line || HEADING_RE.test(line) || LIST_ITEM_RE.test(lines[i])) break

    const cells = splitRow(line)
    if (cells.length !== header.length) {
      throw new MalformedOutlineError(
        `Table row has ${cells.length} cell(s), header has ${header.length}`,
        i + 1,
      )
    }
    rows.push(cells)
    i++
  }

  return {
    block: { type: 'table', rows: rows.map(row => row.map(cell => parseInline(cell))) },
    nextIndex: i,
  }
}

/**
 * Inline runs: `**bold**`, `*italic*`, `[text](url)` and bare http(s) URLs.
 * Markers are not nested; a marker without a usable closing partner is
 * kept as literal text.
 */
export function parseInline(text: string): InlineRun[] {
  const runs: InlineRun[] = []
  let plain = ''

  const flush = () => {
    if (plain) {
      runs.push({ type: 'text', text: plain })
      plain = ''
    }
  }

  let i = 0
  while (i < text.length) {
    const rest = text.slice(i)

    if (rest.startsWith('**')) {
      const close = text.indexOf('**', i + 2)
      const inner = close === -1 ? '' : text.slice(i + 2, close)
      if (isEmphasisContent(inner)) {
        flush()
        runs.push({ type: 'bold', text: inner })
        i = close + 2
        continue
      }
      plain += '**'
      i += 2
      continue
    }

    if (rest.startsWith('*')) {
      const close = text.indexOf('*', i + 1)
      const inner = close === -1 ? '' : text.slice(i + 1, close)
      if (isEmphasisContent(inner)) {
        flush()
        runs.push({ type: 'italic', text: inner })
        i = close + 1
        continue
      }
      plain += '*'
      i += 1
      continue
    }

    if (rest.startsWith('[')) {
      const link = rest.match(LINK_RE)
      if (link) {
        flush()
        runs.push({ type: 'link', text: link[1], href: link[2] })
        i += link[0].length
        continue
      }
    }

    if ((rest.startsWith('http://') || rest.startsWith('https://')) && !/[\w(]/.test(text[i - 1] ?? '')) {
      const match = rest.match(BARE_URL_RE)
      if (match) {
        const url = match[0].replace(URL_TRAILING_PUNCTUATION_RE, '')
        flush()
        runs.push({ type: 'link', text: url, href: url })
        i += url.length
        continue
      }
    }

    plain += text[i]
    i++
  }

  flush()
  return runs
}

function isEmphasisContent(inner: string): boolean {
  return inner.length > 0 && inner.trim() === inner && !inner.includes('\n')
}
