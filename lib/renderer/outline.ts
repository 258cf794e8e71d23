export type InlineRun =
  | { type: 'text'; text: string }
  | { type: 'bold'; text: string }
  | { type: 'italic'; text: string }
  | { type: 'link'; text: string; href: string }

export type Block =
  | { type: 'heading'; level: HeadingLevel; runs: InlineRun[] }
  | { type: 'paragraph'; runs: InlineRun[] }
  | { type: 'list_item'; ordered: boolean; depth: number; runs: InlineRun[] }
  | { type: 'table'; rows: InlineRun[][][] }

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6

export interface Outline {
  blocks: Block[]
}

export const MAX_LIST_DEPTH = 7
export const LIST_INDENT_WIDTH = 2

export function isHeadingLevel(value: number): value is HeadingLevel {
  return Number.isInteger(value) && value >= 1 && value <= 6
}

/** First heading's plain text, used as the document title. */
export function outlineTitle(outline: Outline): string | undefined {
  for (const block of outline.blocks) {
    if (block.type === 'heading') {
      const text = block.runs.map(run => run.text).join('').trim()
      if (text) return text
    }
  }
  return undefined
}
