export { parseOutline, parseInline } from './parser'
export { renderDocument, outlineFingerprint, BULLET_REFERENCE, NUMBERED_REFERENCE } from './docx'
export { outlineTitle, isHeadingLevel, MAX_LIST_DEPTH, LIST_INDENT_WIDTH } from './outline'

export type { Outline, Block, InlineRun, HeadingLevel } from './outline'
export type { RenderOptions } from './docx'
