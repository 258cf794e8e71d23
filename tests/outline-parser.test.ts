import { describe, it, expect } from 'vitest'

import { MalformedOutlineError } from '@/lib/pipeline/errors'
import { outlineTitle, parseInline, parseOutline } from '@/lib/renderer'

describe('parseOutline', () => {
  it('parses headings of every level', () => {
    const outline = parseOutline('# One\n## Two\n###### Six\n####### Seven')

    expect(outline.blocks).toEqual([
      { type: 'heading', level: 1, runs: [{ type: 'text', text: 'One' }] },
      { type: 'heading', level: 2, runs: [{ type: 'text', text: 'Two' }] },
      { type: 'heading', level: 6, runs: [{ type: 'text', text: 'Six' }] },
      { type: 'paragraph', runs: [{ type: 'text', text: '####### Seven' }] },
    ])
  })

  it('derives list depth from indentation and caps it', () => {
    const deep = ' '.repeat(18)
    const outline = parseOutline(`- top\n  - nested\n\t- tabbed\n${deep}- deep\n1. first\n2. second\n* starred`)

    expect(
      outline.blocks.map(block => (block.type === 'list_item' ? [block.ordered, block.depth] : block.type)),
    ).toEqual([
      [false, 0],
      [false, 1],
      [false, 1],
      [false, 7],
      [true, 0],
      [true, 0],
      [false, 0],
    ])
  })

  it('joins consecutive plain lines into one paragraph', () => {
    const outline = parseOutline('first line\nsecond line\n\nnext paragraph\n---\nafter the rule')

    expect(outline.blocks).toEqual([
      { type: 'paragraph', runs: [{ type: 'text', text: 'first line second line' }] },
      { type: 'paragraph', runs: [{ type: 'text', text: 'next paragraph' }] },
      { type: 'paragraph', runs: [{ type: 'text', text: 'after the rule' }] },
    ])
  })

  it('parses pipe tables with the first row as header', () => {
    const outline = parseOutline('| Owner | Task |\n|---|:---:|\n| Sam | **Docs** |\n\nAfter')

    expect(outline.blocks[0]).toEqual({
      type: 'table',
      rows: [
        [[{ type: 'text', text: 'Owner' }], [{ type: 'text', text: 'Task' }]],
        [[{ type: 'text', text: 'Sam' }], [{ type: 'bold', text: 'Docs' }]],
      ],
    })
    expect(outline.blocks[1]).toEqual({ type: 'paragraph', runs: [{ type: 'text', text: 'After' }] })
  })

  it('rejects a table row with the wrong number of cells', () => {
    expect(() => parseOutline('a|b\n--|--\nc')).toThrow(MalformedOutlineError)

    try {
      parseOutline('a|b\n--|--\nc')
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedOutlineError)
      if (error instanceof MalformedOutlineError) {
        expect(error.kind).toBe('MalformedOutline')
        expect(error.line).toBe(3)
        expect(error.message).toBe('Table row has 1 cell(s), header has 2 (line 3)')
      }
    }
  })

  it('rejects a separator that does not match the header', () => {
    expect(() => parseOutline('| A | B |\n|---|\n| 1 | 2 |')).toThrow(
      'Table separator has 1 cell(s), header has 2 (line 2)',
    )
  })

  it('accepts CRLF line endings', () => {
    expect(parseOutline('# Title\r\nBody').blocks).toHaveLength(2)
  })

  it('returns no blocks for blank input', () => {
    expect(parseOutline('\n  \n').blocks).toEqual([])
  })
})

describe('parseInline', () => {
  it('parses bold, italic and links', () => {
    expect(parseInline('**bold** and *it* and [site](https://example.com)')).toEqual([
      { type: 'bold', text: 'bold' },
      { type: 'text', text: ' and ' },
      { type: 'italic', text: 'it' },
      { type: 'text', text: ' and ' },
      { type: 'link', text: 'site', href: 'https://example.com' },
    ])
  })

  it('keeps unmatched delimiters as literal text', () => {
    expect(parseInline('a **b and *c [d')).toEqual([{ type: 'text', text: 'a **b and *c [d' }])
    expect(parseInline('2 * 3 * 4')).toEqual([{ type: 'text', text: '2 * 3 * 4' }])
  })

  it('links bare URLs without trailing punctuation', () => {
    expect(parseInline('see https://example.com/x.')).toEqual([
      { type: 'text', text: 'see ' },
      { type: 'link', text: 'https://example.com/x', href: 'https://example.com/x' },
      { type: 'text', text: '.' },
    ])
  })
})

describe('outlineTitle', () => {
  it('uses the first heading', () => {
    expect(outlineTitle(parseOutline('Intro\n## **Plan**\n# Later'))).toBe('Plan')
    expect(outlineTitle(parseOutline('no headings here'))).toBeUndefined()
  })
})
