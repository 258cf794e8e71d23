import { describe, it, expect } from 'vitest'

import { unsentLines } from '@/lib/server/log-tail'

describe('unsentLines', () => {
  it('returns lines appended since the last snapshot', () => {
    expect(unsentLines(['a', 'b'], ['a', 'b', 'c', 'd'])).toEqual(['c', 'd'])
    expect(unsentLines(['a', 'b'], ['a', 'b'])).toEqual([])
    expect(unsentLines([], ['a'])).toEqual(['a'])
  })

  it('follows a capped trail that dropped its oldest lines', () => {
    expect(unsentLines(['a', 'b', 'c'], ['b', 'c', 'd'])).toEqual(['d'])
    expect(unsentLines(['a', 'b', 'c'], ['c', 'd', 'e'])).toEqual(['d', 'e'])
  })

  it('sends only the new lines once the last one sent has rotated out', () => {
    expect(unsentLines(['a', 'b', 'c'], ['d', 'e', 'f'])).toEqual(['d', 'e', 'f'])
  })
})
