import { describe, it, expect } from 'vitest'

import {
  InvalidTransitionError,
  assertTransition,
  canTransition,
  isInProgress,
  nextStageFor,
  recoveryTarget,
  weakest,
} from '@/lib/pipeline'

describe('state machine', () => {
  it('moves each stage from rest to in progress to rest', () => {
    expect(canTransition('new', 'downloading')).toBe(true)
    expect(canTransition('downloading', 'downloaded')).toBe(true)
    expect(canTransition('transcribing', 'failed')).toBe(true)
    expect(canTransition('failed', 'structuring')).toBe(true)
    expect(canTransition('new', 'transcribing')).toBe(false)
    expect(canTransition('completed', 'new')).toBe(false)
  })

  it('raises InvalidTransition for a skipped stage', () => {
    expect(() => assertTransition('downloaded', 'structuring')).toThrow(InvalidTransitionError)
  })

  it('resets interrupted runs to the rest state their stage started from', () => {
    expect(recoveryTarget('downloading')).toBe('new')
    expect(recoveryTarget('transcribing')).toBe('downloaded')
    expect(recoveryTarget('structuring')).toBe('transcribed')
    expect(recoveryTarget('publishing')).toBe('structured')
    expect(recoveryTarget('transcribed')).toBeNull()
    expect(recoveryTarget('failed')).toBeNull()
  })

  it('orders rest states', () => {
    expect(weakest('completed', 'downloaded')).toBe('downloaded')
    expect(weakest('new', 'structured')).toBe('new')
    expect(nextStageFor('transcribed')).toBe('structure')
    expect(nextStageFor('completed')).toBeNull()
    expect(isInProgress('publishing')).toBe(true)
    expect(isInProgress('failed')).toBe(false)
  })
})
