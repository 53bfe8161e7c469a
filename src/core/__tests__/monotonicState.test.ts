import { describe, it, expect } from 'vitest'
import { createMonotonicState } from '../monotonicState'
import { SUB_MS_MAX } from '../bitLayout'

describe('createMonotonicState', () => {
  it('starts at zero', () => {
    const state = createMonotonicState()
    expect(state.lastMs).toBe(0n)
    expect(state.lastSub).toBe(0)
  })

  it('bumps the counter when the same value repeats', () => {
    const state = createMonotonicState()
    expect(state.advance(5n, 100)).toBe(100)
    expect(state.advance(5n, 100)).toBe(101)
    expect(state.advance(5n, 100)).toBe(102)
  })

  it('bumps past a sub that is behind the last one in the same millisecond', () => {
    const state = createMonotonicState()
    state.advance(5n, 100)
    expect(state.advance(5n, 40)).toBe(101)
  })

  it('takes a later sub in the same millisecond as-is', () => {
    const state = createMonotonicState()
    state.advance(5n, 100)
    expect(state.advance(5n, 500)).toBe(500)
  })

  it('takes the sub as-is in a new millisecond', () => {
    const state = createMonotonicState()
    state.advance(5n, 100)
    expect(state.advance(6n, 0)).toBe(0)
    expect(state.lastMs).toBe(6n)
    expect(state.lastSub).toBe(0)
  })

  it('follows the clock backwards without inventing a timestamp', () => {
    const state = createMonotonicState()
    state.advance(10n, 50)
    expect(state.advance(9n, 10)).toBe(10)
    expect(state.lastMs).toBe(9n)
  })

  it('saturates at the maximum instead of wrapping', () => {
    const state = createMonotonicState()
    expect(state.advance(7n, SUB_MS_MAX - 1)).toBe(SUB_MS_MAX - 1)
    expect(state.advance(7n, SUB_MS_MAX - 1)).toBe(SUB_MS_MAX)
    expect(state.advance(7n, SUB_MS_MAX - 1)).toBe(SUB_MS_MAX)
    expect(state.lastSub).toBe(SUB_MS_MAX)
  })

  it('bumps a first call that matches the initial zero state', () => {
    const state = createMonotonicState()
    expect(state.advance(0n, 0)).toBe(1)
  })

  it('keeps separate instances independent', () => {
    const a = createMonotonicState()
    const b = createMonotonicState()
    a.advance(5n, 100)
    a.advance(5n, 100)
    expect(b.advance(5n, 100)).toBe(100)
  })
})
