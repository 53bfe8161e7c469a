import { describe, it, expect } from 'vitest'
import { checkTimingPrecision } from '../timing'
import type { ClockFn } from '../types'

const LINE_RE = /^(.+) has a timing precision of [\d,]+ns rather than [\d,]+ns \(([\d,]+) samples of which ([\d,]+) are distinct, in \d+\.\d{2}s\)$/

const counterClock = (): ClockFn => {
  let n = 0n
  return () => ++n
}

describe('checkTimingPrecision', () => {
  it('reports the built-in clocks followed by supplied ones', () => {
    const report = checkTimingPrecision({ counter: counterClock() }, { limitMs: 5, targetDistinct: 10 })
    const names = report.split('\n').map((line) => LINE_RE.exec(line)?.[1])
    expect(names).toEqual(['wallClockNs', 'Date.now', 'process.hrtime.bigint', 'counter'])
  })

  it('stops once the target number of distinct values is seen', () => {
    const report = checkTimingPrecision({ counter: counterClock() }, { limitMs: 1000, targetDistinct: 10 })
    const line = report.split('\n').find((l) => l.startsWith('counter '))
    const match = LINE_RE.exec(line ?? '')
    expect(match?.[2]).toBe('10')
    expect(match?.[3]).toBe('10')
  })

  it('stops at the time limit for a clock that never ticks', () => {
    const report = checkTimingPrecision({ frozen: () => 42n }, { limitMs: 5, targetDistinct: 10 })
    const line = report.split('\n').find((l) => l.startsWith('frozen '))
    const match = LINE_RE.exec(line ?? '')
    expect(match?.[3]).toBe('1')
  })
})
