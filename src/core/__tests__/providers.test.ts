import { describe, it, expect, vi, afterEach } from 'vitest'
import { createWallClock, cryptoRandomBytes, wallClockNs } from '../providers'

const msOf = (ns: bigint) => ns / 1_000_000n

describe('createWallClock', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('follows the system time after it is set', () => {
    vi.useFakeTimers({ toFake: ['Date'] })
    vi.setSystemTime(new Date('2030-01-01T00:00:00.000Z'))

    expect(msOf(wallClockNs())).toBe(1893456000000n)
  })

  it('keeps the Date.now() millisecond across repeated reads', () => {
    vi.useFakeTimers({ toFake: ['Date'] })
    vi.setSystemTime(new Date('2030-01-01T00:00:00.000Z'))
    const clock = createWallClock()

    for (let i = 0; i < 100; i++) {
      expect(msOf(clock())).toBe(1893456000000n)
    }
  })

  it('follows the wall clock backwards', () => {
    vi.useFakeTimers({ toFake: ['Date'] })
    const clock = createWallClock()

    vi.setSystemTime(new Date('2030-01-01T00:00:00.000Z'))
    const later = clock()
    vi.setSystemTime(new Date('2029-12-31T23:59:59.000Z'))
    const earlier = clock()

    expect(msOf(later)).toBe(1893456000000n)
    expect(msOf(earlier)).toBe(1893455999000n)
  })

  it('adds a sub-millisecond part without leaving the millisecond', () => {
    vi.useFakeTimers({ toFake: ['Date'] })
    vi.setSystemTime(new Date('2030-01-01T00:00:00.000Z'))
    const clock = createWallClock()

    const start = 1893456000000n * 1_000_000n
    const first = clock()
    const second = clock()
    expect(first >= start && first < start + 1_000_000n).toBe(true)
    expect(second >= start && second < start + 1_000_000n).toBe(true)
  })

  it('tracks the real clock to the millisecond', () => {
    const before = BigInt(Date.now())
    const ms = msOf(wallClockNs())
    const after = BigInt(Date.now())
    expect(ms >= before && ms <= after).toBe(true)
  })
})

describe('cryptoRandomBytes', () => {
  it('returns the requested number of bytes', () => {
    expect(cryptoRandomBytes(7)).toHaveLength(7)
  })
})
