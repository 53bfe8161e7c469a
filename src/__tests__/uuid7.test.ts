import { describe, it, expect } from 'vitest'
import {
  uuid7,
  uuid7Int,
  uuid7Hex,
  uuid7Bytes,
  uuid7Id25,
  id25,
  ID25,
  timestampNs,
  uuid7ToDate,
  getDefaultGenerator,
} from '../uuid7'
import { createGenerator } from '../core/generator'
import { extractTimestampMs } from '../core/timestamp'
import { encodeId25 } from '../core/id25'
import { isUuid7, parse, toCanonical } from '../core/codec'

const isStrictlyIncreasing = <T extends bigint | string>(values: T[]): boolean =>
  values.every((value, i) => i === 0 || (values[i - 1] ?? value) < value)

describe('uuid7', () => {
  it('returns a canonical v7 string that round-trips through the codec', () => {
    const id = uuid7()
    expect(id).toHaveLength(36)
    expect(isUuid7(id)).toBe(true)
    expect(toCanonical(parse(id))).toBe(id)
  })

  it('returns id25 strings in both cases that decode to v7 identifiers', () => {
    const lower = id25()
    const upper = ID25()
    expect(lower).toMatch(/^[0-9a-km-z]{25}$/)
    expect(upper).toMatch(/^[0-9A-NP-Z]{25}$/)
    expect(isUuid7(lower)).toBe(true)
    expect(isUuid7(upper)).toBe(true)
  })

  it('orders id25 strings across milliseconds', async () => {
    const a = id25()
    await new Promise((r) => setTimeout(r, 2))
    const b = id25()
    expect(a < b).toBe(true)
    expect((extractTimestampMs(b) ?? 0n) >= (extractTimestampMs(a) ?? 0n)).toBe(true)
  })

  it('orders a burst strictly as strings, integers and id25', () => {
    expect(isStrictlyIncreasing(Array.from({ length: 100 }, () => uuid7()))).toBe(true)
    expect(isStrictlyIncreasing(Array.from({ length: 100 }, () => uuid7Int()))).toBe(true)
    expect(isStrictlyIncreasing(Array.from({ length: 100 }, () => id25()))).toBe(true)
    expect(isStrictlyIncreasing(Array.from({ length: 100 }, () => ID25()))).toBe(true)
  })

  it('embeds a recoverable timestamp', () => {
    const before = BigInt(Date.now())
    const id = uuid7()
    const after = BigInt(Date.now())

    const ms = extractTimestampMs(id)
    expect(ms).not.toBeNull()
    expect((ms ?? 0n) >= before).toBe(true)
    expect((ms ?? 0n) <= after).toBe(true)
  })

  it('maps the sentinel timestamps to nil and max', () => {
    expect(uuid7(0n)).toBe('00000000-0000-0000-0000-000000000000')
    expect(uuid7(-1n)).toBe('ffffffff-ffff-ffff-ffff-ffffffffffff')
    expect(id25(0n)).toBe('0000000000000000000000000')
    expect(ID25(-1n)).toBe('USZ5XBBIQSFQ7S727M0PZR2XA')
  })

  it('renders hex, bytes and id25 forms', () => {
    expect(uuid7Hex()).toMatch(/^[0-9a-f]{12}7[0-9a-f]{3}[89ab][0-9a-f]{15}$/)

    const bytes = uuid7Bytes()
    expect(bytes).toHaveLength(16)
    expect((bytes[6] ?? 0) >> 4).toBe(7)

    expect(uuid7Id25()).toMatch(/^[0-9a-km-z]{25}$/)
    expect(uuid7Id25(undefined, 'upper')).toMatch(/^[0-9A-NP-Z]{25}$/)
  })

  it('generates as of an explicit timestamp', () => {
    const ts = 1_645_557_742_000_500_000n
    expect(timestampNs(uuid7(ts))).toBe(ts)
    expect(uuid7ToDate(id25(ts))?.toISOString()).toBe('2022-02-22T19:22:22.000Z')
  })

  it('reuses one process-wide generator', () => {
    expect(getDefaultGenerator()).toBe(getDefaultGenerator())
  })

  it('keeps the convenience forms consistent with each other', () => {
    const id = uuid7Int(1_645_557_742_000_000_000n)
    expect(extractTimestampMs(encodeId25(id))).toBe(1645557742000n)
  })
})

describe('concurrent callers', () => {
  it('never repeat a value and stay strictly increasing per caller', async () => {
    const gen = createGenerator()
    const callers = 8
    const perCaller = 12_500

    const run = async (): Promise<bigint[]> => {
      const out: bigint[] = []
      for (let i = 0; i < perCaller; i++) {
        out.push(gen.now())
        // Yield regularly so the callers interleave
        if (i % 100 === 0) await Promise.resolve()
      }
      return out
    }

    const results = await Promise.all(Array.from({ length: callers }, run))

    for (const ids of results) {
      expect(isStrictlyIncreasing(ids)).toBe(true)
    }
    expect(new Set(results.flat()).size).toBe(callers * perCaller)
  }, 30_000)
})
