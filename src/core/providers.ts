/**
 * @module providers
 *
 * Default clock and randomness sources. Both are plain functions so a
 * generator can be handed fakes in tests or a finer clock on platforms where
 * the default one is coarse (see `checkTimingPrecision()`).
 */

import { getRandomValues } from 'node:crypto'
import type { ClockFn, RandomBytesFn } from './types'

const NS_PER_MS = 1_000_000n

/**
 * Create a wall clock returning nanoseconds since the Unix epoch.
 *
 * The millisecond always equals `Date.now()`, so the clock follows wall-clock
 * steps and NTP corrections, backwards included. The sub-millisecond part is
 * the `process.hrtime` time elapsed since the last anchor. Whenever that
 * estimate lands on a different millisecond than `Date.now()`, the clock
 * re-anchors on `Date.now()`.
 */
export const createWallClock = (): ClockFn => {
  let anchorMs = BigInt(Date.now())
  let anchorHr = process.hrtime.bigint()

  return () => {
    const nowMs = BigInt(Date.now())
    const hr = process.hrtime.bigint()
    const estimateNs = anchorMs * NS_PER_MS + (hr - anchorHr)

    if (estimateNs / NS_PER_MS === nowMs) return estimateNs

    anchorMs = nowMs
    anchorHr = hr
    return nowMs * NS_PER_MS
  }
}

/** Process-wide default wall clock. */
export const wallClockNs: ClockFn = createWallClock()

/** Random bytes from the platform CSPRNG. */
export const cryptoRandomBytes: RandomBytesFn = (size) =>
  getRandomValues(new Uint8Array(size))
