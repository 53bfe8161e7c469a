/**
 * @module monotonicState
 *
 * The last `(millisecond, sub-millisecond)` pair a generator channel handed
 * out. A generator owns two of these: one for live-clock ("now") calls and
 * one for caller-supplied ("as-of") calls, so backfilling historical records
 * never disturbs the ordering of live identifiers.
 *
 * ## Rules for `advance(ms, sub)`
 *
 * 1. **Same millisecond, sub not ahead of the last one** → the last sub plus
 *    one, capped at `SUB_MS_MAX`. A clock that repeats a value (coarse timer,
 *    burst of calls) still yields strictly increasing identifiers.
 *
 * 2. **Anything else** (new millisecond, later sub, clock moved backwards) →
 *    `sub` unchanged. The state follows the supplied value; it never invents
 *    a timestamp.
 *
 * 3. **Saturation** → once the counter reaches `SUB_MS_MAX` it stays there
 *    for that millisecond. It never wraps; ordering then falls back to the
 *    random bits.
 *
 * ## Exclusive access
 *
 * `advance()` is synchronous, so the compare-and-store runs to completion
 * before any other task in the same isolate gets a turn. Worker threads run
 * in separate isolates and each holds its own state.
 */

import { SUB_MS_MAX } from './bitLayout'

// --------------------------------------------------------------- Types --

export type MonotonicState = {
  readonly lastMs: bigint
  readonly lastSub: number
  /** Apply the rules above, store the result, and return the sub to use. */
  advance: (ms: bigint, sub: number) => number
}

// ------------------------------------------------------------- Factory --

/** Create a state starting at `(0, 0)`. */
export const createMonotonicState = (): MonotonicState => {
  let lastMs = 0n
  let lastSub = 0

  return {
    get lastMs() {
      return lastMs
    },
    get lastSub() {
      return lastSub
    },
    advance(ms, sub) {
      const next = ms === lastMs && sub <= lastSub
        ? Math.min(lastSub + 1, SUB_MS_MAX)
        : sub

      lastMs = ms
      lastSub = next
      return next
    },
  }
}
