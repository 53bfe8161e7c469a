/**
 * @module generator
 *
 * Generates RFC 9562 UUIDv7 values whose 12 `rand_a` bits and top 8 `rand_b`
 * bits carry a 20-bit sub-millisecond timestamp (~1ns steps). That field is
 * also the sequence counter, so identifiers from one generator sort strictly
 * increasing even when the clock repeats a value.
 *
 * ## Channels
 *
 * - **now**: `generate()` reads the injected clock.
 * - **as-of**: `generate(ts)` uses the caller's nanosecond timestamp, e.g.
 *   for backfilling. It has its own monotonic state, so backfills never
 *   bump the counter of live identifiers.
 *
 * `generate(0n)` is the nil identifier and `generate(-1n)` the max
 * identifier; neither touches any state.
 *
 * ## Failure
 *
 * Timestamps outside the 48-bit millisecond range throw
 * `InvalidTimestampError`. A failing randomness provider throws
 * `EntropyError` and is never retried. The monotonic state is only written
 * after both have succeeded.
 *
 * @example
 * const gen = createGenerator()
 * const a = gen.now()
 * const b = gen.now()
 * a < b // true
 *
 * const backfilled = gen.asOf(1_645_557_742_000_000_000n)
 */

import type { Channel, Generator, GeneratorOptions } from './types'
import { MAX, NIL, UNIX_TS_MS_MAX, SUB_MS_BITS, packSubMs } from './bitLayout'
import { EntropyError, InvalidTimestampError } from './errors'
import { createMonotonicState, type MonotonicState } from './monotonicState'
import { parseGeneratorOptions } from './options'

// ------------------------------------------------------------ Constants --

export const NS_PER_MS = 1_000_000n

/** Timestamp requesting the nil identifier. */
export const NIL_TIMESTAMP = 0n

/** Timestamp requesting the max identifier. */
export const MAX_TIMESTAMP = -1n

/** Largest nanosecond timestamp whose millisecond part fits in 48 bits. */
export const TIMESTAMP_NS_MAX = (UNIX_TS_MS_MAX + 1n) * NS_PER_MS - 1n

/** 56 bits are drawn; the low 54 are used. */
const RANDOM_BYTES = 7

// -------------------------------------------------------------- Helpers --

const assertTimestamp = (timestampNs: bigint): void => {
  if (timestampNs < 0n || timestampNs > TIMESTAMP_NS_MAX) {
    throw new InvalidTimestampError(timestampNs)
  }
}

/** Scale the sub-millisecond remainder to 20 bits, rounding down. */
const toSubMs = (timestampNs: bigint): number =>
  Number(((timestampNs % NS_PER_MS) << BigInt(SUB_MS_BITS)) / NS_PER_MS)

// ------------------------------------------------------------- Factory --

/**
 * Create a generator with its own pair of monotonic states.
 *
 * @param options - Clock, randomness and logger overrides (validated)
 */
export const createGenerator = (options: GeneratorOptions = {}): Generator => {
  const { clock, randomBytes, logger } = parseGeneratorOptions(options)

  const states: Record<Channel, MonotonicState> = {
    'now': createMonotonicState(),
    'as-of': createMonotonicState(),
  }

  const drawRandom = (): bigint => {
    let bytes: Uint8Array
    try {
      bytes = randomBytes(RANDOM_BYTES)
    } catch (err) {
      throw new EntropyError('Randomness provider failed', { cause: err })
    }
    if (bytes.length < RANDOM_BYTES) {
      throw new EntropyError(`Randomness provider returned ${bytes.length} bytes, expected ${RANDOM_BYTES}`)
    }

    let value = 0n
    for (const byte of bytes.subarray(0, RANDOM_BYTES)) {
      value = (value << 8n) | BigInt(byte)
    }
    return value
  }

  const assemble = (timestampNs: bigint, channel: Channel): bigint => {
    assertTimestamp(timestampNs)

    const ms = timestampNs / NS_PER_MS
    const random = drawRandom()

    const state = states[channel]
    if (channel === 'now' && ms < state.lastMs) {
      logger.warn(`[chronid] clock moved backwards from ${state.lastMs}ms to ${ms}ms`)
    }

    const sub = state.advance(ms, toSubMs(timestampNs))
    return packSubMs(ms, sub, random)
  }

  const generate = (timestampNs?: bigint): bigint => {
    if (timestampNs === undefined) return assemble(clock(), 'now')
    if (timestampNs === NIL_TIMESTAMP) return NIL
    if (timestampNs === MAX_TIMESTAMP) return MAX
    return assemble(timestampNs, 'as-of')
  }

  return {
    generate,
    now: () => generate(),
    asOf: (timestampNs) => generate(timestampNs),
  }
}
