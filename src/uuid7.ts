/**
 * @module uuid7
 *
 * Process-wide convenience functions backed by one default generator.
 *
 * The default generator is created on first use with the default clock,
 * randomness and logger, and lives for the rest of the process. It is never
 * reconfigured; callers that need a different clock (tests, coarse-timer
 * platforms) create their own with `createGenerator()`, which carries its
 * own independent monotonic state.
 *
 * @example
 * import { uuid7, id25, timestampNs } from 'chronid'
 *
 * uuid7()                            // '0190b6a5-3c4e-7d2f-9b1a-...'
 * id25()                             // '063ecvmgn09sck3fx6nqjpbxt'
 * uuid7(1_645_557_742_000_000_000n)  // as-of a past instant
 * timestampNs(uuid7())               // nanoseconds since epoch
 */

import type { Generator, LetterCase } from './core/types'
import { createGenerator } from './core/generator'
import { toBytes, toCanonical, toHex } from './core/codec'
import { encodeId25 } from './core/id25'
import { extractDate, extractTimestampNs } from './core/timestamp'

// ----------------------------------------------------- Default Generator --

let defaultGenerator: Generator | undefined

/** The process-wide generator, created on first call. */
export const getDefaultGenerator = (): Generator => {
  defaultGenerator ??= createGenerator()
  return defaultGenerator
}

// ------------------------------------------------------------ Generators --

/** Canonical dashed string, now or as of `timestampNs`. */
export const uuid7 = (timestampNs?: bigint): string =>
  toCanonical(getDefaultGenerator().generate(timestampNs))

export const uuid7Int = (timestampNs?: bigint): bigint =>
  getDefaultGenerator().generate(timestampNs)

export const uuid7Hex = (timestampNs?: bigint): string =>
  toHex(getDefaultGenerator().generate(timestampNs))

export const uuid7Bytes = (timestampNs?: bigint): Uint8Array =>
  toBytes(getDefaultGenerator().generate(timestampNs))

/** 25-character compact string, now or as of `timestampNs`. */
export const uuid7Id25 = (timestampNs?: bigint, letterCase: LetterCase = 'lower'): string =>
  encodeId25(getDefaultGenerator().generate(timestampNs), letterCase)

/** Lowercase id25 (`0-9`, `a-z` without `l`). */
export const id25 = (timestampNs?: bigint): string => uuid7Id25(timestampNs, 'lower')

/** Uppercase id25 (`0-9`, `A-Z` without `O`). */
export const ID25 = (timestampNs?: bigint): string => uuid7Id25(timestampNs, 'upper')

// ------------------------------------------------------------ Extraction --

export const timestampNs = extractTimestampNs

export const uuid7ToDate = extractDate
