/**
 * @module timestamp
 *
 * Recovers the timestamp embedded in a UUIDv7 from any representation the
 * codec reads (bigint, bytes, hex, canonical, id25 in either case).
 *
 * The millisecond part comes straight from `unix_ts_ms`. Unless `msOnly` is
 * set, the 20-bit sub-millisecond field adds
 * `floor(sub_ms * 1e6 / 2^20)` nanoseconds. Use `msOnly` for identifiers
 * whose `rand_a` holds plain randomness (other v7 generators), where that
 * field is meaningless.
 *
 * String input may carry dashes anywhere (`017f22e279b0-7cc398c4dc0c0c07398f`
 * as pasted from logs or URLs); they are dropped before decoding. The codec's
 * own `parse()` stays strict about dash placement.
 *
 * Non-v7 identifiers (v4, nil, max, ...) are legitimate input in mixed
 * systems and yield `null`, or `NotVersion7Error` under `strict`.
 *
 * @example
 * extractTimestampNs('017f22e2-79b0-7cc3-98c4-dc0c0c07398f')
 * // 1645557742000797701n
 * extractTimestampNs('017f22e2-79b0-7cc3-98c4-dc0c0c07398f', { msOnly: true })
 * // 1645557742000000000n
 */

import type { ExtractOptions, IdentifierInput } from './types'
import { NIL, SUB_MS_BITS, VERSION, readSubMs, unpack } from './bitLayout'
import { NotVersion7Error } from './errors'
import { parse } from './codec'
import { NS_PER_MS } from './generator'
import { parseExtractOptions } from './options'

/**
 * Nanoseconds since the Unix epoch, or `null` when the input is not a
 * version 7 identifier.
 */
export const extractTimestampNs = (
  input: IdentifierInput,
  options: ExtractOptions = {}
): bigint | null => {
  const { msOnly, strict, nilAsZero } = parseExtractOptions(options)
  const id = parse(typeof input === 'string' ? input.replace(/-/g, '') : input)

  if (id === NIL && nilAsZero) return 0n

  const fields = unpack(id)
  if (fields.version !== VERSION) {
    if (strict) throw new NotVersion7Error(fields.version)
    return null
  }

  const msNs = fields.unixTsMs * NS_PER_MS
  if (msOnly) return msNs

  const fracNs = (BigInt(readSubMs(fields)) * NS_PER_MS) >> BigInt(SUB_MS_BITS)
  return msNs + fracNs
}

/** Milliseconds since the Unix epoch, or `null` for non-v7 input. */
export const extractTimestampMs = (
  input: IdentifierInput,
  options: Omit<ExtractOptions, 'msOnly'> = {}
): bigint | null => {
  const ns = extractTimestampNs(input, { ...options, msOnly: true })
  return ns === null ? null : ns / NS_PER_MS
}

/** The embedded instant as a `Date` (UTC, millisecond precision). */
export const extractDate = (
  input: IdentifierInput,
  options: Omit<ExtractOptions, 'msOnly'> = {}
): Date | null => {
  const ms = extractTimestampMs(input, options)
  return ms === null ? null : new Date(Number(ms))
}
