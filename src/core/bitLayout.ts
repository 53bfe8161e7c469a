/**
 * @module bitLayout
 *
 * Pure pack/unpack between the UUIDv7 fields and a 128-bit `bigint`.
 *
 * ## Layout (128 bits, most significant first)
 *
 *   0                   1                   2                   3
 *   0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |                         unix_ts_ms (48 bits)                 |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |          unix_ts_ms           | ver (0111) |   rand_a (12)   |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |var (10)| sub_ms lo (8) |          random (54)                |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *  |                           random                             |
 *  +-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+-+
 *
 * ## Sub-millisecond field
 *
 * The fraction of the current millisecond is scaled to 20 bits
 * (`sub_ms = floor(remainder_ns * 2^20 / 1e6)`, ~0.95ns per step). Its top
 * 12 bits fill `rand_a`; its low 8 bits are the top of `rand_b`. The same
 * field doubles as the monotonic sequence counter, so identifiers stay
 * sortable as integers, bytes, hex and id25 strings.
 *
 * `pack()` forces version 7 and variant `0b10`. `unpack()` validates nothing;
 * checking those fields is the caller's job.
 */

import type { Uuid7Fields } from './types'
import { MalformedIdentifierError } from './errors'

// ------------------------------------------------------------ Constants --

export const UNIX_TS_MS_BITS = 48n
export const RAND_A_BITS = 12n
export const RAND_B_BITS = 62n
export const SUB_MS_BITS = 20
export const SUB_MS_LOW_BITS = 8
export const RANDOM_BITS = 54n

export const VERSION = 7
export const VARIANT = 0b10

/** Largest value of the 20-bit sub-millisecond field. */
export const SUB_MS_MAX = 2 ** SUB_MS_BITS - 1

/** Largest representable millisecond timestamp. */
export const UNIX_TS_MS_MAX = (1n << UNIX_TS_MS_BITS) - 1n

/** All 128 bits zero. */
export const NIL = 0n

/** All 128 bits one. */
export const MAX = (1n << 128n) - 1n

const RAND_A_MASK = (1n << RAND_A_BITS) - 1n
const RAND_B_MASK = (1n << RAND_B_BITS) - 1n
const RANDOM_MASK = (1n << RANDOM_BITS) - 1n

// ------------------------------------------------------------- Pack/Unpack --

/**
 * Assemble an identifier from its variable fields. Each field is masked to
 * its width; version and variant are always 7 and `0b10`.
 */
export const pack = (unixTsMs: bigint, randA: number, randB: bigint): bigint =>
  ((unixTsMs & UNIX_TS_MS_MAX) << 80n) |
  (BigInt(VERSION) << 76n) |
  ((BigInt(randA) & RAND_A_MASK) << 64n) |
  (BigInt(VARIANT) << 62n) |
  (randB & RAND_B_MASK)

/** Split an identifier into its five fields. */
export const unpack = (id: bigint): Uuid7Fields => ({
  unixTsMs: (id >> 80n) & UNIX_TS_MS_MAX,
  version: Number((id >> 76n) & 0xfn),
  randA: Number((id >> 64n) & RAND_A_MASK),
  variant: Number((id >> 62n) & 0b11n),
  randB: id & RAND_B_MASK,
})

// ---------------------------------------------------- Sub-ms Placement --

/**
 * Pack a millisecond timestamp, a 20-bit sub-millisecond value and 54 bits
 * of randomness.
 */
export const packSubMs = (unixTsMs: bigint, subMs: number, random: bigint): bigint => {
  const randA = subMs >> SUB_MS_LOW_BITS
  const randB = (BigInt(subMs & 0xff) << RANDOM_BITS) | (random & RANDOM_MASK)
  return pack(unixTsMs, randA, randB)
}

/** Recover the 20-bit sub-millisecond value from unpacked fields. */
export const readSubMs = (fields: Pick<Uuid7Fields, 'randA' | 'randB'>): number =>
  (fields.randA << SUB_MS_LOW_BITS) | Number(fields.randB >> RANDOM_BITS)

// ----------------------------------------------------------- Validation --

/** Throw unless `id` fits in 128 unsigned bits. */
export const assertIdentifier = (id: bigint): void => {
  if (id < NIL || id > MAX) {
    throw new MalformedIdentifierError(id.toString(), 'value is outside the unsigned 128-bit range')
  }
}
