/**
 * chronid: Type Definitions
 *
 * Shared types for the generator, codecs, and timestamp extraction. Runtime
 * values live in the modules that own them; this file is types only.
 */

// ------------------------------------------------------------ Providers --

/**
 * Wall-clock source. Returns whole nanoseconds since the Unix epoch. May jump
 * backwards between calls; the generator tolerates that.
 */
export type ClockFn = () => bigint

/**
 * Cryptographically secure randomness source. Returns `size` random bytes.
 * Throwing (or returning fewer bytes) is treated as entropy failure.
 */
export type RandomBytesFn = (size: number) => Uint8Array

/** Anything with a `warn` method. `console` qualifies. */
export type Logger = {
  warn: (message: string) => void
}

// ------------------------------------------------------------ Generator --

export type GeneratorOptions = {
  /** Defaults to `wallClockNs`. */
  clock?: ClockFn
  /** Defaults to `cryptoRandomBytes`. */
  randomBytes?: RandomBytesFn
  /** Defaults to `console`. */
  logger?: Logger
}

export type Generator = {
  /**
   * Generate an identifier. Without a timestamp the live clock and the "now"
   * channel are used; with one, the "as-of" channel. `0n` yields the nil
   * identifier and `-1n` the max identifier.
   */
  generate: (timestampNs?: bigint) => bigint
  /** Same as `generate()`. */
  now: () => bigint
  /** Same as `generate(timestampNs)`. */
  asOf: (timestampNs: bigint) => bigint
}

/** Which monotonic channel a generation call went through. */
export type Channel = 'now' | 'as-of'

// --------------------------------------------------------------- Layout --

/** The five fields of the 128-bit layout, most significant first. */
export type Uuid7Fields = {
  unixTsMs: bigint
  version: number
  randA: number
  variant: number
  randB: bigint
}

// ---------------------------------------------------------------- Codec --

/** Every external representation an identifier can be parsed from. */
export type IdentifierInput = bigint | Uint8Array | string

export type LetterCase = 'lower' | 'upper'

export type Uuid7Format = 'int' | 'hex' | 'bytes' | 'string' | 'id25' | 'ID25'

/** Maps a format name to the type it renders as. */
export type FormatResult<F extends Uuid7Format> =
  F extends 'int' ? bigint :
  F extends 'bytes' ? Uint8Array :
  string

// ------------------------------------------------------------ Timestamp --

export type ExtractOptions = {
  /** Ignore the sub-millisecond field. */
  msOnly?: boolean
  /** Throw `NotVersion7Error` instead of returning `null` for non-v7 input. */
  strict?: boolean
  /** Treat the nil identifier as timestamp zero instead of "not applicable". */
  nilAsZero?: boolean
}

// --------------------------------------------------------------- Timing --

export type TimingOptions = {
  /** Stop sampling a clock after this many milliseconds. */
  limitMs?: number
  /** Stop sampling a clock once this many distinct values were seen. */
  targetDistinct?: number
}
