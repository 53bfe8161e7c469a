/**
 * chronid: Error Types
 *
 * One class per failure condition. Every error is local to the call that
 * raised it: the generator only mutates its monotonic state after all
 * fallible steps have succeeded.
 */

/**
 * Thrown when a timestamp is negative (other than the `-1n` max sentinel) or
 * its millisecond part does not fit in 48 bits.
 *
 * @example
 * try {
 *   generator.asOf(-5n)
 * } catch (err) {
 *   if (err instanceof InvalidTimestampError) console.log(err.timestampNs) // -5n
 * }
 */
export class InvalidTimestampError extends Error {
  readonly timestampNs: bigint

  constructor(timestampNs: bigint) {
    super(`Invalid timestamp: ${timestampNs}ns is outside the 48-bit millisecond range`)
    this.name = 'InvalidTimestampError'
    this.timestampNs = timestampNs
  }
}

/**
 * Thrown when a string, byte array, or integer cannot be read as a 128-bit
 * identifier (wrong length, wrong characters, wrong alphabet, out of range).
 */
export class MalformedIdentifierError extends Error {
  readonly input: string

  constructor(input: string, reason: string) {
    super(`Malformed identifier ${JSON.stringify(input)}: ${reason}`)
    this.name = 'MalformedIdentifierError'
    this.input = input
  }
}

/**
 * Thrown by strict timestamp extraction when the identifier parsed but its
 * version field is not 7.
 */
export class NotVersion7Error extends Error {
  readonly version: number

  constructor(version: number) {
    super(`Identifier is a version ${version} UUID, not version 7; it carries no timestamp`)
    this.name = 'NotVersion7Error'
    this.version = version
  }
}

/**
 * Thrown when the randomness provider fails or returns too few bytes. The
 * provider's own error, if any, is attached as `cause`. Never retried.
 */
export class EntropyError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'EntropyError'
  }
}

/**
 * Thrown when generator or extractor options are invalid (e.g., a clock that
 * is not a function, an unknown option key).
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}
