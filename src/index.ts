/**
 * chronid: Main Entry Point
 *
 * Re-exports the public API. The default export bundles the process-wide
 * convenience functions; named exports provide the individual building
 * blocks (generator factory, codecs, extractors) for consumers who import
 * selectively.
 *
 * @example
 * import chronid from 'chronid'
 * const id = chronid.uuid7()
 *
 * @example
 * import { createGenerator, toCanonical, extractTimestampNs } from 'chronid'
 */

// -------------------------------------------------- Convenience (default) --

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
} from './uuid7'

const chronid = { uuid7, uuid7Int, uuid7Hex, uuid7Bytes, uuid7Id25, id25, ID25, timestampNs, uuid7ToDate }

export default chronid
export {
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
}

// --------------------------------------------------------- Building Blocks --

export {
  createGenerator,
  createMonotonicState,
  NS_PER_MS,
  NIL_TIMESTAMP,
  MAX_TIMESTAMP,
  TIMESTAMP_NS_MAX,
  pack,
  unpack,
  NIL,
  MAX,
  SUB_MS_MAX,
  toBytes,
  fromBytes,
  toHex,
  fromHex,
  toCanonical,
  fromCanonical,
  parse,
  format,
  isUuid7,
  encodeId25,
  decodeId25,
  ID25_ALPHABET_LOWER,
  ID25_ALPHABET_UPPER,
  extractTimestampNs,
  extractTimestampMs,
  extractDate,
  checkTimingPrecision,
  createWallClock,
  wallClockNs,
  cryptoRandomBytes,
  InvalidTimestampError,
  MalformedIdentifierError,
  NotVersion7Error,
  EntropyError,
  ConfigError,
} from './core'

// --------------------------------------------------------------- Types --

export type {
  // Providers & generator
  ClockFn,
  RandomBytesFn,
  Logger,
  GeneratorOptions,
  Generator,
  Channel,
  MonotonicState,

  // Layout & codec
  Uuid7Fields,
  IdentifierInput,
  LetterCase,
  Uuid7Format,
  FormatResult,

  // Extraction & timing
  ExtractOptions,
  TimingOptions,
} from './core'
