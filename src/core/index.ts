export { createGenerator, NS_PER_MS, NIL_TIMESTAMP, MAX_TIMESTAMP, TIMESTAMP_NS_MAX } from './generator'
export { createMonotonicState } from './monotonicState'
export {
  pack,
  unpack,
  packSubMs,
  readSubMs,
  assertIdentifier,
  NIL,
  MAX,
  SUB_MS_MAX,
  UNIX_TS_MS_MAX,
  VERSION,
  VARIANT,
} from './bitLayout'
export {
  toBytes,
  fromBytes,
  toHex,
  fromHex,
  toCanonical,
  fromCanonical,
  parse,
  format,
  isUuid7,
} from './codec'
export { encodeId25, decodeId25, ID25_ALPHABET_LOWER, ID25_ALPHABET_UPPER, ID25_LENGTH } from './id25'
export { extractTimestampNs, extractTimestampMs, extractDate } from './timestamp'
export { checkTimingPrecision } from './timing'
export { createWallClock, wallClockNs, cryptoRandomBytes } from './providers'
export {
  InvalidTimestampError,
  MalformedIdentifierError,
  NotVersion7Error,
  EntropyError,
  ConfigError,
} from './errors'

export type { MonotonicState } from './monotonicState'

export type {
  ClockFn,
  RandomBytesFn,
  Logger,
  GeneratorOptions,
  Generator,
  Channel,
  Uuid7Fields,
  IdentifierInput,
  LetterCase,
  Uuid7Format,
  FormatResult,
  ExtractOptions,
  TimingOptions,
} from './types'
