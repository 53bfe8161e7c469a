/**
 * @module codec
 *
 * Conversions between the 128-bit `bigint` and its external forms:
 *
 * | form      | example                                  |
 * |-----------|------------------------------------------|
 * | bytes     | 16-byte big-endian `Uint8Array`          |
 * | hex       | `017f22e279b07cc398c4dc0c0c07398f`       |
 * | canonical | `017f22e2-79b0-7cc3-98c4-dc0c0c07398f`   |
 * | id25      | `063ecvmgn09sck3fx6nqjpbxt` (see id25)   |
 *
 * Every form is total over all 128-bit values, nil and max included, and
 * every encoder has an exact inverse. Output hex is lowercase; input hex may
 * be either case.
 */

import type { FormatResult, IdentifierInput, Uuid7Format } from './types'
import { VARIANT, VERSION, assertIdentifier, unpack } from './bitLayout'
import { MalformedIdentifierError } from './errors'
import { ID25_LENGTH, decodeId25, encodeId25 } from './id25'

// ------------------------------------------------------------ Constants --

export const BYTE_LENGTH = 16
export const HEX_LENGTH = 32
export const CANONICAL_LENGTH = 36

const HEX_RE = /^[0-9a-f]{32}$/i
const CANONICAL_RE = /^([0-9a-f]{8})-([0-9a-f]{4})-([0-9a-f]{4})-([0-9a-f]{4})-([0-9a-f]{12})$/i

// ---------------------------------------------------------------- Bytes --

export const toBytes = (id: bigint): Uint8Array => {
  assertIdentifier(id)

  const bytes = new Uint8Array(BYTE_LENGTH)
  let rest = id
  for (let i = BYTE_LENGTH - 1; i >= 0; i--) {
    bytes[i] = Number(rest & 0xffn)
    rest >>= 8n
  }
  return bytes
}

export const fromBytes = (bytes: Uint8Array): bigint => {
  if (bytes.length !== BYTE_LENGTH) {
    throw new MalformedIdentifierError(
      Buffer.from(bytes).toString('hex'),
      `expected ${BYTE_LENGTH} bytes, got ${bytes.length}`
    )
  }

  let value = 0n
  for (const byte of bytes) {
    value = (value << 8n) | BigInt(byte)
  }
  return value
}

// ------------------------------------------------------------------ Hex --

export const toHex = (id: bigint): string => {
  assertIdentifier(id)
  return id.toString(16).padStart(HEX_LENGTH, '0')
}

export const fromHex = (hex: string): bigint => {
  if (!HEX_RE.test(hex)) {
    throw new MalformedIdentifierError(hex, `expected ${HEX_LENGTH} hex digits`)
  }
  return BigInt(`0x${hex}`)
}

// ------------------------------------------------------------ Canonical --

/** 8-4-4-4-12 dashed form. */
export const toCanonical = (id: bigint): string => {
  const hex = toHex(id)
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`
}

export const fromCanonical = (text: string): bigint => {
  const match = CANONICAL_RE.exec(text)
  if (!match) {
    throw new MalformedIdentifierError(text, 'expected the 8-4-4-4-12 dashed hex form')
  }
  return BigInt(`0x${match.slice(1).join('')}`)
}

// -------------------------------------------------------------- Dispatch --

/**
 * Read any supported representation. Strings are told apart by length:
 * 36 → canonical, 32 → hex, 25 → id25.
 */
export const parse = (input: IdentifierInput): bigint => {
  if (typeof input === 'bigint') {
    assertIdentifier(input)
    return input
  }
  if (input instanceof Uint8Array) return fromBytes(input)

  switch (input.length) {
    case CANONICAL_LENGTH: return fromCanonical(input)
    case HEX_LENGTH: return fromHex(input)
    case ID25_LENGTH: return decodeId25(input)
    default:
      throw new MalformedIdentifierError(
        input,
        `expected ${CANONICAL_LENGTH}, ${HEX_LENGTH} or ${ID25_LENGTH} characters, got ${input.length}`
      )
  }
}

/**
 * Render an identifier in the named format.
 *
 * @example
 * format(id, 'string') // '017f22e2-79b0-7cc3-98c4-dc0c0c07398f'
 * format(id, 'ID25')   // '063ECVLGM09SCK3FX6MQJPBXT'
 */
export function format<F extends Uuid7Format>(id: bigint, as: F): FormatResult<F>
export function format(id: bigint, as: Uuid7Format): bigint | Uint8Array | string {
  switch (as) {
    case 'int':
      assertIdentifier(id)
      return id
    case 'hex': return toHex(id)
    case 'bytes': return toBytes(id)
    case 'string': return toCanonical(id)
    case 'id25': return encodeId25(id, 'lower')
    case 'ID25': return encodeId25(id, 'upper')
  }
}

/** True when the input parses and carries version 7 and variant `0b10`. */
export const isUuid7 = (input: IdentifierInput): boolean => {
  let id: bigint
  try {
    id = parse(input)
  } catch (err) {
    if (err instanceof MalformedIdentifierError) return false
    throw err
  }
  const { version, variant } = unpack(id)
  return version === VERSION && variant === VARIANT
}
