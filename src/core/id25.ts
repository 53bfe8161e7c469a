/**
 * @module id25
 *
 * Fixed-width base-35 rendering of a 128-bit identifier, e.g.
 * `063ecvmgn09sck3fx6nqjpbxt`.
 *
 * Width is 25 because 35^24 < 2^128 < 35^25; a 36th symbol would not make
 * the string any shorter, so each alphabet drops one letter that reads like
 * a digit (`l` in lowercase, `O` in uppercase). Digits come first in both
 * alphabets and the value is written most significant digit first, so
 * comparing two id25 strings of the same case gives the same result as
 * comparing the integers.
 */

import type { LetterCase } from './types'
import { MAX, assertIdentifier } from './bitLayout'
import { MalformedIdentifierError } from './errors'

// ------------------------------------------------------------ Constants --

/** Digits first, then letters without `l`. */
export const ID25_ALPHABET_LOWER = '0123456789abcdefghijkmnopqrstuvwxyz'

/** Digits first, then letters without `O`. */
export const ID25_ALPHABET_UPPER = '0123456789ABCDEFGHIJKLMNPQRSTUVWXYZ'

export const ID25_LENGTH = 25

const BASE = 35n

const alphabetFor = (letterCase: LetterCase): string =>
  letterCase === 'upper' ? ID25_ALPHABET_UPPER : ID25_ALPHABET_LOWER

// ----------------------------------------------------------- Encode/Decode --

/**
 * Encode an identifier as 25 base-35 digits.
 *
 * @example
 * encodeId25(0n)                      // '0000000000000000000000000'
 * encodeId25((1n << 128n) - 1n)       // 'usz5xbbiqsfq7s727n0pzr2xa'
 * encodeId25((1n << 128n) - 1n, 'upper') // 'USZ5XBBIQSFQ7S727M0PZR2XA'
 */
export const encodeId25 = (id: bigint, letterCase: LetterCase = 'lower'): string => {
  assertIdentifier(id)

  const alphabet = alphabetFor(letterCase)
  const out: string[] = new Array(ID25_LENGTH)
  let rest = id
  for (let i = ID25_LENGTH - 1; i >= 0; i--) {
    out[i] = alphabet.charAt(Number(rest % BASE))
    rest /= BASE
  }
  return out.join('')
}

/**
 * Decode a 25-character id25 string. The uppercase alphabet applies when the
 * text contains an uppercase letter, the lowercase one otherwise.
 */
export const decodeId25 = (text: string): bigint => {
  if (text.length !== ID25_LENGTH) {
    throw new MalformedIdentifierError(text, `expected ${ID25_LENGTH} characters, got ${text.length}`)
  }

  const letterCase: LetterCase = /[A-Z]/.test(text) ? 'upper' : 'lower'
  const alphabet = alphabetFor(letterCase)

  let value = 0n
  for (const symbol of text) {
    const digit = alphabet.indexOf(symbol)
    if (digit === -1) {
      throw new MalformedIdentifierError(text, `'${symbol}' is not in the ${letterCase}case id25 alphabet`)
    }
    value = value * BASE + BigInt(digit)
  }

  if (value > MAX) {
    throw new MalformedIdentifierError(text, 'value exceeds 128 bits')
  }
  return value
}
