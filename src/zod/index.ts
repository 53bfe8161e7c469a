/**
 * @module zod
 *
 * Zod schemas for accepting identifiers at API boundaries. Malformed input
 * becomes a zod issue rather than a thrown `MalformedIdentifierError`, so it
 * surfaces alongside the other field errors of a request body.
 *
 * @example
 * import { z } from 'zod'
 * import { uuid7Schema } from 'chronid/zod'
 *
 * const body = z.object({ orderId: uuid7Schema({ version7: true }) })
 * body.parse({ orderId: '063ecvmgn09sck3fx6nqjpbxt' }).orderId // bigint
 */

import { z } from 'zod'
import type { IdentifierInput } from '../core/types'
import { VERSION, unpack } from '../core/bitLayout'
import { parse } from '../core/codec'
import { MalformedIdentifierError } from '../core/errors'

export type Uuid7SchemaOptions = {
  /** Reject identifiers whose version field is not 7. */
  version7?: boolean
}

const identifierInput = z.union([
  z.string(),
  z.bigint(),
  z.instanceof(Uint8Array),
])

/**
 * Accept any identifier representation and output the 128-bit `bigint`.
 */
export const uuid7Schema = (options: Uuid7SchemaOptions = {}) =>
  identifierInput.transform((value: IdentifierInput, ctx) => {
    let id: bigint
    try {
      id = parse(value)
    } catch (err) {
      if (!(err instanceof MalformedIdentifierError)) throw err
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: err.message })
      return z.NEVER
    }

    if (options.version7) {
      const { version } = unpack(id)
      if (version !== VERSION) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a version 7 UUID, got version ${version}` })
        return z.NEVER
      }
    }

    return id
  })

/** Canonical lowercase or uppercase v7 string (version nibble 7, variant 8-b). */
export const canonicalUuid7String = z
  .string()
  .regex(/^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i, 'Invalid UUIDv7 string')

/** 25-character id25 string in a single letter case. */
export const id25String = z
  .string()
  .regex(/^(?:[0-9a-km-z]{25}|[0-9A-NP-Z]{25})$/, 'Invalid id25 string')
