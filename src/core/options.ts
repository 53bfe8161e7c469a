/**
 * @module options
 *
 * Zod schemas for the option objects accepted by `createGenerator()` and the
 * timestamp extractors. Parsing fills in defaults and turns every problem
 * into a single `ConfigError` listing each offending key.
 */

import { z, type ZodError } from 'zod'
import type { ClockFn, Logger, RandomBytesFn } from './types'
import { ConfigError } from './errors'
import { cryptoRandomBytes, wallClockNs } from './providers'

// -------------------------------------------------------------- Schemas --

const isFunction = (v: unknown): boolean => typeof v === 'function'

const isLogger = (v: unknown): boolean =>
  typeof v === 'object' && v !== null && 'warn' in v && typeof v.warn === 'function'

const generatorOptionsSchema = z.object({
  clock: z
    .custom<ClockFn>(isFunction, { message: 'clock must be a function returning epoch nanoseconds' })
    .default(() => wallClockNs),
  randomBytes: z
    .custom<RandomBytesFn>(isFunction, { message: 'randomBytes must be a function returning a Uint8Array' })
    .default(() => cryptoRandomBytes),
  logger: z
    .custom<Logger>(isLogger, { message: 'logger must have a warn() method' })
    .default(() => console),
}).strict()

const extractOptionsSchema = z.object({
  msOnly: z.boolean().default(false),
  strict: z.boolean().default(false),
  nilAsZero: z.boolean().default(false),
}).strict()

export type ResolvedGeneratorOptions = z.output<typeof generatorOptionsSchema>
export type ResolvedExtractOptions = z.output<typeof extractOptionsSchema>

// --------------------------------------------------------------- Parsing --

/** Render zod issues as `path: message` pairs. */
const describeIssues = (error: ZodError): string =>
  error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)'
      return `${path}: ${issue.message}`
    })
    .join('; ')

export const parseGeneratorOptions = (options: unknown): ResolvedGeneratorOptions => {
  const result = generatorOptionsSchema.safeParse(options)
  if (!result.success) {
    throw new ConfigError(`Invalid generator options: ${describeIssues(result.error)}`)
  }
  return result.data
}

export const parseExtractOptions = (options: unknown): ResolvedExtractOptions => {
  const result = extractOptionsSchema.safeParse(options)
  if (!result.success) {
    throw new ConfigError(`Invalid extract options: ${describeIssues(result.error)}`)
  }
  return result.data
}
