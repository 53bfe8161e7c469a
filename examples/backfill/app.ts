/**
 * Backfilling: generate identifiers for historical rows with the as-of
 * channel while live identifiers keep their own ordering.
 *
 * Run: npm run example:backfill
 */

import { createGenerator, toCanonical, extractDate } from 'chronid'
import { uuid7Schema } from 'chronid/zod'
import { z } from 'zod'

const generator = createGenerator()

const history = [
  { title: 'first post', createdAt: new Date('2021-03-14T09:26:53.589Z') },
  { title: 'second post', createdAt: new Date('2022-02-22T19:22:22.000Z') },
]

for (const row of history) {
  const ns = BigInt(row.createdAt.getTime()) * 1_000_000n
  const id = toCanonical(generator.asOf(ns))
  console.log(id, row.title, extractDate(id)?.toISOString())
}

console.log(toCanonical(generator.now()), 'live')

const requestBody = z.object({ postId: uuid7Schema({ version7: true }) })
const parsed = requestBody.safeParse({ postId: 'not-an-id' })
if (!parsed.success) console.log(parsed.error.issues.map((issue) => issue.message))
