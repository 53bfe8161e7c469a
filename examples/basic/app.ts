/**
 * Basic usage: process-wide helpers, formats, and timestamp recovery.
 *
 * Run: npm run example
 */

import chronid, { format, parse, extractTimestampNs, checkTimingPrecision } from 'chronid'

const id = chronid.uuid7()
console.log('uuid7     ', id)
console.log('id25      ', chronid.id25())
console.log('ID25      ', chronid.ID25())

const value = parse(id)
console.log('hex       ', format(value, 'hex'))
console.log('int       ', format(value, 'int'))
console.log('timestamp ', extractTimestampNs(id), 'ns')
console.log('date      ', chronid.uuid7ToDate(id)?.toISOString())

console.log()
console.log(checkTimingPrecision({}, { limitMs: 50 }))
