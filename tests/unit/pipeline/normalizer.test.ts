import { deepStrictEqual, notStrictEqual, strictEqual } from 'node:assert'
import { describe, it } from 'node:test'
import { normalize } from '../../../src/pipeline/normalizer'
import { MINUTE, rawBar, T0 } from '../../helpers/bars'

describe('normalize', () => {
  it('should sort rows by timestamp ascending', () => {
    const rows = [rawBar(T0 + 2 * MINUTE), rawBar(T0), rawBar(T0 + MINUTE)]

    const result = normalize(rows)

    deepStrictEqual(result.map(row => row.timestamp), [T0, T0 + MINUTE, T0 + 2 * MINUTE])
  })

  it('should keep the first row of a duplicated timestamp', () => {
    const rows = [
      rawBar(T0 + MINUTE, { close: 1 }),
      rawBar(T0, { close: 2 }),
      rawBar(T0 + MINUTE, { close: 3 })
    ]

    const result = normalize(rows)

    strictEqual(result.length, 2)
    strictEqual(result[1]?.close, 1)
  })

  it('should be idempotent', () => {
    const rows = [rawBar(T0 + MINUTE), rawBar(T0), rawBar(T0), rawBar(T0 + 5 * MINUTE)]

    const once = normalize(rows)
    const twice = normalize(once)

    deepStrictEqual(twice, once)
  })

  it('should not modify the input array', () => {
    const rows = [rawBar(T0 + MINUTE), rawBar(T0)]

    const result = normalize(rows)

    notStrictEqual(result, rows)
    strictEqual(rows[0]?.timestamp, T0 + MINUTE)
  })

  it('should return an empty array for empty input', () => {
    deepStrictEqual(normalize([]), [])
  })
})
