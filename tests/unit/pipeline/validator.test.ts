import { deepStrictEqual, ok, strictEqual, throws } from 'node:assert'
import { describe, it } from 'node:test'
import type { RawBar } from '../../../src/models'
import { OhlcConsistencyError, QualityThresholdError, SchemaError } from '../../../src/pipeline/errors'
import { Validator } from '../../../src/pipeline/validator'
import { MINUTE, rawBar, T0 } from '../../helpers/bars'

function rowsWithMissingClose(total: number, missing: number): RawBar[] {
  return Array.from({ length: total }, (_, i) =>
    rawBar(T0 + i * MINUTE, i < missing ? { close: null } : {})
  )
}

describe('Validator', () => {
  describe('schema', () => {
    it('should throw SchemaError when a column is absent from every row', () => {
      const rows: RawBar[] = [
        { symbol: 'BTC/USDT', timestamp: T0, open: 1, high: 1, low: 1, close: 1 },
        { symbol: 'BTC/USDT', timestamp: T0 + MINUTE, open: 1, high: 1, low: 1, close: 1 }
      ]

      throws(
        () => new Validator().validate(rows),
        (error: unknown) => {
          ok(error instanceof SchemaError)
          deepStrictEqual(error.missingColumns, ['volume'])
          strictEqual(error.code, 'SCHEMA_ERROR')
          return true
        }
      )
    })

    it('should accept a column that is present but null in some rows', () => {
      const rows = [rawBar(T0), rawBar(T0 + MINUTE, { volume: null })]

      const { report } = new Validator({ missingThreshold: 0.5 }).validate(rows)

      strictEqual(report.missingByColumn.volume, 1)
    })
  })

  describe('missing threshold', () => {
    it('should pass when the missing ratio equals the threshold', () => {
      const { report } = new Validator({ missingThreshold: 0.05 }).validate(rowsWithMissingClose(100, 5))

      strictEqual(report.totalRows, 100)
      strictEqual(report.missingByColumn.close, 5)
    })

    it('should fail when the missing ratio is one row above the threshold', () => {
      throws(
        () => new Validator({ missingThreshold: 0.05 }).validate(rowsWithMissingClose(100, 6)),
        (error: unknown) => {
          ok(error instanceof QualityThresholdError)
          deepStrictEqual(error.missingRatios, { close: 0.06 })
          strictEqual(error.threshold, 0.05)
          return true
        }
      )
    })

    it('should count NaN as missing', () => {
      const rows = [rawBar(T0), rawBar(T0 + MINUTE, { open: NaN })]

      const { bars, report } = new Validator({ missingThreshold: 1 }).validate(rows)

      strictEqual(report.missingByColumn.open, 1)
      ok(Number.isNaN(bars[1]?.open))
    })
  })

  describe('OHLC consistency', () => {
    const inconsistent = [rawBar(T0), rawBar(T0 + MINUTE, { high: 90 })]

    it('should report inconsistent rows without failing by default', () => {
      const { bars, report } = new Validator().validate(inconsistent)

      strictEqual(report.ohlcViolations, 1)
      strictEqual(report.validRows, 1)
      strictEqual(bars[0]?.ohlcValid, true)
      strictEqual(bars[1]?.ohlcValid, false)
    })

    it('should throw OhlcConsistencyError in strict mode', () => {
      throws(
        () => new Validator({ strictOhlc: true }).validate(inconsistent),
        (error: unknown) => {
          ok(error instanceof OhlcConsistencyError)
          deepStrictEqual(error.timestamps, [T0 + MINUTE])
          return true
        }
      )
    })

    it('should not treat missing cells as violations', () => {
      const rows = [rawBar(T0, { close: null })]

      const { report } = new Validator({ missingThreshold: 1 }).validate(rows)

      strictEqual(report.ohlcViolations, 0)
      strictEqual(report.validRows, 1)
    })
  })

  it('should mark every bar observed and unflagged', () => {
    const { bars } = new Validator().validate([rawBar(T0)])

    strictEqual(bars[0]?.provenance, 'observed')
    strictEqual(bars[0]?.isOutlier, false)
    deepStrictEqual(bars[0]?.outlierReasons, [])
  })

  it('should return an empty report for no rows', () => {
    const { bars, report } = new Validator().validate([])

    strictEqual(bars.length, 0)
    strictEqual(report.totalRows, 0)
    strictEqual(report.validRows, 0)
  })

  it('should reject a threshold outside [0, 1]', () => {
    throws(() => new Validator({ missingThreshold: 1.5 }), /missingThreshold/)
  })
})
