import { deepStrictEqual, strictEqual, throws } from 'node:assert'
import { describe, it } from 'node:test'
import { GapRepairer } from '../../../src/pipeline/gap-repairer'
import { bar, MINUTE, series, T0 } from '../../helpers/bars'

describe('GapRepairer', () => {
  it('should count a long gap without filling it', () => {
    const repairer = new GapRepairer({ expectedInterval: MINUTE, shortGapMinutes: 0 })
    const bars = [bar(T0), bar(T0 + 5 * MINUTE)]

    const result = repairer.repair(bars)

    strictEqual(result.gapsDetected, 4)
    strictEqual(result.gapsFilled, 0)
    strictEqual(result.bars.length, 2)
    strictEqual(result.gaps.length, 1)
    strictEqual(result.gaps[0]?.filled, false)
    strictEqual(result.gaps[0]?.severity, 'medium')
  })

  it('should flat-fill a short gap from the last bar', () => {
    const repairer = new GapRepairer({ expectedInterval: MINUTE, shortGapMinutes: 1 })
    const bars = [bar(T0, { close: 105, high: 106 }), bar(T0 + 2 * MINUTE)]

    const result = repairer.repair(bars)

    strictEqual(result.gapsDetected, 0)
    strictEqual(result.gapsFilled, 1)
    deepStrictEqual(result.bars.map(b => b.timestamp), [T0, T0 + MINUTE, T0 + 2 * MINUTE])

    const filled = result.bars[1]
    strictEqual(filled?.provenance, 'gap_filled')
    strictEqual(filled?.close, 105)
    strictEqual(filled?.high, 106)
    strictEqual(filled?.volume, 0)
    strictEqual(result.bars[0]?.provenance, 'observed')
  })

  it('should fill a gap whose total duration equals the short-gap bound', () => {
    const repairer = new GapRepairer({ expectedInterval: 15 * MINUTE, shortGapMinutes: 60 })
    const bars = [bar(T0), bar(T0 + 5 * 15 * MINUTE)]

    const result = repairer.repair(bars)

    strictEqual(result.gapsFilled, 4)
    strictEqual(result.gapsDetected, 0)
    strictEqual(result.bars.length, 6)
  })

  it('should leave a regular series untouched', () => {
    const bars = series(10, 15 * MINUTE)

    const result = new GapRepairer({ expectedInterval: 15 * MINUTE, shortGapMinutes: 60 }).repair(bars)

    strictEqual(result.gapsDetected, 0)
    strictEqual(result.gapsFilled, 0)
    deepStrictEqual(result.bars, bars)
  })

  it('should count only whole missing steps in a misaligned gap', () => {
    const repairer = new GapRepairer({ expectedInterval: MINUTE, shortGapMinutes: 0 })

    const result = repairer.repair([bar(T0), bar(T0 + 2.6 * MINUTE)])

    strictEqual(result.gapsDetected, 1)
    strictEqual(result.gaps[0]?.missingIntervals, 1)
  })

  it('should classify large gaps as high severity', () => {
    const repairer = new GapRepairer({ expectedInterval: MINUTE, shortGapMinutes: 0 })

    const result = repairer.repair([bar(T0), bar(T0 + 20 * MINUTE)])

    strictEqual(result.gapsDetected, 19)
    strictEqual(result.gaps[0]?.severity, 'high')
  })

  it('should handle empty and single-bar input', () => {
    const repairer = new GapRepairer({ expectedInterval: MINUTE, shortGapMinutes: 5 })

    strictEqual(repairer.repair([]).bars.length, 0)
    strictEqual(repairer.repair([bar(T0)]).bars.length, 1)
  })

  it('should reject a non-positive interval', () => {
    throws(() => new GapRepairer({ expectedInterval: 0, shortGapMinutes: 1 }), /expectedInterval/)
  })
})
