import { REQUIRED_COLUMNS, type OhlcvColumn, type OhlcvDto } from '../models'
import logger from '../utils/logger'

/**
 * Parameters for missing value handling
 */
export interface MissingValueParams {
  /** Fields to fill (default: all price and volume columns) */
  fields?: readonly OhlcvColumn[]

  /** Maximum number of consecutive values to fill per field (default: unlimited) */
  maxFillGap?: number
}

/**
 * Forward-fills missing cells from the last observed value of the same column
 *
 * Runs after validation has judged raw completeness. Rows that receive a
 * carried value are returned as new bars with provenance `forward_filled`;
 * leading missing cells have nothing to carry and stay NaN.
 */
export class MissingValueHandler {
  private readonly fields: readonly OhlcvColumn[]
  private readonly maxFillGap: number

  constructor(params: MissingValueParams = {}) {
    this.fields = params.fields ?? REQUIRED_COLUMNS
    this.maxFillGap = params.maxFillGap ?? Number.POSITIVE_INFINITY

    if (this.maxFillGap < 1) {
      throw new Error('maxFillGap must be at least 1')
    }
  }

  fill(bars: readonly OhlcvDto[]): OhlcvDto[] {
    const lastValid = new Map<OhlcvColumn, number>()
    const runLength = new Map<OhlcvColumn, number>()
    let filledRows = 0

    const result = bars.map((bar) => {
      const updates: Partial<Record<OhlcvColumn, number>> = {}

      for (const field of this.fields) {
        const value = bar[field]

        if (Number.isFinite(value)) {
          lastValid.set(field, value)
          runLength.set(field, 0)
          continue
        }

        const carried = lastValid.get(field)
        const run = (runLength.get(field) ?? 0) + 1
        runLength.set(field, run)

        if (carried !== undefined && run <= this.maxFillGap) {
          updates[field] = carried
        }
      }

      if (Object.keys(updates).length === 0) {
        return bar
      }

      filledRows++
      return { ...bar, ...updates, provenance: 'forward_filled' as const }
    })

    if (filledRows > 0) {
      logger.debug('Forward-filled missing values', {
        symbol: bars[0]?.symbol,
        rows: filledRows
      })
    }

    return result
  }
}
