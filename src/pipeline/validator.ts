import {
  formatOhlcv,
  isConsistentOhlcv,
  isPresent,
  REQUIRED_COLUMNS,
  type OhlcvColumn,
  type OhlcvDto,
  type RawBar,
  type ValidationReport
} from '../models'
import logger from '../utils/logger'
import { OhlcConsistencyError, QualityThresholdError, SchemaError } from './errors'

/**
 * Validator configuration
 */
export interface ValidatorConfig {
  /** Largest tolerated share of missing values per column (inclusive) */
  missingThreshold: number

  /** Reject the batch on any OHLC inconsistency instead of only reporting it */
  strictOhlc: boolean
}

export const DEFAULT_VALIDATOR_CONFIG: ValidatorConfig = {
  missingThreshold: 0.05,
  strictOhlc: false
}

export interface ValidationResult {
  bars: OhlcvDto[]
  report: ValidationReport
}

/**
 * Checks schema completeness, missing-value ratios and OHLC consistency
 *
 * Runs on raw, normalized rows: the missing-value threshold is judged before
 * anything is filled.
 */
export class Validator {
  private readonly config: ValidatorConfig

  constructor(config: Partial<ValidatorConfig> = {}) {
    this.config = { ...DEFAULT_VALIDATOR_CONFIG, ...config }

    if (this.config.missingThreshold < 0 || this.config.missingThreshold > 1) {
      throw new Error('missingThreshold must be between 0 and 1')
    }
  }

  /**
   * @throws SchemaError if a required column is absent from every row
   * @throws QualityThresholdError if a column's missing ratio exceeds the threshold
   * @throws OhlcConsistencyError on inconsistent rows when strictOhlc is set
   */
  validate(rows: readonly RawBar[]): ValidationResult {
    const totalRows = rows.length

    if (totalRows > 0) {
      this.checkSchema(rows)
    }

    const missingByColumn = this.countMissing(rows)
    this.checkMissingRatios(missingByColumn, totalRows)

    const bars = rows.map((row): OhlcvDto => {
      const values = {
        open: toNumber(row.open),
        high: toNumber(row.high),
        low: toNumber(row.low),
        close: toNumber(row.close),
        volume: toNumber(row.volume)
      }

      return {
        symbol: row.symbol,
        timestamp: row.timestamp,
        ...values,
        provenance: 'observed',
        ohlcValid: isConsistentOhlcv(values),
        isOutlier: false,
        outlierReasons: []
      }
    })

    const inconsistent = bars.filter(bar => !bar.ohlcValid)
    if (inconsistent.length > 0) {
      if (this.config.strictOhlc) {
        throw new OhlcConsistencyError(
          `${inconsistent.length} of ${totalRows} rows break OHLC relationships`,
          inconsistent.map(bar => bar.timestamp)
        )
      }

      logger.warn('OHLC inconsistencies detected', {
        symbol: inconsistent[0]?.symbol,
        count: inconsistent.length,
        first: inconsistent[0] && formatOhlcv(inconsistent[0])
      })
    }

    const report: ValidationReport = {
      totalRows,
      validRows: totalRows - inconsistent.length,
      outliersDetected: 0,
      gapsDetected: 0,
      gapsFilled: 0,
      missingByColumn,
      ohlcViolations: inconsistent.length
    }

    return { bars, report }
  }

  /**
   * A column is absent when no row carries the key at all
   */
  private checkSchema(rows: readonly RawBar[]): void {
    const missingColumns = REQUIRED_COLUMNS.filter(
      column => !rows.some(row => column in row)
    )

    if (missingColumns.length > 0) {
      throw new SchemaError(
        `Missing required columns: ${missingColumns.join(', ')}`,
        missingColumns
      )
    }
  }

  private countMissing(rows: readonly RawBar[]): Record<OhlcvColumn, number> {
    const counts: Record<OhlcvColumn, number> = {
      open: 0,
      high: 0,
      low: 0,
      close: 0,
      volume: 0
    }

    for (const row of rows) {
      for (const column of REQUIRED_COLUMNS) {
        if (!isPresent(row[column])) {
          counts[column]++
        }
      }
    }

    return counts
  }

  private checkMissingRatios(missingByColumn: Record<OhlcvColumn, number>, totalRows: number): void {
    if (totalRows === 0) {
      return
    }

    const offending: Partial<Record<OhlcvColumn, number>> = {}
    for (const column of REQUIRED_COLUMNS) {
      const ratio = missingByColumn[column] / totalRows
      if (ratio > this.config.missingThreshold) {
        offending[column] = ratio
      }
    }

    const columns = Object.keys(offending)
    if (columns.length > 0) {
      throw new QualityThresholdError(
        `Missing data exceeds threshold ${this.config.missingThreshold} in: ${columns.join(', ')}`,
        offending,
        this.config.missingThreshold
      )
    }
  }
}

function toNumber(value: number | null | undefined): number {
  return isPresent(value) ? value : NaN
}
