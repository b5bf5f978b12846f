import type { OhlcvColumn } from './ohlcv.dto'

/**
 * Per-batch data quality summary
 * Started by the validator and completed by the gap and outlier stages
 */
export interface ValidationReport {
  readonly totalRows: number

  /** Rows that passed the OHLC consistency check */
  readonly validRows: number

  readonly outliersDetected: number

  /** Missing expected intervals left unrepaired */
  readonly gapsDetected: number

  /** Rows synthesized for short gaps */
  readonly gapsFilled: number

  readonly missingByColumn: Readonly<Record<OhlcvColumn, number>>

  /** Rows that broke at least one OHLC relationship */
  readonly ohlcViolations: number
}

/**
 * Snake-case form written into the manifest
 */
export interface ValidationReportRecord {
  total_rows: number
  valid_rows: number
  outliers_detected: number
  gaps_detected: number
  gaps_filled: number
  missing_by_column: Record<string, number>
  ohlc_violations: number
}

export function toValidationReportRecord(report: ValidationReport): ValidationReportRecord {
  return {
    total_rows: report.totalRows,
    valid_rows: report.validRows,
    outliers_detected: report.outliersDetected,
    gaps_detected: report.gapsDetected,
    gaps_filled: report.gapsFilled,
    missing_by_column: { ...report.missingByColumn },
    ohlc_violations: report.ohlcViolations
  }
}
