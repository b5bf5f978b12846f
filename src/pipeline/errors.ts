import type { OhlcvColumn } from '../models'

/**
 * Base class for fatal data-quality failures of a batch
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public override readonly cause?: Error
  ) {
    super(message)
    this.name = 'PipelineError'
  }
}

/**
 * Required columns are absent from the batch entirely
 */
export class SchemaError extends PipelineError {
  constructor(
    message: string,
    public readonly missingColumns: readonly OhlcvColumn[]
  ) {
    super(message, 'SCHEMA_ERROR')
    this.name = 'SchemaError'
  }
}

/**
 * The share of missing values in a column exceeds the configured threshold
 */
export class QualityThresholdError extends PipelineError {
  constructor(
    message: string,
    public readonly missingRatios: Readonly<Partial<Record<OhlcvColumn, number>>>,
    public readonly threshold: number
  ) {
    super(message, 'QUALITY_THRESHOLD')
    this.name = 'QualityThresholdError'
  }
}

/**
 * OHLC relationships are broken and strict validation is enabled
 */
export class OhlcConsistencyError extends PipelineError {
  constructor(
    message: string,
    public readonly timestamps: readonly number[]
  ) {
    super(message, 'OHLC_INCONSISTENT')
    this.name = 'OhlcConsistencyError'
  }
}
