export {
  OhlcConsistencyError,
  PipelineError,
  QualityThresholdError,
  SchemaError
} from './errors'
export { GapRepairer } from './gap-repairer'
export type { Gap, GapRepairerConfig, GapRepairResult } from './gap-repairer'
export { IngestionPipeline } from './ingestion-pipeline'
export type { IngestionPipelineDeps, IngestionResult } from './ingestion-pipeline'
export { IngestionRunner } from './ingestion-runner'
export type {
  BatchRequest,
  BatchSummary,
  IngestionRunnerConfig,
  SymbolOutcome,
  SymbolPipeline
} from './ingestion-runner'
export { normalize } from './normalizer'
export { OutlierFlagger } from './outlier-flagger'
export type { OutlierFlaggerConfig } from './outlier-flagger'
export { DEFAULT_VALIDATOR_CONFIG, Validator } from './validator'
export type { ValidationResult, ValidatorConfig } from './validator'
