export {
  formatOhlcv,
  isConsistentOhlcv,
  isPresent,
  REQUIRED_COLUMNS
} from './ohlcv.dto'
export type {
  BarProvenance,
  OhlcvColumn,
  OhlcvDto,
  OutlierReason,
  RawBar
} from './ohlcv.dto'
export { MANIFEST_VERSION, manifestSchema } from './manifest'
export type { Manifest, PartitionEntry } from './manifest'
export { toValidationReportRecord } from './validation-report'
export type { ValidationReport, ValidationReportRecord } from './validation-report'
