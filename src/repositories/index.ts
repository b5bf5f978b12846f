export { CsvCodec } from './csv-codec'
export {
  EmptyDataError,
  RepositoryError,
  RepositoryStorageError
} from './ohlcv-repository.interface'
export type {
  OhlcvRepository,
  PartitionCodec,
  StoredBar,
  WriteOptions
} from './ohlcv-repository.interface'
export { ParquetCodec } from './parquet-codec'
export { PartitionedStore } from './partitioned-store'
export type { PartitionedStoreConfig } from './partitioned-store'
