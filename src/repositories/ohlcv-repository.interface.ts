import type { Manifest, OhlcvDto, ValidationReport } from '../models'

/**
 * Bar as stored in a partition file
 */
export type StoredBar = Pick<
  OhlcvDto,
  'symbol' | 'timestamp' | 'open' | 'high' | 'low' | 'close' | 'volume' | 'provenance' | 'isOutlier'
>

/**
 * Options for a partitioned write
 */
export interface WriteOptions {
  /** Quality report folded into the manifest */
  report?: ValidationReport
  /** When the batch was fetched, in Unix milliseconds (default: now) */
  fetchTimestamp?: number
  /** Abort before the partitions are committed */
  signal?: AbortSignal
}

/**
 * Storage for validated bars, partitioned by UTC calendar date
 */
export interface OhlcvRepository {
  /**
   * Writes one file per date and then the series manifest
   * @returns The manifest that was written
   * @throws EmptyDataError if bars is empty
   * @throws RepositoryStorageError on filesystem failure
   */
  write(bars: readonly OhlcvDto[], symbol: string, interval: string, options?: WriteOptions): Promise<Manifest>

  /**
   * @returns The manifest of a series, or null if none was written yet
   */
  readManifest(symbol: string, interval: string): Promise<Manifest | null>

  /**
   * @param date Calendar date as YYYY-MM-DD
   */
  readPartition(symbol: string, interval: string, date: string): Promise<StoredBar[]>

  /**
   * @returns Dates (YYYY-MM-DD) with a partition file, ascending
   */
  listPartitions(symbol: string, interval: string): Promise<string[]>
}

/**
 * Reads and writes the bars of one partition file
 */
export interface PartitionCodec {
  /** File extension without the dot */
  readonly extension: string
  write(filePath: string, bars: readonly StoredBar[]): Promise<void>
  read(filePath: string): Promise<StoredBar[]>
}

/**
 * Repository error types
 */
export class RepositoryError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public override readonly cause?: Error
  ) {
    super(message)
    this.name = 'RepositoryError'
  }
}

/**
 * Nothing to write
 */
export class EmptyDataError extends RepositoryError {
  constructor(message: string) {
    super(message, 'EMPTY_DATA')
    this.name = 'EmptyDataError'
  }
}

/**
 * Storage error when there are issues with the underlying storage
 */
export class RepositoryStorageError extends RepositoryError {
  constructor(message: string, cause?: Error) {
    super(message, 'STORAGE_ERROR', cause)
    this.name = 'RepositoryStorageError'
  }
}
