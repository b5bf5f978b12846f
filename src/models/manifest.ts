import { z } from 'zod/v4'

/**
 * Manifest schema version written by this release
 */
export const MANIFEST_VERSION = '1.0.0'

const partitionEntrySchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  file: z.string(),
  row_count: z.number().int().nonnegative(),
  /** Hex SHA-256 of the partition file */
  sha256: z.string().regex(/^[0-9a-f]{64}$/)
})

const validationSchema = z.object({
  total_rows: z.number().int().nonnegative(),
  valid_rows: z.number().int().nonnegative(),
  outliers_detected: z.number().int().nonnegative(),
  gaps_detected: z.number().int().nonnegative(),
  gaps_filled: z.number().int().nonnegative(),
  missing_by_column: z.record(z.string(), z.number().int().nonnegative()),
  ohlc_violations: z.number().int().nonnegative()
})

/**
 * Manifest written beside the partitions of one (symbol, interval)
 * Keys are the on-disk names read by downstream consumers
 */
export const manifestSchema = z.object({
  exchange_id: z.string(),
  symbol: z.string(),
  interval: z.string(),
  start_timestamp: z.iso.datetime({ offset: true }),
  end_timestamp: z.iso.datetime({ offset: true }),
  fetch_timestamp: z.iso.datetime({ offset: true }),
  version: z.string(),
  row_count: z.number().int().nonnegative(),
  format: z.enum(['parquet', 'csv']),
  partitions: z.array(partitionEntrySchema),
  validation: validationSchema.optional()
})

export type Manifest = z.infer<typeof manifestSchema>

export type PartitionEntry = z.infer<typeof partitionEntrySchema>
