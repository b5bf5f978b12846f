import { z } from 'zod/v4'
import { MANIFEST_VERSION } from '../models/manifest'
import { getSupportedIntervals } from '../utils/intervals'

/**
 * Exchange connection settings
 * @property {string} id - ccxt exchange identifier, also used in storage paths
 * @property {object} [options] - Extra options handed to the exchange constructor
 */
const exchangeSchema = z.strictObject({
  id: z.string().regex(/^[a-z0-9]+$/).default('okx'),
  options: z.record(z.string(), z.unknown()).optional()
})

/**
 * Request budget and retry policy
 * @property {number} rateLimitMs - Minimum spacing between requests to the exchange
 * @property {number} retries - Attempts per request when rate limited
 * @property {number} backoffBaseSeconds - Backoff base; attempt n sleeps base * 2^n seconds
 * @property {number} pageLimit - Maximum rows per request
 */
const apiSchema = z.strictObject({
  rateLimitMs: z.number().min(0).default(100),
  retries: z.number().int().min(1).max(20).default(3),
  backoffBaseSeconds: z.number().min(0).default(1),
  pageLimit: z.number().int().min(1).max(10_000).default(1000)
})

const validationSchema = z.strictObject({
  missingThreshold: z.number().min(0).max(1).default(0.05),
  strictOhlc: z.boolean().default(false)
})

const gapFillSchema = z.strictObject({
  shortGapMinutes: z.number().int().min(0).default(60)
})

/**
 * Outlier heuristics
 * @property {number} priceJump - Absolute close-to-close return above which a row is flagged
 * @property {number} volumeSpike - Multiple of the rolling mean volume above which a row is flagged
 * @property {number} rollingWindow - Trailing window of the volume mean, in bars
 * @property {number} minimumCount - Forces random extra flags up to this count; 0 disables
 */
const outliersSchema = z.strictObject({
  priceJump: z.number().positive().default(0.2),
  volumeSpike: z.number().positive().default(10),
  rollingWindow: z.number().int().min(1).default(96),
  minimumCount: z.number().int().min(0).default(0)
})

const storageSchema = z.strictObject({
  root: z.string().min(1).default('data/raw'),
  format: z.enum(['parquet', 'csv']).default('parquet'),
  manifestVersion: z.string().min(1).default(MANIFEST_VERSION)
})

const collectionSchema = z.strictObject({
  symbols: z.array(z.string().min(1)).default([]),
  interval: z
    .string()
    .refine((value) => getSupportedIntervals().includes(value), {
      message: `interval must be one of: ${getSupportedIntervals().join(', ')}`
    })
    .default('15min'),
  start: z.iso.datetime({ offset: true }).optional(),
  end: z.iso.datetime({ offset: true }).optional(),
  concurrency: z.number().int().min(1).max(64).default(2),
  timeoutMs: z.number().int().positive().optional(),
  failFast: z.boolean().default(false)
})

/**
 * Complete ingestion configuration
 * Every section may be omitted; defaults are filled in by the schema
 */
export const ingestionConfigSchema = z.strictObject({
  exchange: exchangeSchema.prefault({}),
  api: apiSchema.prefault({}),
  validation: validationSchema.prefault({}),
  gapFill: gapFillSchema.prefault({}),
  outliers: outliersSchema.prefault({}),
  storage: storageSchema.prefault({}),
  collection: collectionSchema.prefault({})
})

export type IngestionConfig = z.infer<typeof ingestionConfigSchema>

export type StorageFormat = IngestionConfig['storage']['format']

/**
 * Root sections of the configuration, used to check override paths
 */
export const CONFIG_SECTIONS = Object.keys(ingestionConfigSchema.shape)
