/**
 * Price and volume columns every bar must carry
 */
export const REQUIRED_COLUMNS = ['open', 'high', 'low', 'close', 'volume'] as const

export type OhlcvColumn = (typeof REQUIRED_COLUMNS)[number]

/**
 * Raw bar as handed over by the fetcher
 * Values are loosely typed: the exchange may omit a column or send null
 */
export interface RawBar {
  /** Trading pair symbol as the exchange names it (e.g., 'BTC/USDT') */
  symbol: string

  /** Unix timestamp in milliseconds (UTC) */
  timestamp: number

  open?: number | null
  high?: number | null
  low?: number | null
  close?: number | null
  volume?: number | null
}

/**
 * Where a bar's values came from
 * - observed: as received from the exchange
 * - forward_filled: at least one missing cell was carried forward
 * - gap_filled: synthesized for a missing timestamp
 */
export type BarProvenance = 'observed' | 'forward_filled' | 'gap_filled'

/**
 * Why a bar was flagged as an outlier
 */
export type OutlierReason = 'price_jump' | 'volume_spike' | 'forced'

/**
 * OHLCV (Open, High, Low, Close, Volume) bar after validation
 * Missing values are carried as NaN
 */
export interface OhlcvDto {
  /** Trading pair symbol (e.g., 'BTC/USDT') */
  readonly symbol: string

  /** Unix timestamp in milliseconds (UTC) */
  readonly timestamp: number

  /** Opening price for the time period */
  readonly open: number

  /** Highest price during the time period */
  readonly high: number

  /** Lowest price during the time period */
  readonly low: number

  /** Closing price for the time period */
  readonly close: number

  /** Volume traded during the time period */
  readonly volume: number

  readonly provenance: BarProvenance

  /** Advisory result of the OHLC consistency check */
  readonly ohlcValid: boolean

  readonly isOutlier: boolean

  readonly outlierReasons: readonly OutlierReason[]
}

/**
 * Returns true when a cell holds a usable number
 */
export function isPresent(value: number | null | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value)
}

/**
 * Checks the OHLC relationships over the values that are present
 * Missing cells are not violations; they are counted separately
 * @returns true if no present value breaks an invariant
 */
export function isConsistentOhlcv(data: Pick<OhlcvDto, OhlcvColumn>): boolean {
  const { open, high, low, close, volume } = data
  const prices = [open, high, low, close].filter(isPresent)

  // Check non-positive prices
  if (prices.some(price => price <= 0)) {
    return false
  }

  if (isPresent(high)) {
    if ([open, low, close].filter(isPresent).some(value => high < value)) {
      return false
    }
  }

  if (isPresent(low)) {
    if ([open, close].filter(isPresent).some(value => low > value)) {
      return false
    }
  }

  return !(isPresent(volume) && volume < 0)
}

/**
 * Formats an OHLCV bar as a string for logging
 */
export function formatOhlcv(data: Pick<OhlcvDto, 'timestamp' | OhlcvColumn>): string {
  const date = new Date(data.timestamp).toISOString()
  return `${date} O:${data.open} H:${data.high} L:${data.low} C:${data.close} V:${data.volume}`
}
