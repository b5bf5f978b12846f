import type { ExchangeClient, RawOhlcvRow } from '../interfaces'
import { REQUIRED_COLUMNS as ROW_COLUMNS, type RawBar } from '../models'
import { toTimeframe } from '../utils/intervals'
import logger from '../utils/logger'
import type { RateLimiter } from './rate-limiter'

/**
 * Fetcher configuration
 */
export interface FetcherConfig {
  /** Maximum rows requested per call */
  pageLimit: number
}

/**
 * Result of one bounded request
 */
export interface FetchWindowResult {
  rows: RawBar[]
  /**
   * Timestamp to resume from when the page came back full
   * Undefined once the window is exhausted
   */
  nextCursor?: number
}

/**
 * Retrieves windows of raw bars from an exchange
 *
 * Each call issues exactly one request. Paging is left to the caller, which
 * resumes from `nextCursor` until it comes back undefined.
 */
export class Fetcher {
  private readonly pageLimit: number

  constructor(
    private readonly client: ExchangeClient,
    private readonly rateLimiter: RateLimiter,
    config: Partial<FetcherConfig> = {}
  ) {
    this.pageLimit = config.pageLimit ?? 1000

    if (!Number.isInteger(this.pageLimit) || this.pageLimit < 1) {
      throw new Error('pageLimit must be a positive integer')
    }
  }

  get exchangeId(): string {
    return this.client.id
  }

  /**
   * Fetches one page of bars starting at `since`
   * @param end Optional inclusive upper bound; later rows are dropped
   * @throws RateLimitError when retries are exhausted
   * @throws TransientNetworkError on network failures
   */
  async fetchWindow(
    symbol: string,
    interval: string,
    since: number,
    end?: number,
    signal?: AbortSignal
  ): Promise<FetchWindowResult> {
    const timeframe = toTimeframe(interval)

    logger.debug('Fetching window', {
      exchange: this.client.id,
      symbol,
      timeframe,
      since: new Date(since).toISOString(),
      limit: this.pageLimit
    })

    const response = await this.rateLimiter.execute(
      () => this.client.fetchOhlcv(symbol, timeframe, since, this.pageLimit),
      `fetchWindow:${symbol}`,
      signal
    )

    const converted = response
      .map(row => convertRow(row, symbol))
      .filter((row): row is RawBar => row !== null)

    const lastTimestamp = converted.reduce(
      (max, row) => Math.max(max, row.timestamp),
      Number.NEGATIVE_INFINITY
    )

    const rows = end === undefined
      ? converted
      : converted.filter(row => row.timestamp <= end)

    const pageFull = response.length >= this.pageLimit
    const pastEnd = end !== undefined && lastTimestamp >= end
    const nextCursor = pageFull && !pastEnd && Number.isFinite(lastTimestamp)
      ? lastTimestamp + 1
      : undefined

    logger.debug('Window fetched', {
      symbol,
      received: response.length,
      kept: rows.length,
      nextCursor
    })

    return { rows, nextCursor }
  }
}

/**
 * Converts an exchange row into a RawBar
 * Rows without a usable timestamp are dropped
 */
function convertRow(row: RawOhlcvRow, symbol: string): RawBar | null {
  const [timestamp] = row

  if (typeof timestamp !== 'number' || !Number.isFinite(timestamp)) {
    logger.warn('Dropping row without timestamp', { symbol, row })
    return null
  }

  const bar: RawBar = { symbol, timestamp }

  // Short rows leave the trailing columns absent rather than null
  ROW_COLUMNS.forEach((column, index) => {
    if (index + 1 < row.length) {
      bar[column] = toCell(row[index + 1])
    }
  })

  return bar
}

function toCell(value: number | null | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null
}
