import {
  binance,
  bybit,
  coinbase,
  DDoSProtection,
  kraken,
  NetworkError,
  okx,
  RateLimitExceeded,
  type Exchange
} from 'ccxt'
import type { ExchangeClient, RawOhlcvRow } from '../../interfaces'
import logger from '../../utils/logger'
import { RateLimitError, TransientNetworkError } from '../errors'

type ExchangeConstructor = new (config?: Record<string, unknown>) => Exchange

// Exchanges the collector has been run against
const EXCHANGES: Record<string, ExchangeConstructor> = {
  binance,
  bybit,
  coinbase,
  kraken,
  okx
}

/**
 * Configuration options for the ccxt-backed client
 */
export interface CcxtClientConfig {
  /** Exchange identifier (e.g., 'okx') */
  exchangeId: string

  /** Extra options handed to the ccxt exchange constructor */
  options?: Record<string, unknown>
}

/**
 * ExchangeClient over a ccxt exchange instance
 * ccxt's built-in throttling is disabled; the shared RateLimiter owns the budget
 */
export class CcxtExchangeClient implements ExchangeClient {
  readonly id: string
  private readonly exchange: Exchange

  constructor(config: CcxtClientConfig) {
    const Constructor = EXCHANGES[config.exchangeId]
    if (!Constructor) {
      throw new Error(
        `Unsupported exchange: ${config.exchangeId}. Supported: ${getSupportedExchanges().join(', ')}`
      )
    }

    this.id = config.exchangeId
    this.exchange = new Constructor({
      ...config.options,
      enableRateLimit: false
    })

    logger.info('Exchange client initialized', { exchange: this.id })
  }

  async fetchOhlcv(
    symbol: string,
    timeframe: string,
    since: number,
    limit: number
  ): Promise<RawOhlcvRow[]> {
    try {
      return await this.exchange.fetchOHLCV(symbol, timeframe, since, limit)
    } catch (error) {
      throw mapExchangeError(error, `${this.id} ${symbol} ${timeframe}`)
    }
  }

  async close(): Promise<void> {
    // REST-only usage holds no sockets
    logger.debug('Exchange client closed', { exchange: this.id })
  }
}

export function getSupportedExchanges(): string[] {
  return Object.keys(EXCHANGES)
}

/**
 * Maps ccxt errors onto the pipeline's provider errors
 * Anything that is not a network failure is returned unchanged
 */
export function mapExchangeError(error: unknown, context: string): unknown {
  if (error instanceof RateLimitExceeded || error instanceof DDoSProtection) {
    return new RateLimitError(`Rate limited by exchange (${context}): ${error.message}`, error)
  }

  if (error instanceof NetworkError) {
    return new TransientNetworkError(`Network failure (${context}): ${error.message}`, error)
  }

  return error
}
