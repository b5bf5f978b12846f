/**
 * One row as returned by an exchange: [timestamp, open, high, low, close, volume]
 * Any value may be missing
 */
export type RawOhlcvRow = readonly (number | null | undefined)[]

/**
 * Narrow view of an exchange connection
 * Implementations own authentication and transport; rate limiting and retries
 * are applied by the fetcher on top of this interface
 */
export interface ExchangeClient {
  /** Exchange identifier used in storage paths and manifests (e.g., 'okx') */
  readonly id: string

  /**
   * Fetches up to `limit` bars starting at `since`
   * @param symbol Exchange pair identifier (e.g., 'BTC/USDT')
   * @param timeframe Exchange timeframe token (e.g., '15m')
   * @param since Start timestamp in Unix milliseconds (inclusive)
   * @param limit Maximum number of rows to return
   * @throws RateLimitError when the exchange throttles the request
   * @throws TransientNetworkError on recoverable network failures
   */
  fetchOhlcv(
    symbol: string,
    timeframe: string,
    since: number,
    limit: number
  ): Promise<RawOhlcvRow[]>

  /**
   * Releases any connection held by the client
   */
  close(): Promise<void>
}
