export { CcxtExchangeClient, getSupportedExchanges, mapExchangeError } from './ccxt/ccxt-exchange-client'
export type { CcxtClientConfig } from './ccxt/ccxt-exchange-client'
export { ProviderError, RateLimitError, TransientNetworkError } from './errors'
export { Fetcher } from './fetcher'
export type { FetcherConfig, FetchWindowResult } from './fetcher'
export { DEFAULT_RATE_LIMITER_CONFIG, isRateLimitError, RateLimiter } from './rate-limiter'
export type { RateLimiterConfig } from './rate-limiter'
