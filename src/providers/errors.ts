/**
 * Base class for failures raised while talking to an exchange
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public override readonly cause?: Error
  ) {
    super(message)
    this.name = 'ProviderError'
  }
}

/**
 * The exchange refused the request because the rate limit was hit
 * Retried by the fetcher with exponential backoff
 */
export class RateLimitError extends ProviderError {
  constructor(message: string, cause?: Error) {
    super(message, 'RATE_LIMIT', cause)
    this.name = 'RateLimitError'
  }
}

/**
 * Recoverable network failure (timeout, connection reset, exchange unavailable)
 */
export class TransientNetworkError extends ProviderError {
  constructor(message: string, cause?: Error) {
    super(message, 'TRANSIENT_NETWORK', cause)
    this.name = 'TransientNetworkError'
  }
}
