import { setTimeout as delay } from 'node:timers/promises'
import logger from '../utils/logger'
import { RateLimitError } from './errors'

/**
 * Rate limiter configuration
 */
export interface RateLimiterConfig {
  /** Minimum spacing between two requests to the exchange in milliseconds */
  minIntervalMs: number

  /** Maximum attempts per request, the first one included */
  maxRetries: number

  /** Backoff base in milliseconds; attempt n sleeps base * 2^n */
  backoffBaseMs: number
}

/**
 * Default rate limiter configuration
 */
export const DEFAULT_RATE_LIMITER_CONFIG: RateLimiterConfig = {
  minIntervalMs: 100,
  maxRetries: 3,
  backoffBaseMs: 1000
}

/**
 * Per-exchange request budget with exponential backoff on rate-limit errors
 *
 * One instance is shared by every symbol pipeline talking to the same
 * exchange. Slots are reserved synchronously before any await, so concurrent
 * callers are spaced `minIntervalMs` apart without a lock.
 */
export class RateLimiter {
  private readonly config: RateLimiterConfig
  private requestCount = 0
  private nextSlotAt = 0

  constructor(config: Partial<RateLimiterConfig> = {}) {
    this.config = { ...DEFAULT_RATE_LIMITER_CONFIG, ...config }

    if (!Number.isInteger(this.config.maxRetries) || this.config.maxRetries < 1) {
      throw new Error('maxRetries must be a positive integer')
    }
    if (this.config.minIntervalMs < 0 || this.config.backoffBaseMs < 0) {
      throw new Error('minIntervalMs and backoffBaseMs must not be negative')
    }
  }

  /**
   * Execute a function with rate limiting
   * Rate-limit failures are retried; anything else is rethrown immediately
   * @throws RateLimitError once every attempt was throttled
   */
  async execute<T>(fn: () => Promise<T>, context?: string, signal?: AbortSignal): Promise<T> {
    let lastError: unknown

    for (let attempt = 0; attempt < this.config.maxRetries; attempt++) {
      await this.acquire(signal)

      try {
        return await fn()
      } catch (error) {
        if (!isRateLimitError(error)) {
          throw error
        }
        lastError = error

        if (attempt < this.config.maxRetries - 1) {
          const delayMs = this.calculateBackoffDelay(attempt)
          logger.warn('Rate limit hit, backing off', {
            attempt: attempt + 1,
            maxAttempts: this.config.maxRetries,
            delayMs,
            context
          })
          await sleep(delayMs, signal)
        }
      }
    }

    const message = lastError instanceof Error ? lastError.message : String(lastError)
    logger.error('Rate limit retry exhausted', { attempts: this.config.maxRetries, context })
    throw new RateLimitError(
      `Rate limit retry exhausted after ${this.config.maxRetries} attempts: ${message}`,
      lastError instanceof Error ? lastError : undefined
    )
  }

  /**
   * Wait for the next request slot
   * @throws the signal's abort reason if cancelled while waiting
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted()

    const now = Date.now()
    const slot = Math.max(now, this.nextSlotAt)
    this.nextSlotAt = slot + this.config.minIntervalMs
    this.requestCount++

    const waitMs = slot - now
    if (waitMs > 0) {
      logger.debug('Rate limiting, waiting', { waitTimeMs: waitMs })
      await sleep(waitMs, signal)
    }
  }

  /**
   * Calculate exponential backoff delay
   */
  calculateBackoffDelay(attempt: number): number {
    return this.config.backoffBaseMs * Math.pow(2, attempt)
  }

  /**
   * Get current rate limit status
   */
  getStatus(): { requestCount: number; nextSlotAt: number } {
    return {
      requestCount: this.requestCount,
      nextSlotAt: this.nextSlotAt
    }
  }
}

/**
 * Abortable sleep that rejects with the signal's own reason
 */
async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal })
  } catch (error) {
    if (signal?.aborted) {
      throw signal.reason
    }
    throw error
  }
}

/**
 * Check if an error is a rate limit error
 */
export function isRateLimitError(error: unknown): boolean {
  if (error instanceof RateLimitError) {
    return true
  }

  if (typeof error !== 'object' || error === null) {
    return false
  }

  // Common rate limit error patterns
  if ('status' in error && error.status === 429) {
    return true
  }

  if ('code' in error && error.code === 'RATE_LIMIT_EXCEEDED') {
    return true
  }

  return error instanceof Error && error.message.toLowerCase().includes('rate limit')
}
