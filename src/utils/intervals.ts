/**
 * Error thrown for an interval label the pipeline cannot map
 */
export class IntervalError extends Error {
  constructor(
    message: string,
    public readonly interval: string
  ) {
    super(message)
    this.name = 'IntervalError'
  }
}

interface IntervalEntry {
  /** Exchange timeframe token */
  readonly timeframe: string
  /** Spacing between consecutive bars in milliseconds */
  readonly ms: number
}

const MINUTE_MS = 60_000

// Map from interval label to exchange timeframe
const INTERVALS: Record<string, IntervalEntry> = {
  '1min': { timeframe: '1m', ms: MINUTE_MS },
  '5min': { timeframe: '5m', ms: 5 * MINUTE_MS },
  '15min': { timeframe: '15m', ms: 15 * MINUTE_MS },
  '30min': { timeframe: '30m', ms: 30 * MINUTE_MS },
  '1h': { timeframe: '1h', ms: 60 * MINUTE_MS },
  '4h': { timeframe: '4h', ms: 240 * MINUTE_MS },
  '1d': { timeframe: '1d', ms: 1440 * MINUTE_MS },
  '1w': { timeframe: '1w', ms: 10080 * MINUTE_MS }
}

function lookup(interval: string): IntervalEntry {
  const entry = INTERVALS[interval]
  if (!entry) {
    throw new IntervalError(
      `Unsupported interval: ${interval}. Supported: ${getSupportedIntervals().join(', ')}`,
      interval
    )
  }
  return entry
}

/**
 * Converts an interval label (e.g., '15min') to the exchange timeframe token ('15m')
 */
export function toTimeframe(interval: string): string {
  return lookup(interval).timeframe
}

/**
 * Spacing of an interval label in milliseconds
 */
export function intervalToMs(interval: string): number {
  return lookup(interval).ms
}

export function getSupportedIntervals(): string[] {
  return Object.keys(INTERVALS)
}

/**
 * UTC calendar date (YYYY-MM-DD) of a timestamp
 */
export function toUtcDate(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10)
}
