import type { OhlcvDto } from '../models'
import logger from '../utils/logger'

/**
 * Gap information
 */
export interface Gap {
  symbol: string
  /** Timestamp of the last bar before the gap */
  startTime: number
  /** Timestamp of the first bar after the gap */
  endTime: number
  /** Number of expected bars missing between the two */
  missingIntervals: number
  /** Whether the gap was short enough to be flat-filled */
  filled: boolean
  severity: 'low' | 'medium' | 'high'
  description: string
}

/**
 * Gap repair configuration
 */
export interface GapRepairerConfig {
  /** Expected time interval between records in milliseconds */
  expectedInterval: number
  /** Longest gap, in minutes, that is filled rather than only counted */
  shortGapMinutes: number
  /** Slack in milliseconds before a delta counts as a gap */
  tolerance?: number
}

export interface GapRepairResult {
  bars: OhlcvDto[]
  /** Missing intervals left unrepaired */
  gapsDetected: number
  /** Rows synthesized for short gaps */
  gapsFilled: number
  gaps: Gap[]
}

/**
 * Finds missing intervals in a sorted, deduplicated series
 *
 * Short gaps (total missing duration within `shortGapMinutes`) are flat-filled
 * from the last known bar with zero volume. Longer gaps are left open and
 * their missing intervals are counted.
 */
export class GapRepairer {
  private readonly config: Required<GapRepairerConfig>

  constructor(config: GapRepairerConfig) {
    this.config = {
      expectedInterval: config.expectedInterval,
      shortGapMinutes: config.shortGapMinutes,
      tolerance: config.tolerance ?? 1
    }

    if (!(this.config.expectedInterval > 0)) {
      throw new Error('expectedInterval must be positive')
    }
    if (this.config.shortGapMinutes < 0) {
      throw new Error('shortGapMinutes must not be negative')
    }
  }

  repair(bars: readonly OhlcvDto[]): GapRepairResult {
    const { expectedInterval, tolerance } = this.config
    const shortGapMs = this.config.shortGapMinutes * 60_000
    const repaired: OhlcvDto[] = []
    const gaps: Gap[] = []
    let gapsDetected = 0
    let gapsFilled = 0

    let previous: OhlcvDto | undefined

    for (const current of bars) {
      if (previous) {
        const delta = current.timestamp - previous.timestamp

        const missingIntervals = Math.floor(delta / expectedInterval) - 1

        if (delta > expectedInterval + tolerance && missingIntervals > 0) {
          const filled = missingIntervals * expectedInterval <= shortGapMs

          if (filled) {
            for (let step = 1; step <= missingIntervals; step++) {
              repaired.push(flatFill(previous, previous.timestamp + step * expectedInterval))
            }
            gapsFilled += missingIntervals
          } else {
            gapsDetected += missingIntervals
          }

          gaps.push(this.describeGap(previous, current, missingIntervals, filled))
        }
      }

      repaired.push(current)
      previous = current
    }

    if (gaps.length > 0) {
      logger.info('Gaps detected', {
        symbol: bars[0]?.symbol,
        gaps: gaps.length,
        gapsDetected,
        gapsFilled
      })
    }

    return { bars: repaired, gapsDetected, gapsFilled, gaps }
  }

  private describeGap(
    previous: OhlcvDto,
    current: OhlcvDto,
    missingIntervals: number,
    filled: boolean
  ): Gap {
    const severity = missingIntervals > 10 ? 'high' : missingIntervals > 3 ? 'medium' : 'low'
    const action = filled ? 'Filled' : 'Missing'

    return {
      symbol: current.symbol,
      startTime: previous.timestamp,
      endTime: current.timestamp,
      missingIntervals,
      filled,
      severity,
      description: `${action} ${missingIntervals} expected records between ${new Date(previous.timestamp).toISOString()} and ${new Date(current.timestamp).toISOString()}`
    }
  }
}

/**
 * New bar carrying the last known prices forward with zero volume
 */
function flatFill(last: OhlcvDto, timestamp: number): OhlcvDto {
  return {
    symbol: last.symbol,
    timestamp,
    open: last.open,
    high: last.high,
    low: last.low,
    close: last.close,
    volume: 0,
    provenance: 'gap_filled',
    ohlcValid: last.ohlcValid,
    isOutlier: false,
    outlierReasons: []
  }
}
