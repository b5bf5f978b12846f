import type { OhlcvDto, OutlierReason } from '../models'
import logger from '../utils/logger'

/**
 * Outlier flagging configuration
 */
export interface OutlierFlaggerConfig {
  /** Absolute close-to-close return above which a row is flagged */
  priceJump: number
  /** Multiple of the rolling mean volume above which a row is flagged */
  volumeSpike: number
  /** Trailing window of the volume mean, in bars (96 = 24h of 15-minute bars) */
  rollingWindow?: number
  /**
   * Flags random extra rows until this many are flagged
   * Manufactures outliers for downstream test fixtures; 0 disables it
   */
  minimumCount?: number
  /** Random source for the forced minimum, in [0, 1) */
  random?: () => number
}

/**
 * Marks suspicious rows based on price-jump and volume-spike heuristics
 *
 * A row is flagged when |close_t / close_{t-1} - 1| exceeds `priceJump`, or
 * when its volume exceeds `volumeSpike` times the trailing mean over
 * `rollingWindow` rows (the current row included). The first
 * `rollingWindow - 1` rows have no mean and are never flagged on volume.
 */
export class OutlierFlagger {
  private readonly config: Required<OutlierFlaggerConfig>

  constructor(config: OutlierFlaggerConfig) {
    this.config = {
      priceJump: config.priceJump,
      volumeSpike: config.volumeSpike,
      rollingWindow: config.rollingWindow ?? 96,
      minimumCount: config.minimumCount ?? 0,
      random: config.random ?? Math.random
    }

    if (!(this.config.priceJump > 0) || !(this.config.volumeSpike > 0)) {
      throw new Error('priceJump and volumeSpike must be positive')
    }
    if (!Number.isInteger(this.config.rollingWindow) || this.config.rollingWindow < 1) {
      throw new Error('rollingWindow must be a positive integer')
    }
  }

  flag(bars: readonly OhlcvDto[]): OhlcvDto[] {
    const rollingMeans = this.rollingVolumeMeans(bars)

    const flagged = bars.map((bar, index): OhlcvDto => {
      const reasons: OutlierReason[] = []
      const previous = bars[index - 1]

      if (previous && this.isPriceJump(previous.close, bar.close)) {
        reasons.push('price_jump')
      }

      const mean = rollingMeans[index]
      if (mean !== undefined && bar.volume > mean * this.config.volumeSpike) {
        reasons.push('volume_spike')
      }

      return { ...bar, isOutlier: reasons.length > 0, outlierReasons: reasons }
    })

    const result = this.config.minimumCount > 0 ? this.forceMinimum(flagged) : flagged

    const count = result.filter(bar => bar.isOutlier).length
    if (count > 0) {
      logger.info('Outliers flagged', { symbol: bars[0]?.symbol, count, total: bars.length })
    }

    return result
  }

  private isPriceJump(previousClose: number, close: number): boolean {
    if (!Number.isFinite(previousClose) || !Number.isFinite(close) || previousClose <= 0) {
      return false
    }
    return Math.abs(close / previousClose - 1) > this.config.priceJump
  }

  /**
   * Trailing mean volume per row; undefined while the window is incomplete
   * or holds a missing value
   */
  private rollingVolumeMeans(bars: readonly OhlcvDto[]): Array<number | undefined> {
    const window = this.config.rollingWindow
    const means: Array<number | undefined> = []
    let sum = 0
    let missing = 0

    bars.forEach((bar, index) => {
      if (Number.isFinite(bar.volume)) {
        sum += bar.volume
      } else {
        missing++
      }

      const leaving = bars[index - window]
      if (leaving) {
        if (Number.isFinite(leaving.volume)) {
          sum -= leaving.volume
        } else {
          missing--
        }
      }

      means.push(index >= window - 1 && missing === 0 ? sum / window : undefined)
    })

    return means
  }

  /**
   * Flags random unflagged rows until `minimumCount` rows are flagged
   */
  private forceMinimum(bars: OhlcvDto[]): OhlcvDto[] {
    const candidates = bars
      .map((bar, index) => ({ bar, index }))
      .filter(({ bar }) => !bar.isOutlier)
      .map(({ index }) => index)
    let shortfall = this.config.minimumCount - (bars.length - candidates.length)

    if (shortfall <= 0) {
      return bars
    }

    const result = [...bars]
    while (shortfall > 0 && candidates.length > 0) {
      const pick = Math.min(candidates.length - 1, Math.floor(this.config.random() * candidates.length))
      const [index] = candidates.splice(pick, 1)
      const bar = index === undefined ? undefined : result[index]
      if (index !== undefined && bar) {
        result[index] = { ...bar, isOutlier: true, outlierReasons: ['forced'] }
      }
      shortfall--
    }

    logger.warn('Forced outlier flags added to reach minimum count', {
      symbol: bars[0]?.symbol,
      minimumCount: this.config.minimumCount
    })

    return result
  }
}
