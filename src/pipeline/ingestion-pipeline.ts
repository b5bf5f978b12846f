import type { Manifest, RawBar, ValidationReport } from '../models'
import type { Fetcher } from '../providers/fetcher'
import type { OhlcvRepository } from '../repositories/ohlcv-repository.interface'
import type { MissingValueHandler } from '../transforms/missing-value-handler'
import { intervalToMs } from '../utils/intervals'
import logger from '../utils/logger'
import { GapRepairer, type Gap } from './gap-repairer'
import { normalize } from './normalizer'
import type { OutlierFlagger } from './outlier-flagger'
import type { Validator } from './validator'

/**
 * Stages wired into one pipeline
 */
export interface IngestionPipelineDeps {
  fetcher: Fetcher
  validator: Validator
  missingValueHandler: MissingValueHandler
  outlierFlagger: OutlierFlagger
  store: OhlcvRepository
  /** Longest gap, in minutes, that the gap stage fills */
  shortGapMinutes: number
}

export interface IngestionResult {
  symbol: string
  interval: string
  manifest: Manifest
  report: ValidationReport
  gaps: Gap[]
}

/**
 * Runs one symbol's batch through fetch, normalize, validate, fill,
 * gap repair, outlier flagging and the partitioned write, in that order
 */
export class IngestionPipeline {
  constructor(private readonly deps: IngestionPipelineDeps) {}

  async run(
    symbol: string,
    interval: string,
    start: number,
    end?: number,
    signal?: AbortSignal
  ): Promise<IngestionResult> {
    const startedAt = Date.now()
    const gapRepairer = new GapRepairer({
      expectedInterval: intervalToMs(interval),
      shortGapMinutes: this.deps.shortGapMinutes
    })

    logger.info('Ingestion started', {
      symbol,
      interval,
      start: new Date(start).toISOString(),
      end: end === undefined ? undefined : new Date(end).toISOString()
    })

    const raw = await this.fetchAll(symbol, interval, start, end, signal)
    signal?.throwIfAborted()

    const normalized = normalize(raw)
    const { bars: validated, report: validation } = this.deps.validator.validate(normalized)
    const filled = this.deps.missingValueHandler.fill(validated)
    const repaired = gapRepairer.repair(filled)
    const flagged = this.deps.outlierFlagger.flag(repaired.bars)

    const report: ValidationReport = {
      ...validation,
      outliersDetected: flagged.filter(bar => bar.isOutlier).length,
      gapsDetected: repaired.gapsDetected,
      gapsFilled: repaired.gapsFilled
    }

    const manifest = await this.deps.store.write(flagged, symbol, interval, {
      report,
      fetchTimestamp: startedAt,
      signal
    })

    logger.info('Ingestion completed', {
      symbol,
      interval,
      rows: manifest.row_count,
      validRows: report.validRows,
      outliers: report.outliersDetected,
      gapsDetected: report.gapsDetected,
      gapsFilled: report.gapsFilled,
      durationMs: Date.now() - startedAt
    })

    return { symbol, interval, manifest, report, gaps: repaired.gaps }
  }

  /**
   * Pages through the fetcher until the cursor runs out or passes `end`
   */
  private async fetchAll(
    symbol: string,
    interval: string,
    start: number,
    end: number | undefined,
    signal: AbortSignal | undefined
  ): Promise<RawBar[]> {
    const rows: RawBar[] = []
    let cursor: number | undefined = start
    let pages = 0

    while (cursor !== undefined) {
      signal?.throwIfAborted()

      const page = await this.deps.fetcher.fetchWindow(symbol, interval, cursor, end, signal)
      rows.push(...page.rows)
      pages++

      const next = page.nextCursor
      if (next === undefined || next <= cursor || (end !== undefined && next > end)) {
        break
      }
      cursor = next
    }

    logger.debug('Fetch complete', { symbol, pages, rows: rows.length })
    return rows
  }
}
