import logger from '../utils/logger'
import type { IngestionPipeline, IngestionResult } from './ingestion-pipeline'

/**
 * Batch runner configuration
 */
export interface IngestionRunnerConfig {
  /** Maximum symbols processed at once */
  concurrency?: number
  /** Per-symbol deadline in milliseconds */
  timeoutMs?: number
  /** Abort the remaining symbols after the first failure */
  failFast?: boolean
}

/**
 * The part of a pipeline the runner drives
 */
export type SymbolPipeline = Pick<IngestionPipeline, 'run'>

export interface BatchRequest {
  interval: string
  /** Unix milliseconds */
  start: number
  end?: number
}

export type SymbolOutcome =
  | { symbol: string; status: 'succeeded'; result: IngestionResult }
  | { symbol: string; status: 'failed'; error: Error }

export interface BatchSummary {
  outcomes: SymbolOutcome[]
  succeeded: number
  failed: number
}

/**
 * Runs one pipeline per symbol with bounded concurrency
 *
 * All symbols share the pipeline's fetcher and therefore its rate limiter.
 * A failed symbol is recorded and the others carry on unless failFast is set.
 */
export class IngestionRunner {
  private readonly config: Required<Omit<IngestionRunnerConfig, 'timeoutMs'>> & { timeoutMs?: number }

  constructor(
    private readonly pipeline: SymbolPipeline,
    config: IngestionRunnerConfig = {}
  ) {
    this.config = {
      concurrency: config.concurrency ?? 2,
      timeoutMs: config.timeoutMs,
      failFast: config.failFast ?? false
    }

    if (!Number.isInteger(this.config.concurrency) || this.config.concurrency < 1) {
      throw new Error('concurrency must be a positive integer')
    }
  }

  /**
   * Repeated symbols run once, at their first position
   */
  async run(requested: readonly string[], request: BatchRequest, signal?: AbortSignal): Promise<BatchSummary> {
    const symbols = [...new Set(requested)]
    if (symbols.length < requested.length) {
      logger.warn('Ignoring repeated symbols', { requested: requested.length, unique: symbols.length })
    }

    const batchController = new AbortController()
    const batchSignal = signal ? AbortSignal.any([signal, batchController.signal]) : batchController.signal
    const outcomes: SymbolOutcome[] = []
    let next = 0

    logger.info('Batch started', {
      symbols: symbols.length,
      interval: request.interval,
      concurrency: this.config.concurrency
    })

    const worker = async (): Promise<void> => {
      while (next < symbols.length) {
        const index = next++
        const symbol = symbols[index]
        if (symbol === undefined) {
          return
        }

        const outcome = await this.runSymbol(symbol, request, batchSignal)
        outcomes[index] = outcome

        if (outcome.status === 'failed' && this.config.failFast && !batchController.signal.aborted) {
          logger.warn('Aborting remaining symbols after failure', { symbol })
          batchController.abort(new Error(`Batch aborted after ${symbol} failed`, { cause: outcome.error }))
        }
      }
    }

    const workers = Array.from(
      { length: Math.min(this.config.concurrency, symbols.length) },
      () => worker()
    )
    await Promise.all(workers)

    const succeeded = outcomes.filter(outcome => outcome.status === 'succeeded').length
    const failed = outcomes.length - succeeded

    logger.info('Batch completed', { succeeded, failed })

    return { outcomes, succeeded, failed }
  }

  private async runSymbol(symbol: string, request: BatchRequest, batchSignal: AbortSignal): Promise<SymbolOutcome> {
    const signals = [batchSignal]
    if (this.config.timeoutMs !== undefined) {
      signals.push(AbortSignal.timeout(this.config.timeoutMs))
    }
    const signal = signals.length === 1 ? batchSignal : AbortSignal.any(signals)

    try {
      signal.throwIfAborted()
      const result = await this.pipeline.run(symbol, request.interval, request.start, request.end, signal)
      return { symbol, status: 'succeeded', result }
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(String(error))
      logger.error('Symbol ingestion failed', {
        symbol,
        interval: request.interval,
        error: failure.message,
        code: 'code' in failure ? failure.code : undefined
      })
      return { symbol, status: 'failed', error: failure }
    }
  }
}
