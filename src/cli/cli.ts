#!/usr/bin/env -S node --import tsx

import { CommanderError } from 'commander'
import type { IngestionConfig } from '../interfaces'
import logger, { setLogLevel } from '../utils/logger'
import { argsToOverrides, parseArgs, type CliArgs } from './args-parser'
import { loadIngestionConfig } from './config-loader'
import { PipelineFactory } from './pipeline-factory'

/**
 * Resolves the batch window from the configuration
 * Defaults to the last 24 hours when no start is configured
 */
export function resolveWindow(config: IngestionConfig, now = Date.now()): { start: number; end?: number } {
  const end = config.collection.end === undefined ? undefined : Date.parse(config.collection.end)
  const start = config.collection.start === undefined
    ? (end ?? now) - 24 * 60 * 60 * 1000
    : Date.parse(config.collection.start)

  if (end !== undefined && start > end) {
    throw new Error(`collection.start (${config.collection.start ?? ''}) is after collection.end (${config.collection.end ?? ''})`)
  }

  return { start, end }
}

/**
 * Main CLI entry point
 * @returns Process exit code
 */
async function main(argv: string[] = process.argv): Promise<number> {
  let args: CliArgs
  try {
    args = parseArgs(argv)
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version exit through here with code 0
      return error.exitCode
    }
    throw error
  }

  if (args.verbose > 0) {
    setLogLevel(args.verbose >= 2 ? 'debug' : 'info')
  }

  logger.info('Loading configuration', { path: args.config })
  const config = await loadIngestionConfig(args.config, argsToOverrides(args))

  if (config.collection.symbols.length === 0) {
    logger.error('No symbols configured; set collection.symbols or pass --symbols')
    return 1
  }

  const { client, rateLimiter, runner } = PipelineFactory.create(config)
  const window = resolveWindow(config)

  const controller = new AbortController()
  const onSignal = (): void => {
    logger.warn('Interrupt received, aborting batch')
    controller.abort(new Error('Interrupted'))
  }
  process.once('SIGINT', onSignal)
  process.once('SIGTERM', onSignal)

  try {
    const summary = await runner.run(
      config.collection.symbols,
      { interval: config.collection.interval, ...window },
      controller.signal
    )

    for (const outcome of summary.outcomes) {
      if (outcome.status === 'succeeded') {
        const { manifest, report } = outcome.result
        logger.info('Symbol stored', {
          symbol: outcome.symbol,
          rows: manifest.row_count,
          partitions: manifest.partitions.length,
          outliers: report.outliersDetected,
          gapsDetected: report.gapsDetected,
          gapsFilled: report.gapsFilled
        })
      } else {
        logger.error('Symbol failed', { symbol: outcome.symbol, error: outcome.error.message })
      }
    }

    logger.debug('Exchange requests made', { requests: rateLimiter.getStatus().requestCount })

    return summary.failed > 0 ? 1 : 0
  } finally {
    process.off('SIGINT', onSignal)
    process.off('SIGTERM', onSignal)
    await client.close()
  }
}

// Export the main function for testing
export { main }

if (process.argv[1] && import.meta.url.endsWith(process.argv[1].replace(/\\/g, '/'))) {
  main()
    .then(code => {
      process.exitCode = code
    })
    .catch((error: unknown) => {
      logger.error('Fatal error', { error: error instanceof Error ? error.message : String(error) })
      process.exitCode = 1
    })
}
