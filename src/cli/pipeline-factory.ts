import type { ExchangeClient, IngestionConfig } from '../interfaces'
import { IngestionPipeline, IngestionRunner, OutlierFlagger, Validator } from '../pipeline'
import { CcxtExchangeClient, Fetcher, RateLimiter } from '../providers'
import { PartitionedStore } from '../repositories'
import { MissingValueHandler } from '../transforms/missing-value-handler'

/**
 * Everything a batch run needs, wired from one configuration
 */
export interface IngestionComponents {
  client: ExchangeClient
  rateLimiter: RateLimiter
  fetcher: Fetcher
  store: PartitionedStore
  pipeline: IngestionPipeline
  runner: IngestionRunner
}

/**
 * Factory for creating ingestion components from a validated configuration
 */
export class PipelineFactory {
  /**
   * @param client Exchange client to use instead of a ccxt instance for `exchange.id`
   */
  public static create(config: IngestionConfig, client?: ExchangeClient): IngestionComponents {
    const exchangeClient = client ?? this.createExchangeClient(config)

    const rateLimiter = new RateLimiter({
      minIntervalMs: config.api.rateLimitMs,
      maxRetries: config.api.retries,
      backoffBaseMs: config.api.backoffBaseSeconds * 1000
    })

    const fetcher = new Fetcher(exchangeClient, rateLimiter, { pageLimit: config.api.pageLimit })

    const store = new PartitionedStore({
      rootDir: config.storage.root,
      exchangeId: exchangeClient.id,
      format: config.storage.format,
      manifestVersion: config.storage.manifestVersion
    })

    const pipeline = new IngestionPipeline({
      fetcher,
      validator: new Validator(config.validation),
      missingValueHandler: new MissingValueHandler(),
      outlierFlagger: new OutlierFlagger(config.outliers),
      store,
      shortGapMinutes: config.gapFill.shortGapMinutes
    })

    const runner = new IngestionRunner(pipeline, {
      concurrency: config.collection.concurrency,
      timeoutMs: config.collection.timeoutMs,
      failFast: config.collection.failFast
    })

    return { client: exchangeClient, rateLimiter, fetcher, store, pipeline, runner }
  }

  private static createExchangeClient(config: IngestionConfig): ExchangeClient {
    return new CcxtExchangeClient({
      exchangeId: config.exchange.id,
      options: config.exchange.options
    })
  }
}
