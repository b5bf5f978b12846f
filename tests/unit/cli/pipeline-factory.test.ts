import { deepStrictEqual, ok, strictEqual } from 'node:assert'
import { describe, it } from 'node:test'
import { resolveWindow } from '../../../src/cli/cli'
import { parseIngestionConfig } from '../../../src/cli/config-loader'
import { PipelineFactory } from '../../../src/cli/pipeline-factory'
import { CcxtExchangeClient } from '../../../src/providers'
import { MockExchangeClient } from '../../helpers/mock-exchange-client'

describe('PipelineFactory', () => {
  it('should wire the injected client through fetcher and store', () => {
    const config = parseIngestionConfig({ storage: { root: '/tmp/ohlcv-factory' } })
    const client = new MockExchangeClient('mockex')

    const components = PipelineFactory.create(config, client)

    strictEqual(components.client, client)
    strictEqual(components.fetcher.exchangeId, 'mockex')
    strictEqual(components.store.seriesDir('BTC/USDT', '1h'), '/tmp/ohlcv-factory/mockex/BTC-USDT/1h')
  })

  it('should convert the backoff base to milliseconds', () => {
    const config = parseIngestionConfig({ api: { backoffBaseSeconds: 2 } })

    const { rateLimiter } = PipelineFactory.create(config, new MockExchangeClient())

    strictEqual(rateLimiter.calculateBackoffDelay(1), 4000)
  })

  it('should build a ccxt client for the configured exchange', () => {
    const config = parseIngestionConfig({ exchange: { id: 'binance' } })

    const { client } = PipelineFactory.create(config)

    ok(client instanceof CcxtExchangeClient)
    strictEqual(client.id, 'binance')
  })
})

describe('resolveWindow', () => {
  const now = Date.UTC(2024, 5, 1)

  it('should default to the last 24 hours', () => {
    const config = parseIngestionConfig({})

    deepStrictEqual(resolveWindow(config, now), { start: now - 86_400_000, end: undefined })
  })

  it('should use the configured bounds', () => {
    const config = parseIngestionConfig({
      collection: { start: '2024-01-01T00:00:00Z', end: '2024-01-02T00:00:00Z' }
    })

    deepStrictEqual(resolveWindow(config, now), { start: Date.UTC(2024, 0, 1), end: Date.UTC(2024, 0, 2) })
  })
})
