import { deepStrictEqual, ok, rejects, strictEqual } from 'node:assert'
import { existsSync } from 'node:fs'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, it } from 'node:test'
import { IngestionPipeline } from '../../../src/pipeline/ingestion-pipeline'
import { QualityThresholdError } from '../../../src/pipeline/errors'
import { OutlierFlagger } from '../../../src/pipeline/outlier-flagger'
import { Validator } from '../../../src/pipeline/validator'
import { Fetcher } from '../../../src/providers/fetcher'
import { RateLimiter } from '../../../src/providers/rate-limiter'
import { PartitionedStore } from '../../../src/repositories/partitioned-store'
import { MissingValueHandler } from '../../../src/transforms/missing-value-handler'
import type { RawOhlcvRow } from '../../../src/interfaces'
import { createTempDir, exchangeRows, MINUTE, removeTempDir, T0 } from '../../helpers/bars'
import { MockExchangeClient } from '../../helpers/mock-exchange-client'

const FIFTEEN = 15 * MINUTE

describe('IngestionPipeline', () => {
  let rootDir: string

  beforeEach(async () => {
    rootDir = await createTempDir()
  })

  afterEach(async () => {
    await removeTempDir(rootDir)
  })

  function createPipeline(client: MockExchangeClient, pageLimit = 4, shortGapMinutes = 15): IngestionPipeline {
    const rateLimiter = new RateLimiter({ minIntervalMs: 0, maxRetries: 2, backoffBaseMs: 1 })
    return new IngestionPipeline({
      fetcher: new Fetcher(client, rateLimiter, { pageLimit }),
      validator: new Validator({ missingThreshold: 0.25 }),
      missingValueHandler: new MissingValueHandler(),
      outlierFlagger: new OutlierFlagger({ priceJump: 0.2, volumeSpike: 10, rollingWindow: 4 }),
      store: new PartitionedStore({ rootDir, exchangeId: client.id, format: 'csv' }),
      shortGapMinutes
    })
  }

  it('should page through the exchange and store every bar', async () => {
    const client = new MockExchangeClient('mockex', { 'BTC/USDT': exchangeRows(10, FIFTEEN) })

    const result = await createPipeline(client).run('BTC/USDT', '15min', T0)

    deepStrictEqual(client.calls.map(call => call.since), [T0, T0 + 3 * FIFTEEN + 1, T0 + 7 * FIFTEEN + 1])
    strictEqual(result.manifest.row_count, 10)
    strictEqual(result.report.totalRows, 10)
    strictEqual(result.report.validRows, 10)
  })

  it('should stop paging at the end of the window', async () => {
    const client = new MockExchangeClient('mockex', { 'BTC/USDT': exchangeRows(20, FIFTEEN) })

    const result = await createPipeline(client).run('BTC/USDT', '15min', T0, T0 + 5 * FIFTEEN)

    strictEqual(client.calls.length, 2)
    strictEqual(result.manifest.row_count, 6)
    strictEqual(result.manifest.end_timestamp, new Date(T0 + 5 * FIFTEEN).toISOString())
  })

  it('should run every stage and fold their counts into the report', async () => {
    const rows: RawOhlcvRow[] = [
      [T0, 100, 101, 99, 100, 10],
      [T0, 1, 1, 1, 1, 1],
      [T0 + FIFTEEN, 100, 101, 99, null, 10],
      // One missing step, filled
      [T0 + 3 * FIFTEEN, 100, 131, 99, 130, 10],
      // Three missing steps, left open
      [T0 + 7 * FIFTEEN, 130, 131, 129, 130, 10]
    ]
    const client = new MockExchangeClient('mockex').enqueue(rows)

    const result = await createPipeline(client, 10).run('BTC/USDT', '15min', T0)

    strictEqual(result.report.totalRows, 4)
    strictEqual(result.report.missingByColumn.close, 1)
    strictEqual(result.report.gapsFilled, 1)
    strictEqual(result.report.gapsDetected, 3)
    strictEqual(result.report.outliersDetected, 1)
    strictEqual(result.manifest.row_count, 5)
    strictEqual(result.gaps.length, 2)

    const stored = await new PartitionedStore({ rootDir, exchangeId: 'mockex', format: 'csv' })
      .readPartition('BTC/USDT', '15min', '2024-01-01')
    deepStrictEqual(stored.map(bar => bar.provenance), [
      'observed',
      'forward_filled',
      'gap_filled',
      'observed',
      'observed'
    ])
    deepStrictEqual(stored.map(bar => bar.close), [100, 100, 100, 130, 130])
    deepStrictEqual(stored.map(bar => bar.isOutlier), [false, false, false, true, false])
  })

  it('should write nothing when validation fails', async () => {
    const rows: RawOhlcvRow[] = [
      [T0, 100, 101, 99, null, 10],
      [T0 + FIFTEEN, 100, 101, 99, null, 10],
      [T0 + 2 * FIFTEEN, 100, 101, 99, 100, 10]
    ]
    const client = new MockExchangeClient('mockex').enqueue(rows)

    await rejects(createPipeline(client).run('BTC/USDT', '15min', T0), QualityThresholdError)
    strictEqual(existsSync(join(rootDir, 'mockex')), false)
  })

  it('should not fetch when the signal is already aborted', async () => {
    const client = new MockExchangeClient('mockex', { 'BTC/USDT': exchangeRows(2, FIFTEEN) })
    const controller = new AbortController()
    controller.abort(new Error('cancelled'))

    await rejects(createPipeline(client).run('BTC/USDT', '15min', T0, undefined, controller.signal), /cancelled/)
    strictEqual(client.calls.length, 0)
    ok(!existsSync(join(rootDir, 'mockex')))
  })
})
