import { deepStrictEqual, ok, strictEqual } from 'node:assert'
import { readdir } from 'node:fs/promises'
import { join } from 'node:path'
import { after, before, describe, it } from 'node:test'
import { parseIngestionConfig } from '../../src/cli/config-loader'
import { PipelineFactory } from '../../src/cli/pipeline-factory'
import type { RawOhlcvRow } from '../../src/interfaces'
import type { IngestionResult } from '../../src/pipeline'
import { createTempDir, MINUTE, removeTempDir, T0 } from '../helpers/bars'
import { MockExchangeClient } from '../helpers/mock-exchange-client'

const FIFTEEN = 15 * MINUTE
const SPIKE_INDEX = 40
const VOLUME_SPIKE_INDEX = 70
const MISSING_CLOSES = [10, 11, 12]

/**
 * One day of 15-minute bars with a block of missing closes,
 * an isolated 30% price spike and a 10x volume spike
 */
function dayOfBars(): RawOhlcvRow[] {
  return Array.from({ length: 96 }, (_, i): RawOhlcvRow => {
    const timestamp = T0 + i * FIFTEEN
    if (i === SPIKE_INDEX) {
      return [timestamp, 100, 131, 99, 130, 10]
    }
    if (i === VOLUME_SPIKE_INDEX) {
      return [timestamp, 100, 101, 99, 100, 100]
    }
    if (MISSING_CLOSES.includes(i)) {
      return [timestamp, 100, 101, 99, null, 10]
    }
    return [timestamp, 100, 101, 99, 100, 10]
  })
}

describe('Ingestion end to end', () => {
  let rootDir: string
  let result: IngestionResult

  before(async () => {
    rootDir = await createTempDir('ohlcv-e2e-')
    const config = parseIngestionConfig({
      api: { rateLimitMs: 0 },
      storage: { root: rootDir },
      collection: { symbols: ['BTC/USDT'], interval: '15min' }
    })
    const client = new MockExchangeClient('mockex', { 'BTC/USDT': dayOfBars() })
    const { runner } = PipelineFactory.create(config, client)

    const summary = await runner.run(config.collection.symbols, {
      interval: config.collection.interval,
      start: T0,
      end: T0 + 95 * FIFTEEN
    })

    const outcome = summary.outcomes[0]
    if (outcome?.status !== 'succeeded') {
      throw new Error(`Ingestion failed: ${outcome?.error.message ?? 'no outcome'}`)
    }
    result = outcome.result
  })

  after(async () => {
    await removeTempDir(rootDir)
  })

  it('should keep every row valid', () => {
    strictEqual(result.report.totalRows, 96)
    strictEqual(result.report.validRows, 96)
    strictEqual(result.report.missingByColumn.close, 3)
    strictEqual(result.report.ohlcViolations, 0)
  })

  it('should flag the price spike on the way up and down', () => {
    ok(result.report.outliersDetected >= 2)
    strictEqual(result.gaps.length, 0)
    strictEqual(result.report.gapsDetected, 0)
  })

  it('should write one partition and a manifest for 96 rows', async () => {
    const dir = join(rootDir, 'mockex', 'BTC-USDT', '15min')

    deepStrictEqual((await readdir(dir)).sort(), ['2024-01-01.parquet', 'manifest.json'])
    strictEqual(result.manifest.row_count, 96)
    strictEqual(result.manifest.validation?.valid_rows, 96)
    strictEqual(result.manifest.start_timestamp, '2024-01-01T00:00:00.000Z')
    strictEqual(result.manifest.end_timestamp, '2024-01-01T23:45:00.000Z')
  })

  it('should store forward-filled closes and outlier flags', async () => {
    const config = parseIngestionConfig({ storage: { root: rootDir } })
    const { store } = PipelineFactory.create(config, new MockExchangeClient('mockex'))

    const bars = await store.readPartition('BTC/USDT', '15min', '2024-01-01')

    strictEqual(bars.length, 96)
    deepStrictEqual(MISSING_CLOSES.map(i => bars[i]?.close), [100, 100, 100])
    deepStrictEqual(MISSING_CLOSES.map(i => bars[i]?.provenance), ['forward_filled', 'forward_filled', 'forward_filled'])
    strictEqual(bars[SPIKE_INDEX]?.isOutlier, true)
    strictEqual(bars[SPIKE_INDEX + 1]?.isOutlier, true)
    strictEqual(bars[0]?.isOutlier, false)
  })
})
