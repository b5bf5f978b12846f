import { asyncBufferFromFile, parquetReadObjects } from 'hyparquet'
import { parquetWriteFile } from 'hyparquet-writer'
import type { BarProvenance } from '../models'
import type { PartitionCodec, StoredBar } from './ohlcv-repository.interface'

const PROVENANCES: readonly BarProvenance[] = ['observed', 'forward_filled', 'gap_filled']

/**
 * Columnar partition files written with hyparquet-writer
 * Missing prices are stored as nulls
 */
export class ParquetCodec implements PartitionCodec {
  readonly extension = 'parquet'

  async write(filePath: string, bars: readonly StoredBar[]): Promise<void> {
    await parquetWriteFile({
      filename: filePath,
      columnData: [
        { name: 'timestamp', data: bars.map(d => BigInt(d.timestamp)), type: 'INT64' },
        { name: 'symbol', data: bars.map(d => d.symbol), type: 'STRING' },
        { name: 'open', data: bars.map(d => nullable(d.open)), type: 'DOUBLE' },
        { name: 'high', data: bars.map(d => nullable(d.high)), type: 'DOUBLE' },
        { name: 'low', data: bars.map(d => nullable(d.low)), type: 'DOUBLE' },
        { name: 'close', data: bars.map(d => nullable(d.close)), type: 'DOUBLE' },
        { name: 'volume', data: bars.map(d => nullable(d.volume)), type: 'DOUBLE' },
        { name: 'provenance', data: bars.map(d => d.provenance), type: 'STRING' },
        { name: 'is_outlier', data: bars.map(d => d.isOutlier), type: 'BOOLEAN' }
      ]
    })
  }

  async read(filePath: string): Promise<StoredBar[]> {
    const file = await asyncBufferFromFile(filePath)
    const rows = await parquetReadObjects({ file })

    return rows.map((row: Record<string, unknown>): StoredBar => ({
      timestamp: Number(row.timestamp),
      symbol: String(row.symbol),
      open: toNumber(row.open),
      high: toNumber(row.high),
      low: toNumber(row.low),
      close: toNumber(row.close),
      volume: toNumber(row.volume),
      provenance: toProvenance(row.provenance),
      isOutlier: row.is_outlier === true
    }))
  }
}

function nullable(value: number): number | null {
  return Number.isFinite(value) ? value : null
}

function toNumber(value: unknown): number {
  return typeof value === 'number' || typeof value === 'bigint' ? Number(value) : NaN
}

export function toProvenance(value: unknown): BarProvenance {
  return PROVENANCES.find(provenance => provenance === value) ?? 'observed'
}
