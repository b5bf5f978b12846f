import { promises as fs } from 'node:fs'
import type { PartitionCodec, StoredBar } from './ohlcv-repository.interface'
import { toProvenance } from './parquet-codec'

/**
 * Plain-text partition files, one header row then one bar per line
 * Timestamps are written as ISO-8601; missing values as empty cells
 */
export class CsvCodec implements PartitionCodec {
  readonly extension = 'csv'

  // CSV configuration
  private readonly csvDelimiter = ','
  private readonly csvHeaders = [
    'timestamp',
    'symbol',
    'open',
    'high',
    'low',
    'close',
    'volume',
    'provenance',
    'is_outlier'
  ]

  async write(filePath: string, bars: readonly StoredBar[]): Promise<void> {
    let content = this.csvHeaders.join(this.csvDelimiter) + '\n'

    for (const bar of bars) {
      content += this.formatRow(bar) + '\n'
    }

    await fs.writeFile(filePath, content, 'utf8')
  }

  async read(filePath: string): Promise<StoredBar[]> {
    const content = await fs.readFile(filePath, 'utf8')
    const lines = content.split('\n').filter(line => line.trim())

    // Skip header row
    return lines.slice(1).map(line => this.parseRow(line))
  }

  private formatRow(bar: StoredBar): string {
    return [
      new Date(bar.timestamp).toISOString(),
      this.escapeCsvValue(bar.symbol),
      formatNumber(bar.open),
      formatNumber(bar.high),
      formatNumber(bar.low),
      formatNumber(bar.close),
      formatNumber(bar.volume),
      bar.provenance,
      String(bar.isOutlier)
    ].join(this.csvDelimiter)
  }

  private parseRow(line: string): StoredBar {
    const [timestamp = '', symbol = '', open = '', high = '', low = '', close = '', volume = '', provenance = '', isOutlier = ''] =
      this.parseCsvLine(line)

    const parsedTimestamp = Date.parse(timestamp)
    if (Number.isNaN(parsedTimestamp)) {
      throw new Error(`Invalid timestamp format: ${timestamp}`)
    }

    return {
      timestamp: parsedTimestamp,
      symbol,
      open: parseNumber(open),
      high: parseNumber(high),
      low: parseNumber(low),
      close: parseNumber(close),
      volume: parseNumber(volume),
      provenance: toProvenance(provenance),
      isOutlier: isOutlier === 'true'
    }
  }

  /**
   * Parse a CSV line handling quoted values
   */
  private parseCsvLine(line: string): string[] {
    const values: string[] = []
    let current = ''
    let inQuotes = false
    let i = 0

    while (i < line.length) {
      const char = line[i]
      const nextChar = line[i + 1]

      if (char === '"') {
        if (inQuotes && nextChar === '"') {
          // Escaped quote
          current += '"'
          i += 2
          continue
        }
        inQuotes = !inQuotes
        i++
        continue
      }

      if (char === this.csvDelimiter && !inQuotes) {
        values.push(current.trim())
        current = ''
        i++
        continue
      }

      current += char
      i++
    }

    values.push(current.trim())
    return values
  }

  /**
   * Escape CSV values that contain special characters
   */
  private escapeCsvValue(value: string): string {
    if (value.includes(this.csvDelimiter) || value.includes('"') || value.includes('\n')) {
      return `"${value.replace(/"/g, '""')}"`
    }
    return value
  }
}

function formatNumber(value: number): string {
  return Number.isFinite(value) ? String(value) : ''
}

function parseNumber(value: string): number {
  return value === '' ? NaN : Number(value)
}
