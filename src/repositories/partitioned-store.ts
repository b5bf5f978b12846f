import { createHash, randomUUID } from 'node:crypto'
import { mkdir, readdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import * as path from 'node:path'
import type { Manifest, OhlcvDto, PartitionEntry } from '../models'
import { MANIFEST_VERSION, manifestSchema, toValidationReportRecord } from '../models'
import type { StorageFormat } from '../interfaces'
import { toUtcDate } from '../utils/intervals'
import logger from '../utils/logger'
import { CsvCodec } from './csv-codec'
import type {
  OhlcvRepository,
  PartitionCodec,
  StoredBar,
  WriteOptions
} from './ohlcv-repository.interface'
import { EmptyDataError, RepositoryStorageError } from './ohlcv-repository.interface'
import { ParquetCodec } from './parquet-codec'

export interface PartitionedStoreConfig {
  /** Root directory of the data tree */
  rootDir: string
  exchangeId: string
  format?: StorageFormat
  manifestVersion?: string
}

const MANIFEST_FILE = 'manifest.json'
const DATE_FILE = /^(\d{4}-\d{2}-\d{2})\.(\w+)$/

interface StagedFile {
  readonly tempPath: string
  readonly targetPath: string
}

/**
 * Date-partitioned bar storage with one manifest per (symbol, interval)
 *
 * Layout: {rootDir}/{exchangeId}/{symbol with / as -}/{interval}/{YYYY-MM-DD}.{ext}
 * plus manifest.json in the same directory. Partitions are staged to
 * temporary siblings and renamed into place; the manifest goes last.
 * Writes to the same series run one at a time.
 */
export class PartitionedStore implements OhlcvRepository {
  private readonly rootDir: string
  private readonly exchangeId: string
  private readonly format: StorageFormat
  private readonly manifestVersion: string
  private readonly codec: PartitionCodec
  private readonly pending = new Map<string, Promise<void>>()

  constructor(config: PartitionedStoreConfig) {
    this.rootDir = config.rootDir
    this.exchangeId = config.exchangeId
    this.format = config.format ?? 'parquet'
    this.manifestVersion = config.manifestVersion ?? MANIFEST_VERSION
    this.codec = this.format === 'csv' ? new CsvCodec() : new ParquetCodec()
  }

  /**
   * Directory holding the partitions of one series
   */
  seriesDir(symbol: string, interval: string): string {
    return path.join(this.rootDir, this.exchangeId, symbol.replace(/\//g, '-'), interval)
  }

  async write(
    bars: readonly OhlcvDto[],
    symbol: string,
    interval: string,
    options: WriteOptions = {}
  ): Promise<Manifest> {
    if (bars.length === 0) {
      throw new EmptyDataError(`No bars to write for ${symbol} ${interval}`)
    }

    const dir = this.seriesDir(symbol, interval)
    return this.exclusive(dir, () => this.commit(dir, bars, symbol, interval, options))
  }

  private async commit(
    dir: string,
    bars: readonly OhlcvDto[],
    symbol: string,
    interval: string,
    options: WriteOptions
  ): Promise<Manifest> {
    const byDate = groupByDate(bars)
    const staged: StagedFile[] = []

    try {
      await mkdir(dir, { recursive: true })

      const partitions: PartitionEntry[] = []
      for (const [date, items] of byDate) {
        const file = `${date}.${this.codec.extension}`
        const target = { tempPath: this.tempPath(dir, file), targetPath: path.join(dir, file) }
        staged.push(target)
        await this.codec.write(target.tempPath, items.map(toStoredBar))
        partitions.push({ date, file, row_count: items.length, sha256: await hashFile(target.tempPath) })
      }

      const manifest = this.buildManifest(bars, symbol, interval, partitions, options)
      const manifestFile = {
        tempPath: this.tempPath(dir, MANIFEST_FILE),
        targetPath: path.join(dir, MANIFEST_FILE)
      }
      staged.push(manifestFile)
      await writeFile(manifestFile.tempPath, JSON.stringify(manifest, null, 2), 'utf8')

      options.signal?.throwIfAborted()

      // Manifest is the last entry in staged
      for (const file of staged) {
        await rename(file.tempPath, file.targetPath)
      }

      logger.info('Partitions written', {
        symbol,
        interval,
        partitions: partitions.length,
        rows: bars.length,
        dir
      })

      return manifest
    } catch (error) {
      await discard(staged)

      if (options.signal?.aborted && error === options.signal.reason) {
        logger.warn('Write aborted before commit', { symbol, interval })
        throw error
      }

      logger.error('Failed to write partitions', { symbol, interval, error })
      throw new RepositoryStorageError(
        `Failed to write partitions for ${symbol} ${interval}: ${String(error)}`,
        error instanceof Error ? error : undefined
      )
    }
  }

  async readManifest(symbol: string, interval: string): Promise<Manifest | null> {
    const manifestPath = path.join(this.seriesDir(symbol, interval), MANIFEST_FILE)

    let content: string
    try {
      content = await readFile(manifestPath, 'utf8')
    } catch (error) {
      if (isNotFound(error)) {
        return null
      }
      throw new RepositoryStorageError(
        `Failed to read manifest ${manifestPath}: ${String(error)}`,
        error instanceof Error ? error : undefined
      )
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(content)
    } catch (error) {
      throw new RepositoryStorageError(
        `Manifest ${manifestPath} is not valid JSON`,
        error instanceof Error ? error : undefined
      )
    }

    const result = manifestSchema.safeParse(parsed)
    if (!result.success) {
      throw new RepositoryStorageError(`Manifest ${manifestPath} is malformed: ${result.error.message}`)
    }
    return result.data
  }

  async readPartition(symbol: string, interval: string, date: string): Promise<StoredBar[]> {
    const filePath = path.join(this.seriesDir(symbol, interval), `${date}.${this.codec.extension}`)
    try {
      return await this.codec.read(filePath)
    } catch (error) {
      throw new RepositoryStorageError(
        `Failed to read partition ${filePath}: ${String(error)}`,
        error instanceof Error ? error : undefined
      )
    }
  }

  async listPartitions(symbol: string, interval: string): Promise<string[]> {
    const dir = this.seriesDir(symbol, interval)

    let entries: string[]
    try {
      entries = await readdir(dir)
    } catch (error) {
      if (isNotFound(error)) {
        return []
      }
      throw new RepositoryStorageError(
        `Failed to list partitions in ${dir}: ${String(error)}`,
        error instanceof Error ? error : undefined
      )
    }

    const dates: string[] = []
    for (const entry of entries) {
      const match = DATE_FILE.exec(entry)
      if (match?.[1] && match[2] === this.codec.extension) {
        dates.push(match[1])
      }
    }
    return dates.sort()
  }

  private buildManifest(
    bars: readonly OhlcvDto[],
    symbol: string,
    interval: string,
    partitions: PartitionEntry[],
    options: WriteOptions
  ): Manifest {
    let start = Infinity
    let end = -Infinity
    for (const bar of bars) {
      start = Math.min(start, bar.timestamp)
      end = Math.max(end, bar.timestamp)
    }

    const manifest: Manifest = {
      exchange_id: this.exchangeId,
      symbol,
      interval,
      start_timestamp: new Date(start).toISOString(),
      end_timestamp: new Date(end).toISOString(),
      fetch_timestamp: new Date(options.fetchTimestamp ?? Date.now()).toISOString(),
      version: this.manifestVersion,
      row_count: bars.length,
      format: this.format,
      partitions
    }

    if (options.report) {
      manifest.validation = toValidationReportRecord(options.report)
    }
    return manifest
  }

  private tempPath(dir: string, file: string): string {
    return path.join(dir, `.${file}.${randomUUID()}.tmp`)
  }

  /**
   * Runs the task after every earlier task queued under the same key has settled
   */
  private async exclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.pending.get(key) ?? Promise.resolve()
    const result = previous.then(task)
    const settled = result.then(
      () => undefined,
      () => undefined
    )
    this.pending.set(key, settled)

    try {
      return await result
    } finally {
      if (this.pending.get(key) === settled) {
        this.pending.delete(key)
      }
    }
  }
}

function groupByDate(bars: readonly OhlcvDto[]): Map<string, OhlcvDto[]> {
  const groups = new Map<string, OhlcvDto[]>()
  for (const bar of bars) {
    const date = toUtcDate(bar.timestamp)
    const group = groups.get(date)
    if (group) {
      group.push(bar)
    } else {
      groups.set(date, [bar])
    }
  }
  return new Map([...groups.entries()].sort(([a], [b]) => a.localeCompare(b)))
}

function toStoredBar(bar: OhlcvDto): StoredBar {
  return {
    symbol: bar.symbol,
    timestamp: bar.timestamp,
    open: bar.open,
    high: bar.high,
    low: bar.low,
    close: bar.close,
    volume: bar.volume,
    provenance: bar.provenance,
    isOutlier: bar.isOutlier
  }
}

async function hashFile(filePath: string): Promise<string> {
  return createHash('sha256').update(await readFile(filePath)).digest('hex')
}

async function discard(files: readonly StagedFile[]): Promise<void> {
  await Promise.all(files.map(file => rm(file.tempPath, { force: true })))
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
