import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { RawOhlcvRow } from '../../src/interfaces'
import type { OhlcvDto, RawBar } from '../../src/models'

export const MINUTE = 60_000

// 2024-01-01T00:00:00Z
export const T0 = Date.UTC(2024, 0, 1)

/**
 * Validated bar with sensible defaults
 */
export function bar(timestamp: number, overrides: Partial<OhlcvDto> = {}): OhlcvDto {
  return {
    symbol: 'BTC/USDT',
    timestamp,
    open: 100,
    high: 101,
    low: 99,
    close: 100,
    volume: 10,
    provenance: 'observed',
    ohlcValid: true,
    isOutlier: false,
    outlierReasons: [],
    ...overrides
  }
}

/**
 * Raw bar as the fetcher hands it over
 */
export function rawBar(timestamp: number, overrides: Partial<RawBar> = {}): RawBar {
  return {
    symbol: 'BTC/USDT',
    timestamp,
    open: 100,
    high: 101,
    low: 99,
    close: 100,
    volume: 10,
    ...overrides
  }
}

/**
 * Evenly spaced bars starting at `start`
 */
export function series(count: number, spacingMs: number, start = T0): OhlcvDto[] {
  return Array.from({ length: count }, (_, i) => bar(start + i * spacingMs))
}

/**
 * Exchange rows [timestamp, open, high, low, close, volume]
 */
export function exchangeRows(count: number, spacingMs: number, start = T0): RawOhlcvRow[] {
  return Array.from({ length: count }, (_, i) => [start + i * spacingMs, 100, 101, 99, 100, 10])
}

export async function createTempDir(prefix = 'ohlcv-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix))
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true })
}
