import logger from '../utils/logger'

/**
 * Deduplicates and time-sorts rows into canonical order
 *
 * When several rows share a timestamp the one appearing first in the input
 * wins; later duplicates are dropped. The result is sorted ascending and the
 * input array is left untouched.
 */
export function normalize<T extends { readonly timestamp: number }>(rows: readonly T[]): T[] {
  if (rows.length === 0) {
    return []
  }

  const seen = new Set<number>()
  const unique: T[] = []

  for (const row of rows) {
    if (seen.has(row.timestamp)) {
      continue
    }
    seen.add(row.timestamp)
    unique.push(row)
  }

  const duplicates = rows.length - unique.length
  if (duplicates > 0) {
    logger.debug('Dropped duplicate timestamps', { duplicates, kept: unique.length })
  }

  return unique.sort((a, b) => a.timestamp - b.timestamp)
}
