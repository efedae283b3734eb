import type { HistogramQuery, HistogramRow, HistogramSlot } from './schema'

export const HISTOGRAM_BUCKET_SECONDS = 600
const DAY_MS = 24 * 60 * 60 * 1000

/**
 * Time range covered by a histogram query: a UTC day, an explicit range, or the last 24h
 */
export function resolveHistogramRange(
  query: Pick<HistogramQuery, 'date' | 'startDate' | 'endDate'>,
  now: Date = new Date()
): { start: Date; end: Date } {
  if (query.date) {
    const start = new Date(`${query.date}T00:00:00.000Z`)
    return { start, end: new Date(start.getTime() + DAY_MS - 1) }
  }
  if (query.startDate && query.endDate) {
    return { start: new Date(query.startDate), end: new Date(query.endDate) }
  }
  return { start: new Date(now.getTime() - DAY_MS), end: now }
}

/**
 * Spread grouped counts over every bucket of the range, empty buckets included
 */
export function buildHistogramSlots(
  start: Date,
  end: Date,
  rows: HistogramRow[],
  bucketSeconds: number = HISTOGRAM_BUCKET_SECONDS
): HistogramSlot[] {
  const slotMs = bucketSeconds * 1000
  const buckets = new Map<string, Record<string, number>>()

  const first = Math.floor(start.getTime() / slotMs) * slotMs
  for (let time = first; time <= end.getTime(); time += slotMs) {
    buckets.set(new Date(time).toISOString(), {})
  }

  for (const row of rows) {
    const slot = new Date(row.bucket * 1000).toISOString()
    const counts = buckets.get(slot) ?? {}
    counts[row.category] = row.count
    buckets.set(slot, counts)
  }

  return Array.from(buckets.entries())
    .map(([slot, counts]) => ({ slot, counts }))
    .sort((a, b) => a.slot.localeCompare(b.slot))
}

export function toList<T>(value: T | T[] | undefined): T[] {
  if (value === undefined) return []
  return Array.isArray(value) ? value : [value]
}
