import { and, count, desc, eq, gte, ilike, inArray, lte, or, sql, type SQL } from 'drizzle-orm'
import type { Database } from '../../db/client'
import { systemLogs } from '../../db/schema'
import { HistogramRowSchema, type HistogramQuery, type HistogramRow, type LogEntry, type LogsQuery } from './schema'
import { toList } from './service'

type LogFilters = Omit<LogsQuery, 'limit' | 'offset'>

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function searchCondition(search: string): SQL | undefined {
  const pattern = `%${search}%`
  return or(
    ilike(systemLogs.msg, pattern),
    ilike(systemLogs.level, pattern),
    sql`${systemLogs.details}::text ILIKE ${pattern}`
  )
}

export function buildLogConditions(filters: LogFilters): SQL | undefined {
  const conditions: Array<SQL | undefined> = []

  const categories = toList(filters.category)
  if (categories.length > 0) {
    conditions.push(inArray(systemLogs.category, categories))
  }
  if (filters.source) {
    conditions.push(eq(systemLogs.source, filters.source))
  }
  if (filters.direction) {
    conditions.push(eq(systemLogs.direction, filters.direction))
  }
  if (filters.doorId) {
    conditions.push(sql`${systemLogs.details}->>'doorId' = ${filters.doorId}`)
  }
  if (filters.deviceId) {
    conditions.push(sql`${systemLogs.details}->>'deviceId' = ${filters.deviceId}`)
  }
  const levels = toList(filters.level)
  if (levels.length > 0) {
    conditions.push(inArray(systemLogs.level, levels))
  }
  if (filters.search) {
    conditions.push(searchCondition(filters.search))
  }
  if (filters.startDate) {
    conditions.push(gte(systemLogs.time, new Date(filters.startDate)))
  }
  if (filters.endDate) {
    conditions.push(lte(systemLogs.time, new Date(filters.endDate)))
  }

  return conditions.length > 0 ? and(...conditions) : undefined
}

export class LogRepository {
  constructor(private db: Database) {}

  async findLogs(query: LogsQuery): Promise<{ logs: LogEntry[]; total: number }> {
    const { limit, offset, ...filters } = query
    const where = buildLogConditions(filters)

    const rows = await this.db
      .select()
      .from(systemLogs)
      .where(where)
      .orderBy(desc(systemLogs.time))
      .limit(limit)
      .offset(offset)

    const [totals] = await this.db.select({ total: count() }).from(systemLogs).where(where)

    return {
      logs: rows.map(row => ({ ...row, details: isRecord(row.details) ? row.details : null })),
      total: totals?.total ?? 0,
    }
  }

  /**
   * Log counts grouped by bucket and category
   */
  async countByBucket(
    start: Date,
    end: Date,
    filters: Pick<HistogramQuery, 'category' | 'level' | 'search'>,
    bucketSeconds: number
  ): Promise<HistogramRow[]> {
    const conditions: Array<SQL | undefined> = [gte(systemLogs.time, start), lte(systemLogs.time, end)]

    const categories = toList(filters.category)
    if (categories.length > 0) {
      conditions.push(inArray(systemLogs.category, categories))
    }
    const levels = toList(filters.level)
    if (levels.length > 0) {
      conditions.push(inArray(systemLogs.level, levels))
    }
    if (filters.search) {
      conditions.push(searchCondition(filters.search))
    }

    // Inlined so SELECT and GROUP BY carry the same expression
    const size = sql.raw(String(Math.trunc(bucketSeconds)))
    const bucket = sql<number>`floor(extract(epoch from ${systemLogs.time}) / ${size}) * ${size}`
    const rows = await this.db
      .select({ bucket, category: systemLogs.category, count: count() })
      .from(systemLogs)
      .where(and(...conditions))
      .groupBy(bucket, systemLogs.category)
      .orderBy(bucket)

    return rows.map(row => HistogramRowSchema.parse(row))
  }

  async deleteAll(): Promise<number> {
    const deleted = await this.db.delete(systemLogs).returning({ id: systemLogs.id })
    return deleted.length
  }
}
