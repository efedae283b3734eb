import { z } from 'zod'

export const LOG_CATEGORIES = ['DOOR', 'MQTT', 'DB', 'API', 'HARDWARE', 'WEBSOCKET'] as const
export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const

const CategoryFilterSchema = z.union([z.enum(LOG_CATEGORIES), z.array(z.enum(LOG_CATEGORIES))])
const LevelFilterSchema = z.union([z.enum(LOG_LEVELS), z.array(z.enum(LOG_LEVELS))])

export const LogsQuerySchema = z.object({
  category: CategoryFilterSchema.optional(),
  source: z.enum(['SYSTEM', 'USER', 'DEVICE']).optional(),
  direction: z.enum(['IN', 'OUT']).optional(),
  doorId: z.string().optional(),
  deviceId: z.string().optional(),
  level: LevelFilterSchema.optional(),
  search: z.string().optional(),
  startDate: z.string().datetime().optional(),
  endDate: z.string().datetime().optional(),
  limit: z.string().default('100').transform(Number).pipe(z.number().int().min(1).max(1000)),
  offset: z.string().default('0').transform(Number).pipe(z.number().int().min(0)),
})

export const LogEntrySchema = z.object({
  id: z.string(),
  category: z.string(),
  source: z.string(),
  direction: z.string().nullable(),
  level: z.string(),
  msg: z.string(),
  time: z.date(),
  details: z.record(z.unknown()).nullable(),
})

export const LogsResponseSchema = z.object({
  logs: z.array(LogEntrySchema),
  total: z.number(),
  limit: z.number(),
  offset: z.number(),
})

export const HistogramQuerySchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional(),
  startDate: z.string().datetime().optional(),
  endDate: z.string().datetime().optional(),
  category: CategoryFilterSchema.optional(),
  level: LevelFilterSchema.optional(),
  search: z.string().optional(),
})

export const HistogramResponseSchema = z.array(
  z.object({
    slot: z.string(), // ISO timestamp of the bucket start
    counts: z.record(z.number()), // category -> count
  })
)

export const HistogramRowSchema = z.object({
  bucket: z.coerce.number(),
  category: z.string(),
  count: z.coerce.number(),
})

export const DeleteLogsResponseSchema = z.object({
  message: z.string(),
  deletedCount: z.number(),
})

export type LogsQuery = z.infer<typeof LogsQuerySchema>
export type HistogramQuery = z.infer<typeof HistogramQuerySchema>
export type HistogramRow = z.infer<typeof HistogramRowSchema>
export type HistogramSlot = z.infer<typeof HistogramResponseSchema>[number]
export type LogEntry = z.infer<typeof LogEntrySchema>
