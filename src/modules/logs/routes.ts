import { FastifyPluginAsync } from 'fastify'
import { ZodTypeProvider } from 'fastify-type-provider-zod'
import { LogRepository } from './logRepository'
import {
  DeleteLogsResponseSchema,
  HistogramQuerySchema,
  HistogramResponseSchema,
  LogsQuerySchema,
  LogsResponseSchema,
} from './schema'
import { buildHistogramSlots, HISTOGRAM_BUCKET_SECONDS, resolveHistogramRange } from './service'

const logsRoutes: FastifyPluginAsync = async fastify => {
  const app = fastify.withTypeProvider<ZodTypeProvider>()
  const logRepo = new LogRepository(fastify.db)

  app.get(
    '/logs',
    {
      schema: {
        tags: ['System'],
        summary: 'Get system logs with filtering',
        querystring: LogsQuerySchema,
        response: {
          200: LogsResponseSchema,
        },
      },
    },
    async request => {
      const { logs, total } = await logRepo.findLogs(request.query)
      return {
        logs,
        total,
        limit: request.query.limit,
        offset: request.query.offset,
      }
    }
  )

  // Histogram endpoint
  app.get(
    '/logs/histogram',
    {
      schema: {
        tags: ['System'],
        summary: 'Get system logs histogram data',
        querystring: HistogramQuerySchema,
        response: {
          200: HistogramResponseSchema,
        },
      },
    },
    async request => {
      const { start, end } = resolveHistogramRange(request.query)
      const rows = await logRepo.countByBucket(start, end, request.query, HISTOGRAM_BUCKET_SECONDS)
      return buildHistogramSlots(start, end, rows)
    }
  )

  // Delete all logs
  app.delete(
    '/logs',
    {
      schema: {
        tags: ['System'],
        summary: 'Delete all system logs',
        response: {
          200: DeleteLogsResponseSchema,
        },
      },
    },
    async () => {
      const deletedCount = await logRepo.deleteAll()
      fastify.log.info({ msg: `[API] Deleted ${deletedCount} system logs`, source: 'USER', deletedCount })
      return {
        message: 'All logs deleted successfully',
        deletedCount,
      }
    }
  )
}

export default logsRoutes
