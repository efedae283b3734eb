import fp from 'fastify-plugin'
import { Pool } from 'pg'
import { db, pool, type Database } from '../db/client'

declare module 'fastify' {
  interface FastifyInstance {
    db: Database
    pg: Pool
  }
}

export default fp(async fastify => {
  try {
    const result = await pool.query<{ version: string; current_database: string }>(
      'SELECT version(), current_database()'
    )
    const row = result.rows[0]

    fastify.log.info({
      msg: '✓ [DB] Connected to PostgreSQL',
      database: row?.current_database ?? 'Unknown',
      host: pool.options.host,
      port: pool.options.port,
      version: (row?.version ?? 'Unknown').split(' ').slice(0, 2).join(' '), // "PostgreSQL 16.2"
    })
  } catch (err) {
    const errorMessage = err instanceof Error ? err.message : 'Unknown error'
    fastify.log.error({ msg: '[DB] Connection failed', error: errorMessage })
    throw err
  }

  fastify.decorate('db', db)
  fastify.decorate('pg', pool)

  fastify.addHook('onClose', async instance => {
    await instance.pg.end()
    instance.log.info('[DB] Connection pool closed')
  })
})
