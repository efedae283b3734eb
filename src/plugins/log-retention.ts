import fp from 'fastify-plugin'
import fs from 'fs/promises'
import path from 'path'

export default fp(async fastify => {
  try {
    const retentionSQL = await fs.readFile(path.join(__dirname, '../db/retention.sql'), 'utf-8')
    await fastify.pg.query(retentionSQL)
    fastify.log.debug('[DB] Log retention policy applied')
  } catch (err) {
    const errorMessage = err instanceof Error ? err.message : 'Unknown error'
    fastify.log.error({ msg: '[DB] Failed to apply log retention policy', error: errorMessage })
  }
})
