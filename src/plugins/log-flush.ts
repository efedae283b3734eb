import fp from 'fastify-plugin'
import { stopLogger } from '../lib/logger'

export interface LogFlushOptions {
  flush?: () => Promise<void>
}

/**
 * Flushes buffered logs to system_logs on close.
 * Register right after the db plugin: onClose hooks run in reverse order, so this
 * runs after every later plugin has logged its shutdown and before the pool closes.
 */
export default fp<LogFlushOptions>(async (fastify, opts) => {
  const flush = opts.flush ?? stopLogger

  fastify.addHook('onClose', async () => {
    await flush()
  })
})
