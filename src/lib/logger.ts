import { Writable } from 'stream'
import { db } from '../db/client'
import { systemLogs } from '../db/schema'

const levelMap: Record<number, string> = {
  10: 'trace',
  20: 'debug',
  30: 'info',
  40: 'warn',
  50: 'error',
  60: 'fatal',
}

// Fastify lines that would only add noise to the table
const IGNORED_MESSAGES = ['incoming request', 'request completed']

// [CATEGORY] or [CATEGORY:extra]
const CATEGORY_PATTERN = /^\[([A-Z0-9]+)(?::[^\]]+)?\]\s*/

// ============================================================================
// Batched Logger - Accumulates logs and flushes every 5 seconds
// ============================================================================

export interface LogEntry {
  category: string
  source: string
  direction: string | null
  level: string
  msg: string
  time: Date
  details: Record<string, unknown>
}

const logBuffer: LogEntry[] = []
const FLUSH_INTERVAL_MS = 5000 // Flush every 5 seconds
const MAX_BUFFER_SIZE = 100    // Or when buffer reaches 100 entries

let flushTimer: ReturnType<typeof setInterval> | null = null

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Turn one pino JSON line into a log entry. Lines without a category prefix are skipped.
 */
export function parseLogLine(line: string): LogEntry | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(line)
  } catch {
    return null
  }
  if (!isRecord(parsed)) return null

  const { level, msg, time, source, direction, ...details } = parsed
  const message = typeof msg === 'string' ? msg : ''

  if (IGNORED_MESSAGES.includes(message) || message.startsWith('Server listening at')) {
    return null
  }

  const categoryMatch = message.match(CATEGORY_PATTERN)
  if (!categoryMatch) {
    return null
  }

  // pino's own bookkeeping fields
  delete details.pid
  delete details.hostname

  return {
    category: categoryMatch[1],
    source: typeof source === 'string' ? source : 'SYSTEM',
    direction: typeof direction === 'string' ? direction : null,
    level: typeof level === 'number' ? levelMap[level] ?? String(level) : String(level),
    msg: message.replace(CATEGORY_PATTERN, ''),
    time: new Date(typeof time === 'number' || typeof time === 'string' ? time : Date.now()),
    details,
  }
}

/**
 * Flush buffered logs to database in a single batch insert
 */
async function flushLogs() {
  if (logBuffer.length === 0) return

  const logsToInsert = logBuffer.splice(0, logBuffer.length)

  try {
    await db.insert(systemLogs).values(logsToInsert)
  } catch (err) {
    const errorMessage = err instanceof Error ? err.message : String(err)
    process.stderr.write(`Failed to batch insert logs: ${errorMessage}\n`)
  }
}

function startFlushTimer() {
  if (flushTimer) return
  flushTimer = setInterval(() => {
    void flushLogs()
  }, FLUSH_INTERVAL_MS)
  // Don't block process exit
  flushTimer.unref()
}

/**
 * Stop the flush timer and flush remaining logs
 */
export async function stopLogger() {
  if (flushTimer) {
    clearInterval(flushTimer)
    flushTimer = null
  }
  await flushLogs()
}

// ============================================================================
// Writable Stream for Fastify
// ============================================================================

export const dbLoggerStream = new Writable({
  write(chunk: Buffer, _encoding, callback) {
    const line = chunk.toString()

    // Keep the console output
    process.stdout.write(line)

    const entry = parseLogLine(line)
    if (entry) {
      logBuffer.push(entry)
      startFlushTimer()

      if (logBuffer.length >= MAX_BUFFER_SIZE) {
        void flushLogs()
      }
    }

    callback()
  },
})
