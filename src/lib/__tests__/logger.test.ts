/**
 * Unit tests for the log line parser feeding system_logs
 */
import { describe, it, expect } from 'vitest'
import { parseLogLine } from '../logger'

describe('parseLogLine', () => {
    it('should split the category from the message', () => {
        const line = JSON.stringify({
            level: 30,
            time: 1767254400000,
            pid: 1234,
            hostname: 'garage-pi',
            msg: '[DOOR] Main garage is open',
            doorId: 'door1',
        })

        expect(parseLogLine(line)).toEqual({
            category: 'DOOR',
            source: 'SYSTEM',
            direction: null,
            level: 'info',
            msg: 'Main garage is open',
            time: new Date(1767254400000),
            details: { doorId: 'door1' },
        })
    })

    it('should read categories with a qualifier', () => {
        const line = JSON.stringify({
            level: 50,
            time: 1767254400000,
            msg: '[HARDWARE:relay1] coil open',
            source: 'DEVICE',
            direction: 'IN',
            deviceId: 'relay1',
        })

        expect(parseLogLine(line)).toMatchObject({
            category: 'HARDWARE',
            source: 'DEVICE',
            direction: 'IN',
            level: 'error',
            msg: 'coil open',
            details: { deviceId: 'relay1' },
        })
    })

    it('should skip lines without a category', () => {
        expect(parseLogLine(JSON.stringify({ level: 30, time: 1, msg: 'plain message' }))).toBeNull()
    })

    it('should skip request logs', () => {
        expect(parseLogLine(JSON.stringify({ level: 30, time: 1, msg: 'incoming request' }))).toBeNull()
    })

    it('should skip lines that are not JSON objects', () => {
        expect(parseLogLine('not json')).toBeNull()
        expect(parseLogLine('[1,2]')).toBeNull()
    })
})
