/**
 * Unit tests for MqttMessageHandler routing
 */
import { beforeEach, describe, it, expect, vi } from 'vitest'
import { MqttMessageHandler } from '../mqttMessageHandler'
import type { DeviceState } from '../../devices/types'

function createHandler() {
    const log = { trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), fatal: vi.fn() }
    const doors = {
        handleDeviceStatus: vi.fn((_state: DeviceState) => true),
        handleCommandReply: vi.fn(() => true),
        requestCommand: vi.fn(() => null),
        isKnownDoor: vi.fn((deviceId: string) => deviceId === 'door1' || deviceId === 'door2'),
    }
    const recordDeviceState = vi.fn((_state: DeviceState) => true)
    const broadcast = vi.fn()

    const handler = new MqttMessageHandler({ log, topicPrefix: 'devices', doors, recordDeviceState, broadcast })
    return { handler, log, doors, recordDeviceState, broadcast }
}

const NOW = new Date('2026-01-01T08:00:00.000Z')

describe('MqttMessageHandler', () => {
    beforeEach(() => {
        vi.useFakeTimers()
        vi.setSystemTime(NOW)
        return () => {
            vi.useRealTimers()
        }
    })

    it('should ignore topics outside the prefix', () => {
        const { handler, recordDeviceState } = createHandler()

        expect(handler.handleMessage('other/sensor1/status', Buffer.from('open'))).toBe(false)
        expect(recordDeviceState).not.toHaveBeenCalled()
    })

    describe('status', () => {
        it('should record the state, feed the doors and broadcast a change', () => {
            const { handler, doors, recordDeviceState, broadcast } = createHandler()
            const expected: DeviceState = { deviceId: 'sensor1', status: 'open', statusExtended: null, updatedAt: NOW }

            expect(handler.handleMessage('devices/sensor1/status', Buffer.from('{"status":"open"}'))).toBe(true)

            expect(recordDeviceState).toHaveBeenCalledWith(expected)
            expect(doors.handleDeviceStatus).toHaveBeenCalledWith(expected)
            expect(broadcast).toHaveBeenCalledWith('device:status', expected)
        })

        it('should not broadcast an unchanged state', () => {
            const { handler, doors, recordDeviceState, broadcast } = createHandler()
            recordDeviceState.mockReturnValue(false)

            handler.handleMessage('devices/sensor1/status', Buffer.from('closed'))

            expect(doors.handleDeviceStatus).toHaveBeenCalledTimes(1)
            expect(broadcast).not.toHaveBeenCalled()
        })

        it('should warn about an unreadable status', () => {
            const { handler, log, recordDeviceState } = createHandler()

            expect(handler.handleMessage('devices/sensor1/status', Buffer.from(''))).toBe(false)
            expect(log.warn).toHaveBeenCalledWith('⚠️ [MQTT] Failed to parse status from devices/sensor1/status')
            expect(recordDeviceState).not.toHaveBeenCalled()
        })
    })

    describe('cmd', () => {
        it('should turn a door command into a door request', () => {
            const { handler, doors } = createHandler()

            const used = handler.handleMessage(
                'devices/door1/cmd',
                Buffer.from('{"requestId":"abc","command":"close","source":"panel"}')
            )

            expect(used).toBe(true)
            expect(doors.requestCommand).toHaveBeenCalledWith('door1', 'close', { channel: 'mqtt', correlationId: 'abc' })
        })

        it('should pass commands for a door that is not loaded to the doors', () => {
            const { handler, doors } = createHandler()

            const used = handler.handleMessage('devices/door2/cmd', Buffer.from('{"requestId":"xyz","command":"open"}'))

            expect(used).toBe(true)
            expect(doors.requestCommand).toHaveBeenCalledWith('door2', 'open', { channel: 'mqtt', correlationId: 'xyz' })
        })

        it('should leave commands to other devices alone', () => {
            const { handler, doors } = createHandler()

            expect(handler.handleMessage('devices/relay1/cmd', Buffer.from('{"requestId":"r1","command":"on"}'))).toBe(false)
            expect(doors.requestCommand).not.toHaveBeenCalled()
        })

        it('should warn about an invalid door command', () => {
            const { handler, log, doors } = createHandler()

            handler.handleMessage('devices/door1/cmd', Buffer.from('{"requestId":"abc","command":"toggle"}'))

            expect(log.warn).toHaveBeenCalledWith({
                msg: '⚠️ [MQTT] Invalid garage door command on devices/door1/cmd',
                direction: 'IN',
                doorId: 'door1',
            })
            expect(doors.requestCommand).not.toHaveBeenCalled()
        })
    })

    describe('reply', () => {
        it('should forward control device replies', () => {
            const { handler, doors } = createHandler()

            handler.handleMessage('devices/relay1/cmd/reply', Buffer.from('{"requestId":"fwd-1","status":"processing"}'))

            expect(doors.handleCommandReply).toHaveBeenCalledWith({
                requestId: 'fwd-1',
                status: 'processing',
                statusExtra: null,
            })
        })

        it('should skip replies published on door topics', () => {
            const { handler, doors } = createHandler()

            const used = handler.handleMessage(
                'devices/door1/cmd/reply',
                Buffer.from('{"requestId":"abc","status":"done","statusExtra":"open"}')
            )

            expect(used).toBe(false)
            expect(doors.handleCommandReply).not.toHaveBeenCalled()
        })
    })

    describe('logs', () => {
        it('should log device lines at their own level', () => {
            const { handler, log } = createHandler()

            handler.handleMessage('devices/relay1/logs', Buffer.from('{"level":"ERROR","msg":"coil open","time":42}'))

            expect(log.error).toHaveBeenCalledWith({
                msg: '[HARDWARE:relay1] coil open',
                direction: 'IN',
                deviceId: 'relay1',
                deviceTime: 42,
                source: 'DEVICE',
            })
        })

        it('should default to info', () => {
            const { handler, log } = createHandler()

            handler.handleMessage('devices/relay1/logs', Buffer.from('{"msg":"boot"}'))

            expect(log.info).toHaveBeenCalledWith({
                msg: '[HARDWARE:relay1] boot',
                direction: 'IN',
                deviceId: 'relay1',
                deviceTime: undefined,
                source: 'DEVICE',
            })
        })
    })
})
