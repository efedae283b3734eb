/**
 * Unit tests for DoorEventPublisher
 */
import { describe, it, expect, vi } from 'vitest'
import { DoorEventPublisher } from '../doorEventPublisher'
import type { DoorRequest, GarageDoor, GarageDoorDefinition, RequestOrigin } from '../types'

const NOW = new Date('2026-01-01T08:00:00.000Z')

const definition: GarageDoorDefinition = {
    id: 'door1',
    name: 'Main garage',
    inputDeviceId: 'sensor1',
    inputStateClosed: 'closed',
    inputStateOpen: 'open',
    controlDeviceId: 'relay1',
    controlDeviceType: 'relay',
    controlPulseStart: 'on',
    controlPulseEnd: 'off',
    controlPulseTime: 500,
    allClearDeviceId: null,
    enabled: true,
}

function request(overrides: Partial<DoorRequest> = {}): DoorRequest {
    const origin: RequestOrigin = { channel: 'mqtt', correlationId: 'abc' }
    return {
        id: 'req-1',
        doorId: 'door1',
        command: 'open',
        status: 'new',
        statusExtra: null,
        origin,
        createdAt: NOW,
        updatedAt: NOW,
        ...overrides,
    }
}

function setup(saveRequest: (request: DoorRequest) => Promise<unknown> = async () => undefined) {
    const emit = vi.fn()
    const publish = vi.fn(() => true)
    const save = vi.fn(saveRequest)
    const log = { error: vi.fn() }
    const publisher = new DoorEventPublisher({ emit, publish, saveRequest: save, log, topicPrefix: 'devices' })
    return { publisher, emit, publish, save, log }
}

const nextTick = () => new Promise<void>(resolve => setImmediate(resolve))

describe('DoorEventPublisher', () => {
    // ==========================================================================
    // Door status
    // ==========================================================================

    describe('onDoorStatusChanged', () => {
        it('should broadcast the door and publish its retained status', () => {
            const { publisher, emit, publish } = setup()
            const door: GarageDoor = { definition, status: 'open', statusExtended: null, updatedAt: NOW }

            publisher.onDoorStatusChanged(door)

            expect(emit).toHaveBeenCalledWith('door:status', {
                doorId: 'door1',
                name: 'Main garage',
                status: 'open',
                statusExtended: null,
                updatedAt: NOW,
            })
            expect(publish).toHaveBeenCalledWith(
                'devices/door1/status',
                '{"status":"open","statusExtended":null}',
                { retain: true, qos: 1 }
            )
        })
    })

    // ==========================================================================
    // Requests
    // ==========================================================================

    describe('onRequestUpdated', () => {
        it('should reply to a bus caller on the door reply topic', async () => {
            const { publisher, emit, publish } = setup()
            const done = request({ status: 'done', statusExtra: 'open' })

            publisher.onRequestUpdated(done)
            await publisher.drain()

            expect(emit).toHaveBeenCalledWith('door:request', done)
            expect(publish).toHaveBeenCalledWith(
                'devices/door1/cmd/reply',
                '{"requestId":"abc","status":"done","statusExtra":"open"}',
                { qos: 1 }
            )
        })

        it('should not publish a reply for an API caller', async () => {
            const { publisher, publish, save } = setup()

            publisher.onRequestUpdated(request({ origin: { channel: 'api' } }))
            await publisher.drain()

            expect(publish).not.toHaveBeenCalled()
            expect(save).toHaveBeenCalledTimes(1)
        })

        it('should save updates one after another', async () => {
            let release: () => void = () => undefined
            const firstSave = new Promise<void>(resolve => {
                release = resolve
            })
            const { publisher, save } = setup(saved => (saved.status === 'new' ? firstSave : Promise.resolve()))

            publisher.onRequestUpdated(request())
            publisher.onRequestUpdated(request({ status: 'done', statusExtra: 'open' }))
            await nextTick()

            expect(save.mock.calls.map(([saved]) => saved.status)).toEqual(['new'])

            release()
            await publisher.drain()

            expect(save.mock.calls.map(([saved]) => saved.status)).toEqual(['new', 'done'])
        })

        it('should log a failed save and keep saving later updates', async () => {
            const { publisher, save, log } = setup(async saved => {
                if (saved.status === 'new') throw new Error('connection lost')
            })

            publisher.onRequestUpdated(request())
            publisher.onRequestUpdated(request({ status: 'failed', statusExtra: 'Control device reported a failure.' }))
            await publisher.drain()

            expect(log.error).toHaveBeenCalledWith({
                msg: '[DB] Failed to save door request req-1',
                error: 'connection lost',
            })
            expect(save).toHaveBeenCalledTimes(2)
        })
    })
})
