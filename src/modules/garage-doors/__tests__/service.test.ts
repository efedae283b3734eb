/**
 * Unit tests for Garage Door Service
 */
import { describe, it, expect } from 'vitest'
import {
    isAllClear,
    interpretInputState,
    targetStatusFor,
    isDoorCommand,
    validateDoorDefinition,
    buildDoorResponse,
} from '../service'
import type { DoorRequest, GarageDoorDefinition } from '../types'

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

const relayOnly = {
    isCommandSupported: (type: string, command: string) => type === 'relay' && ['on', 'off'].includes(command),
}

// ============================================================================
// isAllClear
// ============================================================================

describe('isAllClear', () => {
    it.each(['on', '1', 'high', 'ok', 'OK', ' High '])('should accept %j', value => {
        expect(isAllClear(value)).toBe(true)
    })

    it.each(['off', '0', 'low', 'blocked', ''])('should reject %j', value => {
        expect(isAllClear(value)).toBe(false)
    })

    it('should reject a missing status', () => {
        expect(isAllClear(null)).toBe(false)
        expect(isAllClear(undefined)).toBe(false)
    })
})

// ============================================================================
// interpretInputState
// ============================================================================

describe('interpretInputState', () => {
    it.each(['closed', 'low', '0', 'off', 'OFF'])('should read %j as closed', value => {
        expect(interpretInputState(value, definition)).toBe('closed')
    })

    it.each(['open', 'high', '1', 'on', 'Open'])('should read %j as open', value => {
        expect(interpretInputState(value, definition)).toBe('open')
    })

    it('should return unknown for anything else', () => {
        expect(interpretInputState('moving', definition)).toBe('unknown')
    })

    it('should let configured values win over the generic ones', () => {
        const inverted = { inputStateClosed: 'on', inputStateOpen: 'off' }

        expect(interpretInputState('on', inverted)).toBe('closed')
        expect(interpretInputState('off', inverted)).toBe('open')
        expect(interpretInputState('low', inverted)).toBe('closed')
    })
})

// ============================================================================
// Commands
// ============================================================================

describe('targetStatusFor', () => {
    it('should map commands to door statuses', () => {
        expect(targetStatusFor('open')).toBe('open')
        expect(targetStatusFor('close')).toBe('closed')
    })
})

describe('isDoorCommand', () => {
    it('should accept open and close only', () => {
        expect(isDoorCommand('open')).toBe(true)
        expect(isDoorCommand('close')).toBe(true)
        expect(isDoorCommand('closed')).toBe(false)
        expect(isDoorCommand('toggle')).toBe(false)
    })
})

// ============================================================================
// validateDoorDefinition
// ============================================================================

describe('validateDoorDefinition', () => {
    it('should accept a supported relay setup', () => {
        expect(validateDoorDefinition(definition, relayOnly)).toEqual({ valid: true })
    })

    it('should reject an unsupported pulse start', () => {
        expect(validateDoorDefinition({ ...definition, controlPulseStart: 'pulse' }, relayOnly)).toEqual({
            valid: false,
            reason: "Invalid control pulse start command 'pulse' for device type 'relay'",
        })
    })

    it('should reject an unsupported pulse end', () => {
        expect(validateDoorDefinition({ ...definition, controlPulseEnd: 'stop' }, relayOnly)).toEqual({
            valid: false,
            reason: "Invalid control pulse end command 'stop' for device type 'relay'",
        })
    })

    it('should reject an unknown control device type', () => {
        expect(validateDoorDefinition({ ...definition, controlDeviceType: 'dimmer' }, relayOnly)).toEqual({
            valid: false,
            reason: "Invalid control pulse start command 'on' for device type 'dimmer'",
        })
    })

    it('should reject a pulse time that is not a positive integer', () => {
        expect(validateDoorDefinition({ ...definition, controlPulseTime: 0 }, relayOnly)).toEqual({
            valid: false,
            reason: "Invalid control pulse time '0', expected a positive number of milliseconds",
        })
        expect(validateDoorDefinition({ ...definition, controlPulseTime: 2.5 }, relayOnly).valid).toBe(false)
    })
})

// ============================================================================
// buildDoorResponse
// ============================================================================

describe('buildDoorResponse', () => {
    it('should report a door that is not loaded', () => {
        expect(buildDoorResponse(definition, undefined, undefined)).toEqual({
            definition,
            loaded: false,
            status: 'unknown',
            statusExtended: null,
            updatedAt: null,
            pendingRequest: null,
        })
    })

    it('should merge live status and the pending request', () => {
        const updatedAt = new Date('2026-01-01T08:00:00.000Z')
        const pending: DoorRequest = {
            id: 'req-1',
            doorId: 'door1',
            command: 'open',
            status: 'processing',
            statusExtra: 'Command sent to garage door controller, pending results.',
            origin: { channel: 'api' },
            createdAt: updatedAt,
            updatedAt,
        }

        const response = buildDoorResponse(
            definition,
            { definition, status: 'closed', statusExtended: 'since 07:00', updatedAt },
            pending
        )

        expect(response).toEqual({
            definition,
            loaded: true,
            status: 'closed',
            statusExtended: 'since 07:00',
            updatedAt,
            pendingRequest: pending,
        })
    })
})
