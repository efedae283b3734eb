/**
 * Garage Door Service - Pure business logic for door state and gating
 *
 * No dependencies on Fastify, MQTT or database.
 */
import type { DeviceTypeRegistry } from '../../core/registry'
import type { DoorResponse } from '../../types/api'
import type { DoorCommand, DoorRequest, DoorStatus, GarageDoor, GarageDoorDefinition } from './types'

// ============================================================================
// Constants
// ============================================================================

export const ALL_CLEAR_VALUES = ['on', '1', 'high', 'ok'] as const

const CLOSED_VALUES = ['closed', 'low', '0', 'off'] as const
const OPEN_VALUES = ['open', 'high', '1', 'on'] as const

export const DOOR_COMMANDS: readonly DoorCommand[] = ['open', 'close']

// ============================================================================
// Pure Functions
// ============================================================================

function normalize(value: string): string {
    return value.trim().toLowerCase()
}

/**
 * Whether an all-clear device status permits operating the door
 *
 * @example
 * isAllClear('OK')  // => true
 * isAllClear('off') // => false
 */
export function isAllClear(value: string | null | undefined): boolean {
    if (value === null || value === undefined) return false
    return (ALL_CLEAR_VALUES as readonly string[]).includes(normalize(value))
}

/**
 * Map an input sensor value to a door status.
 * Configured values win over the generic ones.
 */
export function interpretInputState(
    value: string,
    definition: Pick<GarageDoorDefinition, 'inputStateClosed' | 'inputStateOpen'>
): DoorStatus {
    const v = normalize(value)

    if (v === normalize(definition.inputStateClosed)) return 'closed'
    if (v === normalize(definition.inputStateOpen)) return 'open'
    if ((CLOSED_VALUES as readonly string[]).includes(v)) return 'closed'
    if ((OPEN_VALUES as readonly string[]).includes(v)) return 'open'

    return 'unknown'
}

/**
 * Door status a command is meant to reach
 */
export function targetStatusFor(command: DoorCommand): DoorStatus {
    return command === 'open' ? 'open' : 'closed'
}

export function isDoorCommand(value: string): value is DoorCommand {
    return (DOOR_COMMANDS as readonly string[]).includes(value)
}

/**
 * Check a door definition before loading it
 */
export function validateDoorDefinition(
    definition: GarageDoorDefinition,
    registry: Pick<DeviceTypeRegistry, 'isCommandSupported'>
): { valid: true } | { valid: false; reason: string } {
    const { controlDeviceType, controlPulseStart, controlPulseEnd, controlPulseTime } = definition

    if (!registry.isCommandSupported(controlDeviceType, controlPulseStart)) {
        return {
            valid: false,
            reason: `Invalid control pulse start command '${controlPulseStart}' for device type '${controlDeviceType}'`,
        }
    }

    if (!registry.isCommandSupported(controlDeviceType, controlPulseEnd)) {
        return {
            valid: false,
            reason: `Invalid control pulse end command '${controlPulseEnd}' for device type '${controlDeviceType}'`,
        }
    }

    if (!Number.isInteger(controlPulseTime) || controlPulseTime <= 0) {
        return {
            valid: false,
            reason: `Invalid control pulse time '${controlPulseTime}', expected a positive number of milliseconds`,
        }
    }

    return { valid: true }
}

/**
 * Merge a stored definition with the live state of its door
 */
export function buildDoorResponse(
    definition: GarageDoorDefinition,
    door: GarageDoor | undefined,
    pendingRequest: DoorRequest | undefined
): DoorResponse {
    return {
        definition,
        loaded: door !== undefined,
        status: door?.status ?? 'unknown',
        statusExtended: door?.statusExtended ?? null,
        updatedAt: door?.updatedAt ?? null,
        pendingRequest: pendingRequest ?? null,
    }
}
