export type DoorStatus = 'open' | 'closed' | 'unknown'

export type DoorCommand = 'open' | 'close'

export type DoorRequestStatus = 'new' | 'processing' | 'done' | 'failed'

export interface GarageDoorDefinition {
    id: string
    name: string
    inputDeviceId: string
    inputStateClosed: string
    inputStateOpen: string
    controlDeviceId: string
    controlDeviceType: string
    controlPulseStart: string
    controlPulseEnd: string
    controlPulseTime: number        // milliseconds
    allClearDeviceId: string | null
    enabled: boolean
}

export interface GarageDoor {
    definition: GarageDoorDefinition
    status: DoorStatus
    statusExtended: string | null
    updatedAt: Date | null
}

export type RequestOrigin =
    | { channel: 'api' }
    | { channel: 'mqtt'; correlationId: string }

export interface DoorRequest {
    id: string
    doorId: string
    command: DoorCommand
    status: DoorRequestStatus
    statusExtra: string | null
    origin: RequestOrigin
    createdAt: Date
    updatedAt: Date
}

/**
 * Reply from a control device about a command we forwarded
 */
export interface CommandReply {
    requestId: string
    status: 'processing' | 'failed' | 'done'
    statusExtra: string | null
}

export interface DoorTimings {
    processingDelayMs: number
    statusTimeoutMs: number
    requestTtlMs: number
}

export interface DoorEvents {
    onDoorStatusChanged(door: GarageDoor): void
    onRequestUpdated(request: DoorRequest): void
}
