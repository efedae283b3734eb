/**
 * MQTT Service - Pure business logic extracted from MqttMessageHandler
 *
 * This module contains testable pure functions for MQTT message processing.
 * No dependencies on Fastify or other infrastructure.
 */
import { z } from 'zod'
import type { CommandReply, DoorCommand } from '../garage-doors/types'
import type { CommandPayload, DeviceLogPayload, ReplyPayload, StatusPayload, TopicChannel } from '../../types/mqtt'

// ============================================================================
// Types
// ============================================================================

export interface TopicParts {
    deviceId: string
    channel: TopicChannel
}

// ============================================================================
// Payload Schemas
// ============================================================================

const StatusValueSchema = z.union([z.string(), z.number(), z.boolean()]).transform(String)

const StatusObjectSchema = z.object({
    status: StatusValueSchema,
    statusExtended: StatusValueSchema.nullable().optional(),
})

const CommandReplySchema = z.object({
    requestId: z.string().min(1),
    status: z.enum(['processing', 'failed', 'done']),
    statusExtra: z.string().nullable().optional(),
})

const DoorCommandMessageSchema = z.object({
    requestId: z.string().min(1),
    command: z.enum(['open', 'close']),
})

const DeviceLogSchema = z.object({
    level: z.string().optional(),
    msg: z.string(),
    time: z.union([z.string(), z.number()]).optional(),
})

// ============================================================================
// Topics
// ============================================================================

const CHANNEL_SUFFIXES: Array<[string, TopicChannel]> = [
    ['cmd/reply', 'reply'],
    ['status', 'status'],
    ['cmd', 'cmd'],
    ['logs', 'logs'],
]

/**
 * Parse MQTT topic structure: <prefix>/<deviceId>/<channel>
 *
 * @returns Parsed topic parts or null if the topic is not ours
 *
 * @example
 * parseTopic('devices/garage-relay/cmd/reply', 'devices')
 * // => { deviceId: 'garage-relay', channel: 'reply' }
 */
export function parseTopic(topic: string, prefix: string): TopicParts | null {
    if (!topic.startsWith(`${prefix}/`)) {
        return null
    }

    const rest = topic.slice(prefix.length + 1)
    const slash = rest.indexOf('/')
    if (slash <= 0) {
        return null
    }

    const deviceId = rest.slice(0, slash)
    const suffix = rest.slice(slash + 1)
    const match = CHANNEL_SUFFIXES.find(([s]) => s === suffix)

    return match ? { deviceId, channel: match[1] } : null
}

export function buildTopic(prefix: string, deviceId: string, channel: TopicChannel): string {
    const suffix = channel === 'reply' ? 'cmd/reply' : channel
    return `${prefix}/${deviceId}/${suffix}`
}

/**
 * Subscriptions needed to follow every device under the prefix
 */
export function subscriptionTopics(prefix: string): string[] {
    return [`${prefix}/+/status`, `${prefix}/+/cmd`, `${prefix}/+/cmd/reply`, `${prefix}/+/logs`]
}

// ============================================================================
// Payloads
// ============================================================================

/**
 * Safely parse JSON payload
 */
export function safeParseJson(payload: string): unknown {
    try {
        return JSON.parse(payload)
    } catch {
        return null
    }
}

/**
 * Parse a device status. Accepts a JSON object or a bare value.
 *
 * @example
 * parseStatusPayload('{"status":"closed"}') // => { status: 'closed', statusExtended: null }
 * parseStatusPayload('off')                 // => { status: 'off', statusExtended: null }
 */
export function parseStatusPayload(payload: string): StatusPayload | null {
    const trimmed = payload.trim()
    if (trimmed === '') {
        return null
    }

    const json = safeParseJson(trimmed)
    const asObject = StatusObjectSchema.safeParse(json)
    if (asObject.success) {
        return {
            status: asObject.data.status,
            statusExtended: asObject.data.statusExtended ?? null,
        }
    }

    const asValue = StatusValueSchema.safeParse(json)
    if (asValue.success) {
        return { status: asValue.data, statusExtended: null }
    }

    // Not JSON at all: the raw text is the status
    if (json === null && trimmed !== 'null') {
        return { status: trimmed, statusExtended: null }
    }

    return null
}

export function parseCommandReply(payload: string): CommandReply | null {
    const result = CommandReplySchema.safeParse(safeParseJson(payload))
    if (!result.success) {
        return null
    }
    return {
        requestId: result.data.requestId,
        status: result.data.status,
        statusExtra: result.data.statusExtra ?? null,
    }
}

export function parseDoorCommand(payload: string): { command: DoorCommand; correlationId: string } | null {
    const result = DoorCommandMessageSchema.safeParse(safeParseJson(payload))
    if (!result.success) {
        return null
    }
    return { command: result.data.command, correlationId: result.data.requestId }
}

export function parseDeviceLog(payload: string): DeviceLogPayload | null {
    const result = DeviceLogSchema.safeParse(safeParseJson(payload))
    return result.success ? result.data : null
}

export function buildCommandPayload(command: string, requestId: string, source: string): string {
    const payload: CommandPayload = { requestId, command, source }
    return JSON.stringify(payload)
}

export function buildReplyPayload(requestId: string, status: string, statusExtra: string | null): string {
    const payload: ReplyPayload = { requestId, status, statusExtra }
    return JSON.stringify(payload)
}

export function buildStatusPayload(status: string, statusExtended: string | null): string {
    const payload: StatusPayload = { status, statusExtended }
    return JSON.stringify(payload)
}
