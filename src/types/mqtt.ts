/**
 * MQTT message types
 * Topics: <prefix>/<deviceId>/<channel>
 */

export type TopicChannel = 'status' | 'cmd' | 'reply' | 'logs'

// Status reported by a device (<prefix>/<deviceId>/status)
export interface StatusPayload {
  status: string
  statusExtended: string | null
}

// Command sent to a device (<prefix>/<deviceId>/cmd)
export interface CommandPayload {
  requestId: string
  command: string
  source: string
}

// Reply published for an MQTT door request (<prefix>/<doorId>/cmd/reply)
export interface ReplyPayload {
  requestId: string
  status: string
  statusExtra: string | null
}

// Log line from a device (<prefix>/<deviceId>/logs)
export interface DeviceLogPayload {
  level?: string
  msg: string
  time?: string | number
}

// WebSocket broadcast events
export type SocketEvent = 'door:status' | 'door:request' | 'device:status'
