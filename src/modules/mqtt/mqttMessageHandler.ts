import type { FastifyBaseLogger } from 'fastify'
import type { DeviceState } from '../devices/types'
import type { GarageDoorManager } from '../garage-doors/doorManager'
import type { SocketEvent } from '../../types/mqtt'
import {
  parseCommandReply,
  parseDeviceLog,
  parseDoorCommand,
  parseStatusPayload,
  parseTopic,
  type TopicParts,
} from './service'

export interface MqttMessageHandlerDeps {
  log: Pick<FastifyBaseLogger, 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal'>
  topicPrefix: string
  doors: Pick<GarageDoorManager, 'handleDeviceStatus' | 'handleCommandReply' | 'requestCommand' | 'isKnownDoor'>
  /** Store a device state; returns true when it changed */
  recordDeviceState: (state: DeviceState) => boolean
  broadcast: (event: SocketEvent, data: unknown) => void
}

export class MqttMessageHandler {
  constructor(private deps: MqttMessageHandlerDeps) {}

  /**
   * Handle device status messages
   */
  private handleStatus(topic: string, payload: string, deviceId: string, now: Date): boolean {
    const parsed = parseStatusPayload(payload)
    if (!parsed) {
      this.deps.log.warn(`⚠️ [MQTT] Failed to parse status from ${topic}`)
      return false
    }

    const state: DeviceState = {
      deviceId,
      status: parsed.status,
      statusExtended: parsed.statusExtended,
      updatedAt: now,
    }

    const changed = this.deps.recordDeviceState(state)
    this.deps.doors.handleDeviceStatus(state)

    if (changed) {
      this.deps.log.debug({ msg: `[MQTT] ${deviceId} status: ${state.status}`, direction: 'IN', deviceId })
      this.deps.broadcast('device:status', state)
    }
    return true
  }

  /**
   * Handle commands addressed to a garage door. Commands to other devices are not ours.
   */
  private handleCommand(topic: string, payload: string, deviceId: string): boolean {
    if (!this.deps.doors.isKnownDoor(deviceId)) {
      return false
    }

    const parsed = parseDoorCommand(payload)
    if (!parsed) {
      this.deps.log.warn({ msg: `⚠️ [MQTT] Invalid garage door command on ${topic}`, direction: 'IN', doorId: deviceId })
      return false
    }

    this.deps.log.info({
      msg: `[MQTT] Garage door ${parsed.command} requested: ${deviceId}`,
      direction: 'IN',
      doorId: deviceId,
      correlationId: parsed.correlationId,
    })
    this.deps.doors.requestCommand(deviceId, parsed.command, {
      channel: 'mqtt',
      correlationId: parsed.correlationId,
    })
    return true
  }

  /**
   * Handle replies from control devices. Replies on door topics are our own.
   */
  private handleReply(topic: string, payload: string, deviceId: string): boolean {
    if (this.deps.doors.isKnownDoor(deviceId)) {
      return false
    }

    const reply = parseCommandReply(payload)
    if (!reply) {
      this.deps.log.warn(`⚠️ [MQTT] Failed to parse command reply from ${topic}`)
      return false
    }

    const matched = this.deps.doors.handleCommandReply(reply)
    if (!matched) {
      this.deps.log.trace(`[MQTT] Reply ${reply.requestId} does not belong to a pending door request`)
    }
    return matched
  }

  /**
   * Handle device log messages
   */
  private handleDeviceLog(topic: string, payload: string, deviceId: string): boolean {
    const entry = parseDeviceLog(payload)
    if (!entry) {
      this.deps.log.warn(`⚠️ [MQTT] Failed to parse device log from ${topic}`)
      return false
    }

    const logData = {
      msg: `[HARDWARE:${deviceId}] ${entry.msg}`,
      direction: 'IN',
      deviceId,
      deviceTime: entry.time,
      source: 'DEVICE',
    }

    // Use the appropriate Pino method based on the log level
    switch ((entry.level || 'info').toLowerCase()) {
      case 'trace':
        this.deps.log.trace(logData)
        break
      case 'debug':
        this.deps.log.debug(logData)
        break
      case 'warn':
        this.deps.log.warn(logData)
        break
      case 'error':
        this.deps.log.error(logData)
        break
      case 'fatal':
        this.deps.log.fatal(logData)
        break
      case 'info':
      default:
        this.deps.log.info(logData)
        break
    }
    return true
  }

  /**
   * Main handler for MQTT messages. Returns true when the message was used.
   */
  handleMessage(topic: string, message: Buffer): boolean {
    const parsed: TopicParts | null = parseTopic(topic, this.deps.topicPrefix)
    if (!parsed) {
      return false
    }

    const payload = message.toString()
    const { deviceId, channel } = parsed

    switch (channel) {
      case 'status':
        return this.handleStatus(topic, payload, deviceId, new Date())
      case 'cmd':
        return this.handleCommand(topic, payload, deviceId)
      case 'reply':
        return this.handleReply(topic, payload, deviceId)
      case 'logs':
        return this.handleDeviceLog(topic, payload, deviceId)
    }
  }
}
