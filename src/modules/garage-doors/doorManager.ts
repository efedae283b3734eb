import { randomUUID } from 'node:crypto'
import type { FastifyBaseLogger } from 'fastify'
import type { DeviceTypeRegistry } from '../../core/registry'
import type { DeviceGateway, DeviceState } from '../devices/types'
import { interpretInputState, isAllClear, targetStatusFor, validateDoorDefinition } from './service'
import type {
  CommandReply,
  DoorCommand,
  DoorEvents,
  DoorRequest,
  DoorRequestStatus,
  DoorTimings,
  GarageDoor,
  GarageDoorDefinition,
  RequestOrigin,
} from './types'

export type DoorLogger = Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn' | 'error'>

export interface GarageDoorManagerOptions {
  gateway: DeviceGateway
  registry: Pick<DeviceTypeRegistry, 'isCommandSupported'>
  events: DoorEvents
  log: DoorLogger
  timings?: Partial<DoorTimings>
  generateId?: () => string
}

export const DEFAULT_TIMINGS: DoorTimings = {
  processingDelayMs: 1050,
  statusTimeoutMs: 60_000,
  requestTtlMs: 20 * 60_000,
}

export const MESSAGES = {
  pending: 'A request for this device is currently pending. Try again later.',
  alreadyInState: 'No action was performed, garage is already in the requested state!',
  processing: 'Command sent to garage door controller, pending results.',
  controlFailed: 'Control device reported a failure.',
  removed: 'Garage door was removed.',
  stopped: 'Garage door module stopped.',
  expired: 'Request expired before the garage reported a status change.',
} as const

const MAX_RECENT_REQUESTS = 200

type Timer = ReturnType<typeof setTimeout>

interface PendingRequest {
  request: DoorRequest
  forwardedId: string   // id of the pulse end command, echoed by control device replies
  processingTimer: Timer | null
  statusTimer: Timer | null
  ttlTimer: Timer | null
}

interface ScheduledPulseEnd {
  timer: Timer
  send: () => void
}

/**
 * Drives garage doors from their input sensors and pulses their control relays.
 * At most one request per door is in flight.
 */
export class GarageDoorManager {
  private doors = new Map<string, GarageDoor>()
  private skipped = new Map<string, string>()   // door id -> reason it was not loaded
  private doorsByInput = new Map<string, string[]>()
  private pending = new Map<string, PendingRequest>()
  private forwarded = new Map<string, string>()
  private pulseEnds = new Map<string, ScheduledPulseEnd>()
  private requests = new Map<string, DoorRequest>()

  private readonly gateway: DeviceGateway
  private readonly registry: Pick<DeviceTypeRegistry, 'isCommandSupported'>
  private readonly events: DoorEvents
  private readonly log: DoorLogger
  private readonly timings: DoorTimings
  private readonly generateId: () => string

  constructor(options: GarageDoorManagerOptions) {
    this.gateway = options.gateway
    this.registry = options.registry
    this.events = options.events
    this.log = options.log
    this.timings = { ...DEFAULT_TIMINGS, ...options.timings }
    this.generateId = options.generateId ?? randomUUID
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Replace the set of managed doors. Invalid and disabled definitions are skipped.
   * Returns the number of doors loaded.
   */
  load(definitions: GarageDoorDefinition[]): number {
    const next = new Map<string, GarageDoor>()
    const skipped = new Map<string, string>()

    for (const definition of definitions) {
      if (!definition.enabled) {
        this.log.debug({ msg: `[DOOR] Skipping disabled garage door ${definition.id}`, doorId: definition.id })
        skipped.set(definition.id, 'disabled')
        continue
      }

      const validation = validateDoorDefinition(definition, this.registry)
      if (!validation.valid) {
        this.log.warn({ msg: `[DOOR] ${validation.reason}`, doorId: definition.id })
        skipped.set(definition.id, validation.reason)
        continue
      }

      const existing = this.doors.get(definition.id)
      const sameInput = existing?.definition.inputDeviceId === definition.inputDeviceId
      next.set(definition.id, {
        definition,
        status: existing && sameInput ? existing.status : 'unknown',
        statusExtended: existing && sameInput ? existing.statusExtended : null,
        updatedAt: existing && sameInput ? existing.updatedAt : null,
      })
    }

    for (const doorId of Array.from(this.pending.keys())) {
      if (!next.has(doorId)) {
        this.complete(doorId, 'failed', MESSAGES.removed)
      }
    }

    this.doors = next
    this.skipped = skipped
    this.doorsByInput.clear()
    for (const door of next.values()) {
      const ids = this.doorsByInput.get(door.definition.inputDeviceId) ?? []
      ids.push(door.definition.id)
      this.doorsByInput.set(door.definition.inputDeviceId, ids)
    }

    this.syncFromInputs()
    return next.size
  }

  /**
   * Align door status with the current input device status, without emitting events
   */
  start(): void {
    this.syncFromInputs()
    this.log.info({ msg: `[DOOR] Managing ${this.doors.size} garage door(s)`, doors: Array.from(this.doors.keys()) })
  }

  /**
   * Fail pending requests and release relays that are still mid-pulse
   */
  stop(): void {
    for (const doorId of Array.from(this.pending.keys())) {
      this.complete(doorId, 'failed', MESSAGES.stopped)
    }

    for (const [id, pulse] of this.pulseEnds) {
      clearTimeout(pulse.timer)
      this.pulseEnds.delete(id)
      pulse.send()
    }
  }

  private syncFromInputs(): void {
    for (const door of this.doors.values()) {
      const input = this.gateway.getStatus(door.definition.inputDeviceId)
      if (!input) continue
      door.status = interpretInputState(input.status, door.definition)
      door.statusExtended = input.statusExtended
      door.updatedAt = input.updatedAt
    }
  }

  // ==========================================================================
  // Bus events
  // ==========================================================================

  /**
   * Feed a device status. Returns true when the device is a door input.
   */
  handleDeviceStatus(state: DeviceState): boolean {
    const doorIds = this.doorsByInput.get(state.deviceId)
    if (!doorIds) return false

    for (const doorId of doorIds) {
      const door = this.doors.get(doorId)
      if (!door) continue

      const status = interpretInputState(state.status, door.definition)
      const moved = status !== door.status
      const changed = moved || state.statusExtended !== door.statusExtended

      door.status = status
      door.statusExtended = state.statusExtended
      door.updatedAt = state.updatedAt

      if (!changed) continue

      this.log.info({ msg: `[DOOR] ${door.definition.name} is ${status}`, doorId, input: state.status })
      this.events.onDoorStatusChanged(snapshotDoor(door))

      if (moved && this.pending.has(doorId)) {
        this.complete(doorId, 'done', status)
      }
    }

    return true
  }

  /**
   * Feed a control device reply. Returns true when it answers a command we forwarded.
   */
  handleCommandReply(reply: CommandReply): boolean {
    const doorId = this.forwarded.get(reply.requestId)
    if (!doorId) return false

    switch (reply.status) {
      case 'processing':
        this.markProcessing(doorId, reply.statusExtra ?? MESSAGES.processing)
        break
      case 'failed':
        this.complete(doorId, 'failed', reply.statusExtra ?? MESSAGES.controlFailed)
        break
      case 'done':
        // The input sensor decides when the door is done
        break
    }
    return true
  }

  // ==========================================================================
  // Commands
  // ==========================================================================

  /**
   * Ask a door to open or close. Returns null for an unknown door.
   * A door that is defined but was not loaded gets a failed request.
   */
  requestCommand(doorId: string, command: DoorCommand, origin: RequestOrigin): DoorRequest | null {
    const door = this.doors.get(doorId)
    if (!door) {
      const reason = this.skipped.get(doorId)
      if (reason === undefined) return null

      const statusExtra = `Garage door ${doorId} is not loaded: ${reason}`
      this.log.warn({ msg: `[DOOR] Rejected ${command} request: ${statusExtra}`, doorId })
      return this.settle(this.newRequest(doorId, command, origin), 'failed', statusExtra)
    }

    const request = this.newRequest(doorId, command, origin)

    if (this.pending.has(doorId)) {
      this.log.info({ msg: `[DOOR] ${door.definition.name} already has a pending request`, doorId })
      return this.settle(request, 'failed', MESSAGES.pending)
    }

    if (door.status === targetStatusFor(command)) {
      return this.settle(request, 'done', MESSAGES.alreadyInState)
    }

    const gate = this.checkAllClear(door.definition)
    if (gate !== null) {
      this.log.warn({ msg: `[DOOR] ${door.definition.name}: ${gate}`, doorId })
      return this.settle(request, 'failed', gate)
    }

    return this.pulse(door.definition, request)
  }

  private newRequest(doorId: string, command: DoorCommand, origin: RequestOrigin): DoorRequest {
    const now = new Date()
    return {
      id: this.generateId(),
      doorId,
      command,
      status: 'new',
      statusExtra: null,
      origin,
      createdAt: now,
      updatedAt: now,
    }
  }

  /**
   * Null when the door may move, otherwise the reason it may not
   */
  private checkAllClear(definition: GarageDoorDefinition): string | null {
    const deviceId = definition.allClearDeviceId
    if (!deviceId) return null

    const state = this.gateway.getStatus(deviceId)
    if (state && isAllClear(state.status)) return null

    const value = state ? `'${state.status}'` : 'no status'
    return `All clear check failed: ${deviceId} reports ${value}.`
  }

  private pulse(definition: GarageDoorDefinition, request: DoorRequest): DoorRequest {
    const { id: doorId, controlDeviceId, controlPulseStart, controlPulseEnd, controlPulseTime } = definition
    const forwardedId = this.generateId()

    const entry: PendingRequest = {
      request,
      forwardedId,
      processingTimer: null,
      statusTimer: null,
      ttlTimer: null,
    }
    this.pending.set(doorId, entry)
    this.forwarded.set(forwardedId, doorId)
    this.remember(request)
    this.events.onRequestUpdated({ ...request })

    if (!this.gateway.sendCommand(controlDeviceId, controlPulseStart, this.generateId())) {
      this.complete(doorId, 'failed', `Failed to send '${controlPulseStart}' to control device ${controlDeviceId}.`)
      return { ...request }
    }

    this.log.info({
      msg: `[DOOR] Pulsing ${controlDeviceId} for ${controlPulseTime}ms to ${request.command} ${definition.name}`,
      direction: 'OUT',
      doorId,
      requestId: request.id,
    })

    const sendPulseEnd = () => {
      if (!this.gateway.sendCommand(controlDeviceId, controlPulseEnd, forwardedId)) {
        this.log.error({
          msg: `[DOOR] Failed to send '${controlPulseEnd}' to control device ${controlDeviceId}`,
          doorId,
          requestId: request.id,
        })
      }
    }
    const pulseTimer = setTimeout(() => {
      this.pulseEnds.delete(forwardedId)
      sendPulseEnd()
    }, controlPulseTime)
    this.pulseEnds.set(forwardedId, { timer: pulseTimer, send: sendPulseEnd })

    entry.processingTimer = setTimeout(() => {
      entry.processingTimer = null
      this.markProcessing(doorId, MESSAGES.processing)
    }, this.timings.processingDelayMs)

    entry.ttlTimer = setTimeout(() => {
      entry.ttlTimer = null
      this.complete(doorId, 'failed', MESSAGES.expired)
    }, this.timings.requestTtlMs)

    return { ...request }
  }

  private markProcessing(doorId: string, statusExtra: string): void {
    const entry = this.pending.get(doorId)
    if (!entry) return

    if (entry.processingTimer) {
      clearTimeout(entry.processingTimer)
      entry.processingTimer = null
    }
    if (entry.statusTimer) {
      clearTimeout(entry.statusTimer)
    }

    this.update(entry.request, 'processing', statusExtra)

    entry.statusTimer = setTimeout(() => {
      entry.statusTimer = null
      this.complete(
        doorId,
        'failed',
        `${doorId} Command sent to garage door controller, however, garage never reported a status change.`
      )
    }, this.timings.statusTimeoutMs)
  }

  /**
   * Finish the pending request of a door. The scheduled pulse end is left alone.
   */
  private complete(doorId: string, status: 'done' | 'failed', statusExtra: string): void {
    const entry = this.pending.get(doorId)
    if (!entry) return

    for (const timer of [entry.processingTimer, entry.statusTimer, entry.ttlTimer]) {
      if (timer) clearTimeout(timer)
    }
    this.pending.delete(doorId)
    this.forwarded.delete(entry.forwardedId)

    this.update(entry.request, status, statusExtra)

    const logData = { msg: `[DOOR] Request ${entry.request.id} ${status}: ${statusExtra}`, doorId, requestId: entry.request.id }
    if (status === 'failed') {
      this.log.warn(logData)
    } else {
      this.log.info(logData)
    }
  }

  /**
   * Close a request that never became pending
   */
  private settle(request: DoorRequest, status: 'done' | 'failed', statusExtra: string): DoorRequest {
    request.status = status
    request.statusExtra = statusExtra
    this.remember(request)
    this.events.onRequestUpdated({ ...request })
    return { ...request }
  }

  private update(request: DoorRequest, status: DoorRequestStatus, statusExtra: string): void {
    request.status = status
    request.statusExtra = statusExtra
    request.updatedAt = new Date()
    this.remember(request)
    this.events.onRequestUpdated({ ...request })
  }

  private remember(request: DoorRequest): void {
    this.requests.delete(request.id)
    this.requests.set(request.id, request)

    if (this.requests.size > MAX_RECENT_REQUESTS) {
      const oldest = this.requests.keys().next()
      if (!oldest.done) this.requests.delete(oldest.value)
    }
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  getDoor(doorId: string): GarageDoor | undefined {
    const door = this.doors.get(doorId)
    return door ? snapshotDoor(door) : undefined
  }

  listDoors(): GarageDoor[] {
    return Array.from(this.doors.values()).map(snapshotDoor)
  }

  isDoor(deviceId: string): boolean {
    return this.doors.has(deviceId)
  }

  /**
   * True for loaded doors and for doors skipped at load because they are disabled or invalid
   */
  isKnownDoor(deviceId: string): boolean {
    return this.doors.has(deviceId) || this.skipped.has(deviceId)
  }

  getRequest(requestId: string): DoorRequest | undefined {
    const request = this.requests.get(requestId)
    return request ? { ...request } : undefined
  }

  getPendingRequest(doorId: string): DoorRequest | undefined {
    const entry = this.pending.get(doorId)
    return entry ? { ...entry.request } : undefined
  }
}

function snapshotDoor(door: GarageDoor): GarageDoor {
  return { ...door }
}
