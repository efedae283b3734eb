import type { FastifyBaseLogger } from 'fastify'
import type { IClientPublishOptions } from 'mqtt'
import type { DoorStatusEvent } from '../../types/api'
import type { SocketEvent } from '../../types/mqtt'
import { buildReplyPayload, buildStatusPayload, buildTopic } from '../mqtt/service'
import type { DoorEvents, DoorRequest, GarageDoor } from './types'

export interface DoorEventPublisherDeps {
  emit: (event: SocketEvent, data: unknown) => void
  publish: (topic: string, payload: string, options?: IClientPublishOptions) => boolean
  saveRequest: (request: DoorRequest) => Promise<unknown>
  log: Pick<FastifyBaseLogger, 'error'>
  topicPrefix: string
}

/**
 * Pushes door changes to browsers and the bus, and saves request updates
 */
export class DoorEventPublisher implements DoorEvents {
  private saveQueue: Promise<void> = Promise.resolve()

  constructor(private deps: DoorEventPublisherDeps) {}

  onDoorStatusChanged(door: GarageDoor): void {
    const event: DoorStatusEvent = {
      doorId: door.definition.id,
      name: door.definition.name,
      status: door.status,
      statusExtended: door.statusExtended,
      updatedAt: door.updatedAt,
    }
    this.deps.emit('door:status', event)
    this.deps.publish(
      buildTopic(this.deps.topicPrefix, door.definition.id, 'status'),
      buildStatusPayload(door.status, door.statusExtended),
      { retain: true, qos: 1 }
    )
  }

  onRequestUpdated(request: DoorRequest): void {
    this.deps.emit('door:request', request)

    // Saved in order: an earlier status must never overwrite a later one
    this.saveQueue = this.saveQueue
      .then(() => this.deps.saveRequest(request))
      .then(
        () => undefined,
        err => {
          const errorMessage = err instanceof Error ? err.message : 'Unknown error'
          this.deps.log.error({ msg: `[DB] Failed to save door request ${request.id}`, error: errorMessage })
        }
      )

    if (request.origin.channel === 'mqtt') {
      this.deps.publish(
        buildTopic(this.deps.topicPrefix, request.doorId, 'reply'),
        buildReplyPayload(request.origin.correlationId, request.status, request.statusExtra),
        { qos: 1 }
      )
    }
  }

  /**
   * Resolves once every queued save has settled
   */
  drain(): Promise<void> {
    return this.saveQueue
  }
}
