import fp from 'fastify-plugin'
import { FastifyInstance } from 'fastify'
import { config } from '../config/env'
import { registry } from '../core/registry'
import { MqttDeviceGateway } from '../modules/devices/deviceStateStore'
import { DoorRepository } from '../modules/garage-doors/doorRepository'
import { GarageDoorManager } from '../modules/garage-doors/doorManager'
import { DoorEventPublisher } from '../modules/garage-doors/doorEventPublisher'
import { MqttMessageHandler } from '../modules/mqtt/mqttMessageHandler'
import { subscriptionTopics } from '../modules/mqtt/service'

declare module 'fastify' {
  interface FastifyInstance {
    garageDoors: GarageDoorManager
    reloadDoors: () => Promise<number>
  }
}

export default fp(async (fastify: FastifyInstance) => {
  const doorRepo = new DoorRepository(fastify.db)
  const prefix = config.mqtt.topicPrefix
  const publisher = new DoorEventPublisher({
    emit: (event, data) => {
      fastify.io.emit(event, data)
    },
    publish: fastify.publishMessage,
    saveRequest: request => doorRepo.saveRequest(request),
    log: fastify.log,
    topicPrefix: prefix,
  })

  const manager = new GarageDoorManager({
    gateway: new MqttDeviceGateway(fastify.deviceStates, fastify.publishCommand),
    registry,
    events: publisher,
    log: fastify.log,
    timings: config.doors,
  })

  async function reloadDoors(): Promise<number> {
    const definitions = await doorRepo.listDefinitions()
    const count = manager.load(definitions)
    fastify.log.info({
      msg: `[DOOR] Loaded ${count}/${definitions.length} garage doors`,
      loaded: count,
      total: definitions.length,
    })
    return count
  }

  await reloadDoors()
  manager.start()

  fastify.decorate('garageDoors', manager)
  fastify.decorate('reloadDoors', reloadDoors)

  const handler = new MqttMessageHandler({
    log: fastify.log,
    topicPrefix: prefix,
    doors: manager,
    recordDeviceState: fastify.recordDeviceState,
    broadcast: (event, data) => {
      fastify.io.emit(event, data)
    },
  })

  const client = fastify.mqtt
  client.on('message', (topic, message) => {
    try {
      handler.handleMessage(topic, message)
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : 'Unknown error'
      fastify.log.error({ msg: `[MQTT] Failed to handle message on ${topic}`, error: errorMessage })
    }
  })

  const topics = subscriptionTopics(prefix)
  const subscribe = () => {
    client.subscribe(topics, { qos: 1 }, err => {
      if (err) {
        fastify.log.error({ msg: '[MQTT] Subscription failed', error: err.message })
      } else {
        fastify.log.info({ msg: '✓ [MQTT] Subscribed to device topics', topics })
      }
    })
  }
  client.on('connect', subscribe)
  if (client.connected) {
    subscribe()
  }

  fastify.addHook('onClose', async () => {
    manager.stop()
    await publisher.drain()
  })
})
