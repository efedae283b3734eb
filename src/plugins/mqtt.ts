import fp from 'fastify-plugin'
import { connect, type IClientPublishOptions, type MqttClient } from 'mqtt'
import { config } from '../config/env'
import { FastifyInstance } from 'fastify'
import { DeviceRepository } from '../modules/devices/deviceRepository'
import { DeviceStateStore } from '../modules/devices/deviceStateStore'
import type { DeviceState } from '../modules/devices/types'
import { buildCommandPayload, buildTopic } from '../modules/mqtt/service'

declare module 'fastify' {
  interface FastifyInstance {
    mqtt: MqttClient
    deviceStates: DeviceStateStore
    recordDeviceState: (state: DeviceState) => boolean
    publishCommand: (deviceId: string, command: string, requestId: string) => boolean
    publishMessage: (topic: string, payload: string, options?: IClientPublishOptions) => boolean
  }
}

const COMMAND_SOURCE = 'garagedoor'

export default fp(async (fastify: FastifyInstance) => {
  const client = connect(config.mqtt.broker)
  const deviceRepo = new DeviceRepository(fastify.db)
  const store = new DeviceStateStore()

  // Warm the cache with the last persisted states
  try {
    const states = await deviceRepo.getAllStates()
    for (const state of states) {
      store.update(state)
    }
    fastify.log.info({ msg: `[DB] Loaded ${states.length} device states`, count: states.length })
  } catch (err) {
    const errorMessage = err instanceof Error ? err.message : 'Unknown error'
    fastify.log.error({ msg: '[DB] Failed to load device states', error: errorMessage })
  }

  // --- BUFFERING SYSTEM ---
  const statusBuffer: DeviceState[] = []
  const FLUSH_INTERVAL = 2500
  const MAX_BUFFER_SIZE = 50

  async function flushStatusUpdates() {
    if (statusBuffer.length === 0) return

    const batch = statusBuffer.splice(0, statusBuffer.length)

    try {
      await deviceRepo.upsertStates(batch)
      fastify.log.debug({ msg: `[DB] Saved ${batch.length} device states`, count: batch.length })
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : 'Unknown error'
      fastify.log.error({
        msg: `[DB] Device state upsert failed: ${errorMessage}`,
        error: errorMessage,
        count: batch.length,
      })
      // Put them back for the next flush
      statusBuffer.unshift(...batch)
    }
  }

  const flushTimer = setInterval(() => {
    void flushStatusUpdates()
  }, FLUSH_INTERVAL)

  client.on('connect', () => {
    fastify.log.info({ msg: '✓ [MQTT] Connected to broker', broker: config.mqtt.broker })
  })

  client.on('reconnect', () => {
    fastify.log.warn({ msg: '[MQTT] Reconnecting to broker', broker: config.mqtt.broker })
  })

  client.on('error', err => {
    fastify.log.error({
      msg: '[MQTT] Connection error',
      error: err.message,
      broker: config.mqtt.broker,
    })
  })

  fastify.decorate('mqtt', client)
  fastify.decorate('deviceStates', store)

  fastify.decorate('recordDeviceState', (state: DeviceState) => {
    const changed = store.update(state)
    if (changed) {
      statusBuffer.push(state)
      if (statusBuffer.length >= MAX_BUFFER_SIZE) {
        void flushStatusUpdates()
      }
    }
    return changed
  })

  fastify.decorate('publishMessage', (topic: string, payload: string, options: IClientPublishOptions = {}) => {
    if (!client.connected) {
      fastify.log.warn({ msg: `[MQTT] Not connected, dropping message for ${topic}`, direction: 'OUT', topic })
      return false
    }
    client.publish(topic, payload, options, err => {
      if (err) {
        fastify.log.error({ msg: `[MQTT] Publish to ${topic} failed`, direction: 'OUT', error: err.message })
      }
    })
    return true
  })

  fastify.decorate('publishCommand', (deviceId: string, command: string, requestId: string) => {
    const topic = buildTopic(config.mqtt.topicPrefix, deviceId, 'cmd')
    const sent = fastify.publishMessage(topic, buildCommandPayload(command, requestId, COMMAND_SOURCE), { qos: 1 })
    if (sent) {
      fastify.log.debug({
        msg: `[MQTT] Command '${command}' sent to ${deviceId}`,
        direction: 'OUT',
        deviceId,
        command,
        requestId,
      })
    }
    return sent
  })

  fastify.addHook('onClose', async () => {
    clearInterval(flushTimer)
    await flushStatusUpdates()
    await client.endAsync()
  })
})
