#!/usr/bin/env node
/**
 * Print device traffic under the topic prefix in real time
 *
 * Usage: tsx scripts/monitor-bus.ts [deviceId]
 */

import { connect } from 'mqtt'
import { config } from '../src/config/env'
import { parseTopic, safeParseJson, subscriptionTopics } from '../src/modules/mqtt/service'

const deviceFilter = process.argv[2]
const prefix = config.mqtt.topicPrefix
const client = connect(config.mqtt.broker)

console.log('🔌 Connecting to MQTT broker:', config.mqtt.broker)

client.on('connect', () => {
    console.log('✅ Connected to MQTT broker')
    console.log(`📡 Subscribing to ${prefix}/+/...${deviceFilter ? ` (device ${deviceFilter})` : ''}\n`)

    client.subscribe(subscriptionTopics(prefix), err => {
        if (err) {
            console.error('❌ Subscription failed:', err.message)
            process.exit(1)
        }
        console.log('👂 Listening for messages...\n')
    })
})

client.on('message', (topic, message, packet) => {
    const parts = parseTopic(topic, prefix)
    if (!parts || (deviceFilter && parts.deviceId !== deviceFilter)) {
        return
    }

    const payload = message.toString()
    const json = safeParseJson(payload)

    console.log(`[${new Date().toISOString()}] ${parts.deviceId} ${parts.channel}${packet.retain ? ' (retained)' : ''}`)
    if (json !== null && typeof json === 'object') {
        console.log(JSON.stringify(json, null, 2))
    } else {
        console.log(payload)
    }
    console.log('─'.repeat(80))
})

client.on('error', err => {
    console.error('❌ MQTT Error:', err.message)
})

process.once('SIGINT', () => {
    client.end(() => process.exit(0))
})

console.log('Press Ctrl+C to stop\n')
