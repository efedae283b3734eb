import fastify from 'fastify'
import cors from '@fastify/cors'
import swagger from '@fastify/swagger'
import swaggerUi from '@fastify/swagger-ui'
import sensible from '@fastify/sensible'
import {
  serializerCompiler,
  validatorCompiler,
  ZodTypeProvider,
  jsonSchemaTransform,
} from 'fastify-type-provider-zod'

// Core
import { registry } from './core/registry'

// Plugins
import dbPlugin from './plugins/db'
import socketPlugin from './plugins/socket'
import mqttPlugin from './plugins/mqtt'
import garageDoorsPlugin from './plugins/garage-doors'
import logRetentionPlugin from './plugins/log-retention'
import logFlushPlugin from './plugins/log-flush'

import { dbLoggerStream } from './lib/logger'

// Routes
import garageDoorRoutes from './modules/garage-doors/routes'
import devicesRoutes from './modules/devices/routes'
import deviceTypesRoutes from './modules/device-types/routes'
import logsRoutes from './modules/logs/routes'

export async function buildApp() {
  const app = fastify({
    logger: {
      stream: dbLoggerStream,
      level: 'trace', // Allow all log levels to be processed
    },
    disableRequestLogging: true, // Disable automatic request logging (too verbose)
  }).withTypeProvider<ZodTypeProvider>()

  // Validation
  app.setValidatorCompiler(validatorCompiler)
  app.setSerializerCompiler(serializerCompiler)

  // Sensible (HTTP Errors)
  await app.register(sensible)

  // CORS
  await app.register(cors, {
    origin: '*',
    methods: ['GET', 'POST', 'PUT', 'DELETE'],
  })

  // Swagger
  await app.register(swagger, {
    openapi: {
      info: {
        title: 'Garage Door API',
        description: 'Garage doors built from sensor, relay and all-clear devices',
        version: '1.0.0',
      },
      servers: [],
    },
    transform: jsonSchemaTransform,
  })

  await app.register(swaggerUi, {
    routePrefix: '/documentation',
  })

  // Device type manifests (must be loaded before doors are validated)
  await registry.loadAll()

  // Core Plugins
  await app.register(dbPlugin)
  await app.register(logFlushPlugin)
  await app.register(logRetentionPlugin)
  await app.register(socketPlugin)
  await app.register(mqttPlugin)
  await app.register(garageDoorsPlugin)

  // Routes
  await app.register(garageDoorRoutes, { prefix: '/api' })
  await app.register(devicesRoutes, { prefix: '/api' })
  await app.register(deviceTypesRoutes, { prefix: '/api' })
  await app.register(logsRoutes, { prefix: '/api' })

  app.get('/health', async () => {
    return {
      status: 'ok',
      mqtt: app.mqtt.connected ? 'connected' : 'disconnected',
      doors: app.garageDoors.listDoors().length,
    }
  })

  return app
}
