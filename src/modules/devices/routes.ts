import { FastifyPluginAsync } from 'fastify'
import { ZodTypeProvider } from 'fastify-type-provider-zod'
import { DeviceController } from './controller'
import { DeviceParamsSchema, DeviceStateSchema, DeviceListResponseSchema } from './schema'

const devicesRoutes: FastifyPluginAsync = async fastify => {
  const app = fastify.withTypeProvider<ZodTypeProvider>()
  const controller = new DeviceController(fastify)

  // GET /devices - Last known status of every device on the bus
  app.get(
    '/devices',
    {
      schema: {
        tags: ['Devices'],
        summary: 'List device states seen on the bus',
        response: {
          200: DeviceListResponseSchema,
        },
      },
    },
    controller.listDevices
  )

  // GET /devices/:id - One device state
  app.get(
    '/devices/:id',
    {
      schema: {
        tags: ['Devices'],
        summary: 'Get the last known status of a device',
        params: DeviceParamsSchema,
        response: {
          200: DeviceStateSchema,
        },
      },
    },
    controller.getDevice
  )
}

export default devicesRoutes
