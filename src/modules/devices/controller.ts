import { FastifyInstance, FastifyRequest } from 'fastify'
import { DeviceParamsSchema } from './schema'
import { z } from 'zod'

type DeviceParams = z.infer<typeof DeviceParamsSchema>

export class DeviceController {
  constructor(private fastify: FastifyInstance) {}

  listDevices = async () => {
    return this.fastify.deviceStates.list()
  }

  getDevice = async (req: FastifyRequest<{ Params: DeviceParams }>) => {
    const state = this.fastify.deviceStates.get(req.params.id)
    if (!state) {
      throw this.fastify.httpErrors.notFound(`Device '${req.params.id}' has not reported a status`)
    }
    return state
  }
}
