import { FastifyPluginAsync } from 'fastify'
import { ZodTypeProvider } from 'fastify-type-provider-zod'
import { DoorController } from './controller'
import {
  CommandBodySchema,
  CreateDoorSchema,
  DeleteResponseSchema,
  DoorListResponseSchema,
  DoorParamsSchema,
  DoorRequestSchema,
  DoorResponseSchema,
  RequestHistoryQuerySchema,
  RequestHistoryResponseSchema,
  RequestParamsSchema,
  UpdateDoorSchema,
} from './schema'

const garageDoorRoutes: FastifyPluginAsync = async fastify => {
  const app = fastify.withTypeProvider<ZodTypeProvider>()
  const controller = new DoorController(fastify)

  // GET /doors - List all garage doors
  app.get(
    '/doors',
    {
      schema: {
        tags: ['Garage Doors'],
        summary: 'List garage doors with their current status',
        response: {
          200: DoorListResponseSchema,
        },
      },
    },
    controller.listDoors
  )

  // POST /doors - Create a garage door
  app.post(
    '/doors',
    {
      schema: {
        tags: ['Garage Doors'],
        summary: 'Create a garage door',
        body: CreateDoorSchema,
        response: {
          201: DoorResponseSchema,
        },
      },
    },
    controller.createDoor
  )

  // GET /doors/:id - Get one garage door
  app.get(
    '/doors/:id',
    {
      schema: {
        tags: ['Garage Doors'],
        summary: 'Get a garage door with its current status',
        params: DoorParamsSchema,
        response: {
          200: DoorResponseSchema,
        },
      },
    },
    controller.getDoor
  )

  // PUT /doors/:id - Update a garage door
  app.put(
    '/doors/:id',
    {
      schema: {
        tags: ['Garage Doors'],
        summary: 'Update a garage door definition',
        params: DoorParamsSchema,
        body: UpdateDoorSchema,
        response: {
          200: DoorResponseSchema,
        },
      },
    },
    controller.updateDoor
  )

  // DELETE /doors/:id - Delete a garage door
  app.delete(
    '/doors/:id',
    {
      schema: {
        tags: ['Garage Doors'],
        summary: 'Delete a garage door',
        params: DoorParamsSchema,
        response: {
          200: DeleteResponseSchema,
        },
      },
    },
    controller.deleteDoor
  )

  // POST /doors/:id/commands - Open or close a garage door
  app.post(
    '/doors/:id/commands',
    {
      schema: {
        tags: ['Garage Doors'],
        summary: 'Open or close a garage door',
        params: DoorParamsSchema,
        body: CommandBodySchema,
        response: {
          200: DoorRequestSchema,
        },
      },
    },
    controller.sendCommand
  )

  // GET /doors/:id/requests - Request history
  app.get(
    '/doors/:id/requests',
    {
      schema: {
        tags: ['Garage Doors'],
        summary: 'Get the request history of a garage door',
        params: DoorParamsSchema,
        querystring: RequestHistoryQuerySchema,
        response: {
          200: RequestHistoryResponseSchema,
        },
      },
    },
    controller.getRequestHistory
  )

  // GET /requests/:requestId - One request
  app.get(
    '/requests/:requestId',
    {
      schema: {
        tags: ['Garage Doors'],
        summary: 'Get a door request',
        params: RequestParamsSchema,
        response: {
          200: DoorRequestSchema,
        },
      },
    },
    controller.getRequest
  )
}

export default garageDoorRoutes
