import { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify'
import { z } from 'zod'
import { registry } from '../../core/registry'
import type { DeleteResponse, DoorResponse } from '../../types/api'
import { DoorRepository } from './doorRepository'
import {
  CommandBodySchema,
  CreateDoorSchema,
  DoorParamsSchema,
  RequestHistoryQuerySchema,
  RequestParamsSchema,
  UpdateDoorSchema,
} from './schema'
import { buildDoorResponse, validateDoorDefinition } from './service'
import type { GarageDoorDefinition } from './types'

type DoorParams = z.infer<typeof DoorParamsSchema>
type RequestParams = z.infer<typeof RequestParamsSchema>
type CreateDoorBody = z.infer<typeof CreateDoorSchema>
type UpdateDoorBody = z.infer<typeof UpdateDoorSchema>
type CommandBody = z.infer<typeof CommandBodySchema>
type RequestHistoryQuery = z.infer<typeof RequestHistoryQuerySchema>

export class DoorController {
  private doorRepo: DoorRepository

  constructor(private fastify: FastifyInstance) {
    this.doorRepo = new DoorRepository(fastify.db)
  }

  private toResponse(definition: GarageDoorDefinition): DoorResponse {
    const manager = this.fastify.garageDoors
    return buildDoorResponse(
      definition,
      manager.getDoor(definition.id),
      manager.getPendingRequest(definition.id)
    )
  }

  private assertValid(definition: GarageDoorDefinition): void {
    const validation = validateDoorDefinition(definition, registry)
    if (!validation.valid) {
      throw this.fastify.httpErrors.badRequest(validation.reason)
    }
  }

  listDoors = async () => {
    const definitions = await this.doorRepo.listDefinitions()
    return definitions.map(definition => this.toResponse(definition))
  }

  getDoor = async (req: FastifyRequest<{ Params: DoorParams }>) => {
    const definition = await this.doorRepo.getDefinition(req.params.id)
    if (!definition) {
      throw this.fastify.httpErrors.notFound(`Garage door '${req.params.id}' not found`)
    }
    return this.toResponse(definition)
  }

  createDoor = async (req: FastifyRequest<{ Body: CreateDoorBody }>, reply: FastifyReply) => {
    const body = req.body
    this.assertValid(body)

    if (await this.doorRepo.getDefinition(body.id)) {
      throw this.fastify.httpErrors.conflict(`Garage door '${body.id}' already exists`)
    }

    const definition = await this.doorRepo.createDefinition(body)
    await this.fastify.reloadDoors()

    this.fastify.log.info({ msg: `[API] Garage door created: ${definition.id}`, source: 'USER', doorId: definition.id })
    reply.code(201)
    return this.toResponse(definition)
  }

  updateDoor = async (req: FastifyRequest<{ Params: DoorParams; Body: UpdateDoorBody }>) => {
    const { id } = req.params
    const existing = await this.doorRepo.getDefinition(id)
    if (!existing) {
      throw this.fastify.httpErrors.notFound(`Garage door '${id}' not found`)
    }

    const merged: GarageDoorDefinition = { ...existing, ...req.body }
    this.assertValid(merged)

    const definition = await this.doorRepo.updateDefinition(id, req.body)
    if (!definition) {
      throw this.fastify.httpErrors.notFound(`Garage door '${id}' not found`)
    }
    await this.fastify.reloadDoors()

    this.fastify.log.info({ msg: `[API] Garage door updated: ${id}`, source: 'USER', doorId: id, changes: req.body })
    return this.toResponse(definition)
  }

  deleteDoor = async (req: FastifyRequest<{ Params: DoorParams }>) => {
    const { id } = req.params
    const deleted = await this.doorRepo.deleteDefinition(id)
    if (!deleted) {
      throw this.fastify.httpErrors.notFound(`Garage door '${id}' not found`)
    }
    await this.fastify.reloadDoors()

    this.fastify.log.info({ msg: `[API] Garage door deleted: ${id}`, source: 'USER', doorId: id })
    const response: DeleteResponse = { success: true, message: `Garage door ${id} deleted` }
    return response
  }

  sendCommand = async (req: FastifyRequest<{ Params: DoorParams; Body: CommandBody }>) => {
    const { id } = req.params
    const { command } = req.body

    const request = this.fastify.garageDoors.requestCommand(id, command, { channel: 'api' })
    if (!request) {
      throw this.fastify.httpErrors.notFound(`Garage door '${id}' not found`)
    }

    this.fastify.log.info({
      msg: `[API] Garage door ${command} requested: ${id} (${request.status})`,
      source: 'USER',
      doorId: id,
      requestId: request.id,
    })
    return request
  }

  getRequestHistory = async (req: FastifyRequest<{ Params: DoorParams; Querystring: RequestHistoryQuery }>) => {
    try {
      return await this.doorRepo.getRequests(req.params.id, req.query.limit)
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : 'Unknown error'
      this.fastify.log.error({ msg: `[DB] Failed to fetch request history`, doorId: req.params.id, error: errorMessage })
      throw this.fastify.httpErrors.internalServerError('Failed to fetch request history')
    }
  }

  getRequest = async (req: FastifyRequest<{ Params: RequestParams }>) => {
    const { requestId } = req.params
    const request = this.fastify.garageDoors.getRequest(requestId) ?? (await this.doorRepo.getRequest(requestId))
    if (!request) {
      throw this.fastify.httpErrors.notFound(`Request '${requestId}' not found`)
    }
    return request
  }
}

