import { desc, eq } from 'drizzle-orm'
import type { InferInsertModel, InferSelectModel } from 'drizzle-orm'
import type { Database } from '../../db/client'
import * as schema from '../../db/schema'
import { RequestOriginSchema } from './schema'
import { isDoorCommand } from './service'
import type { DoorRequest, DoorRequestStatus, GarageDoorDefinition } from './types'

type GarageDoorRow = InferSelectModel<typeof schema.garageDoors>
type DoorRequestRow = InferSelectModel<typeof schema.doorRequests>
export type NewGarageDoor = Omit<InferInsertModel<typeof schema.garageDoors>, 'createdAt' | 'updatedAt'>

const REQUEST_STATUSES: readonly DoorRequestStatus[] = ['new', 'processing', 'done', 'failed']

export function toDoorDefinition(row: GarageDoorRow): GarageDoorDefinition {
  return {
    id: row.id,
    name: row.name,
    inputDeviceId: row.inputDeviceId,
    inputStateClosed: row.inputStateClosed,
    inputStateOpen: row.inputStateOpen,
    controlDeviceId: row.controlDeviceId,
    controlDeviceType: row.controlDeviceType,
    controlPulseStart: row.controlPulseStart,
    controlPulseEnd: row.controlPulseEnd,
    controlPulseTime: row.controlPulseTime,
    allClearDeviceId: row.allClearDeviceId,
    enabled: row.enabled,
  }
}

/**
 * Rows written by older versions may hold values we no longer know; those are dropped
 */
export function toDoorRequest(row: DoorRequestRow): DoorRequest | null {
  const status = REQUEST_STATUSES.find(s => s === row.status)
  const origin = RequestOriginSchema.safeParse(row.origin)
  if (!status || !isDoorCommand(row.command) || !origin.success) {
    return null
  }

  return {
    id: row.id,
    doorId: row.doorId,
    command: row.command,
    status,
    statusExtra: row.statusExtra,
    origin: origin.data,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  }
}

export class DoorRepository {
  constructor(private db: Database) {}

  async listDefinitions(): Promise<GarageDoorDefinition[]> {
    const rows = await this.db.select().from(schema.garageDoors).orderBy(schema.garageDoors.id)
    return rows.map(toDoorDefinition)
  }

  async getDefinition(id: string): Promise<GarageDoorDefinition | null> {
    const result = await this.db
      .select()
      .from(schema.garageDoors)
      .where(eq(schema.garageDoors.id, id))

    return result[0] ? toDoorDefinition(result[0]) : null
  }

  async createDefinition(door: NewGarageDoor): Promise<GarageDoorDefinition> {
    const [row] = await this.db
      .insert(schema.garageDoors)
      .values({ ...door, createdAt: new Date(), updatedAt: new Date() })
      .returning()
    return toDoorDefinition(row)
  }

  async updateDefinition(id: string, changes: Partial<Omit<NewGarageDoor, 'id'>>): Promise<GarageDoorDefinition | null> {
    const result = await this.db
      .update(schema.garageDoors)
      .set({ ...changes, updatedAt: new Date() })
      .where(eq(schema.garageDoors.id, id))
      .returning()
    return result[0] ? toDoorDefinition(result[0]) : null
  }

  async deleteDefinition(id: string): Promise<boolean> {
    const result = await this.db
      .delete(schema.garageDoors)
      .where(eq(schema.garageDoors.id, id))
      .returning({ id: schema.garageDoors.id })
    return result.length > 0
  }

  async saveRequest(request: DoorRequest) {
    return this.db
      .insert(schema.doorRequests)
      .values(request)
      .onConflictDoUpdate({
        target: schema.doorRequests.id,
        set: {
          status: request.status,
          statusExtra: request.statusExtra,
          updatedAt: request.updatedAt,
        },
      })
  }

  async getRequests(doorId: string, limit: number): Promise<DoorRequest[]> {
    const rows = await this.db
      .select()
      .from(schema.doorRequests)
      .where(eq(schema.doorRequests.doorId, doorId))
      .orderBy(desc(schema.doorRequests.createdAt))
      .limit(limit)

    return rows.flatMap(row => toDoorRequest(row) ?? [])
  }

  async getRequest(id: string): Promise<DoorRequest | null> {
    const result = await this.db
      .select()
      .from(schema.doorRequests)
      .where(eq(schema.doorRequests.id, id))

    return result[0] ? toDoorRequest(result[0]) : null
  }
}
