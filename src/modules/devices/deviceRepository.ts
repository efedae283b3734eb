import { sql } from 'drizzle-orm'
import type { Database } from '../../db/client'
import * as schema from '../../db/schema'
import type { DeviceState } from './types'

export class DeviceRepository {
  constructor(private db: Database) {}

  async getAllStates(): Promise<DeviceState[]> {
    return this.db
      .select()
      .from(schema.deviceStatus)
      .orderBy(schema.deviceStatus.deviceId)
  }

  /**
   * Upsert a batch of device states, keeping only the latest per device
   */
  async upsertStates(states: DeviceState[]) {
    if (states.length === 0) return

    const latest = new Map<string, DeviceState>()
    for (const state of states) {
      latest.set(state.deviceId, state)
    }

    return this.db
      .insert(schema.deviceStatus)
      .values(Array.from(latest.values()))
      .onConflictDoUpdate({
        target: schema.deviceStatus.deviceId,
        set: {
          status: sql`excluded.status`,
          statusExtended: sql`excluded.status_extended`,
          updatedAt: sql`excluded.updated_at`,
        },
      })
  }
}
