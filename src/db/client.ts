import { Pool } from 'pg'
import { drizzle, NodePgDatabase } from 'drizzle-orm/node-postgres'
import * as schema from './schema'
import { config } from '../config/env'

export type Database = NodePgDatabase<typeof schema>

export const pool = new Pool(config.db)
export const db: Database = drizzle(pool, { schema })
