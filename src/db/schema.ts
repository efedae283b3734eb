import {
  pgTable,
  text,
  integer,
  timestamp,
  boolean,
  index,
  jsonb,
} from 'drizzle-orm/pg-core'
import crypto from 'node:crypto'

// --- Garage doors ---

export const garageDoors = pgTable('garage_doors', {
  id: text('id').primaryKey(),
  name: text('name').notNull(),
  inputDeviceId: text('input_device_id').notNull(),
  inputStateClosed: text('input_state_closed').notNull().default('closed'),
  inputStateOpen: text('input_state_open').notNull().default('open'),
  controlDeviceId: text('control_device_id').notNull(),
  controlDeviceType: text('control_device_type').notNull().default('relay'),
  controlPulseStart: text('control_pulse_start').notNull().default('on'),
  controlPulseEnd: text('control_pulse_end').notNull().default('off'),
  controlPulseTime: integer('control_pulse_time').notNull().default(500), // milliseconds
  allClearDeviceId: text('all_clear_device_id'),
  enabled: boolean('enabled').notNull().default(true),
  createdAt: timestamp('created_at').notNull().defaultNow(),
  updatedAt: timestamp('updated_at').notNull().defaultNow(),
})

export const doorRequests = pgTable(
  'door_requests',
  {
    id: text('id').primaryKey(),
    doorId: text('door_id').notNull(),
    command: text('command').notNull(),                  // open, close
    status: text('status').notNull(),                    // new, processing, done, failed
    statusExtra: text('status_extra'),
    origin: jsonb('origin').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull(),
  },
  table => {
    return {
      doorIdCreatedIdx: index('door_requests_door_id_created_idx').on(table.doorId, table.createdAt),
    }
  }
)

// --- Devices seen on the bus ---

export const deviceStatus = pgTable('device_status', {
  deviceId: text('device_id').primaryKey(),
  status: text('status').notNull(),
  statusExtended: text('status_extended'),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull(),
})

// --- Logs ---

export const systemLogs = pgTable(
  'system_logs',
  {
    id: text('id')
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    category: text('category').notNull(), // DOOR, MQTT, DB, API, HARDWARE, WEBSOCKET
    source: text('source').notNull().default('SYSTEM'), // SYSTEM, USER or DEVICE
    direction: text('direction'), // IN, OUT, or null
    level: text('level').notNull(),
    msg: text('msg').notNull(),
    time: timestamp('time').notNull(),
    details: jsonb('details'),
  },
  table => {
    return {
      timeIdx: index('system_logs_time_idx').on(table.time),
    }
  }
)
