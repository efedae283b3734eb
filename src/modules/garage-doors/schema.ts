import { z } from 'zod'

// --- Shared ---
export const DoorParamsSchema = z.object({
  id: z.string(),
})

export const RequestParamsSchema = z.object({
  requestId: z.string(),
})

export const DoorCommandSchema = z.enum(['open', 'close'])

export const RequestOriginSchema = z.discriminatedUnion('channel', [
  z.object({ channel: z.literal('api') }),
  z.object({ channel: z.literal('mqtt'), correlationId: z.string() }),
])

// --- Definitions ---
const DoorDefinitionFields = {
  name: z.string().min(1, 'Name is required'),
  inputDeviceId: z.string().min(1),
  inputStateClosed: z.string().min(1).default('closed'),
  inputStateOpen: z.string().min(1).default('open'),
  controlDeviceId: z.string().min(1),
  controlDeviceType: z.string().min(1).default('relay'),
  controlPulseStart: z.string().min(1).default('on'),
  controlPulseEnd: z.string().min(1).default('off'),
  controlPulseTime: z.number().int().positive().default(500),
  allClearDeviceId: z.string().min(1).nullable().default(null),
  enabled: z.boolean().default(true),
}

export const CreateDoorSchema = z.object({
  id: z.string().regex(/^[a-zA-Z0-9_-]+$/, 'Door id may only contain letters, digits, _ and -'),
  ...DoorDefinitionFields,
})

export const UpdateDoorSchema = z.object({
  name: DoorDefinitionFields.name.optional(),
  inputDeviceId: z.string().min(1).optional(),
  inputStateClosed: z.string().min(1).optional(),
  inputStateOpen: z.string().min(1).optional(),
  controlDeviceId: z.string().min(1).optional(),
  controlDeviceType: z.string().min(1).optional(),
  controlPulseStart: z.string().min(1).optional(),
  controlPulseEnd: z.string().min(1).optional(),
  controlPulseTime: z.number().int().positive().optional(),
  allClearDeviceId: z.string().min(1).nullable().optional(),
  enabled: z.boolean().optional(),
})

const DoorDefinitionSchema = CreateDoorSchema.extend({
  allClearDeviceId: z.string().nullable(),
})

// --- Requests ---
export const CommandBodySchema = z.object({
  command: DoorCommandSchema,
})

export const DoorRequestSchema = z.object({
  id: z.string(),
  doorId: z.string(),
  command: DoorCommandSchema,
  status: z.enum(['new', 'processing', 'done', 'failed']),
  statusExtra: z.string().nullable(),
  origin: RequestOriginSchema,
  createdAt: z.date().or(z.string()),
  updatedAt: z.date().or(z.string()),
})

export const RequestHistoryQuerySchema = z.object({
  limit: z.string().default('20').transform(Number).pipe(z.number().int().min(1).max(500)),
})

export const RequestHistoryResponseSchema = z.array(DoorRequestSchema)

// --- Doors ---
export const DoorResponseSchema = z.object({
  definition: DoorDefinitionSchema,
  loaded: z.boolean(),
  status: z.enum(['open', 'closed', 'unknown']),
  statusExtended: z.string().nullable(),
  updatedAt: z.date().or(z.string()).nullable(),
  pendingRequest: DoorRequestSchema.nullable(),
})

export const DoorListResponseSchema = z.array(DoorResponseSchema)

export const DeleteResponseSchema = z.object({
  success: z.boolean(),
  message: z.string(),
})
