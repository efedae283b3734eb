import { z } from 'zod'

export const DeviceParamsSchema = z.object({
  id: z.string(),
})

export const DeviceStateSchema = z.object({
  deviceId: z.string(),
  status: z.string(),
  statusExtended: z.string().nullable(),
  updatedAt: z.date().or(z.string()),
})

export const DeviceListResponseSchema = z.array(DeviceStateSchema)
