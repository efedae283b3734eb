import { FastifyPluginAsync } from 'fastify'
import { ZodTypeProvider } from 'fastify-type-provider-zod'
import { z } from 'zod'
import { registry } from '../../core/registry'
import { DeviceTypeManifestSchema } from '../../core/types/device-type'
import type { DeviceTypeListItem } from '../../types/api'

/**
 * Device type manifests: which commands each kind of device accepts
 */

const DeviceTypeParamsSchema = z.object({
  type: z.string(),
})

const DeviceTypeListSchema = z.array(
  z.object({
    id: z.string(),
    name: z.string(),
    version: z.string(),
    role: z.string(),
  })
)

const deviceTypesRoutes: FastifyPluginAsync = async fastify => {
  const app = fastify.withTypeProvider<ZodTypeProvider>()

  // GET /device-types - List all available device types
  app.get(
    '/device-types',
    {
      schema: {
        tags: ['Device Types'],
        summary: 'List all available device types',
        response: {
          200: DeviceTypeListSchema,
        },
      },
    },
    async () => {
      return registry.getAllManifests().map(
        (m): DeviceTypeListItem => ({
          id: m.id,
          name: m.name,
          version: m.version,
          role: m.role,
        })
      )
    }
  )

  // GET /device-types/:type/manifest - Full manifest of a device type
  app.get(
    '/device-types/:type/manifest',
    {
      schema: {
        tags: ['Device Types'],
        summary: 'Get the manifest of a device type',
        params: DeviceTypeParamsSchema,
        response: {
          200: DeviceTypeManifestSchema,
        },
      },
    },
    async request => {
      const { type } = request.params
      const manifest = registry.getManifest(type)

      if (!manifest) {
        throw fastify.httpErrors.notFound(`Device type '${type}' not found`)
      }

      return manifest
    }
  )
}

export default deviceTypesRoutes
