import {
  ErrorSchema,
  LibrariesResponseSchema,
} from '@schemas/plex/scan.schema.js'
import { logRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsyncZodOpenApi } from 'fastify-zod-openapi'

const plugin: FastifyPluginAsyncZodOpenApi = async (fastify) => {
  fastify.get(
    '/libraries',
    {
      schema: {
        summary: 'List Plex libraries',
        operationId: 'listPlexLibraries',
        description: 'Live list of library sections on the Plex server',
        response: {
          200: LibrariesResponseSchema,
          503: ErrorSchema,
        },
        tags: ['Plex'],
      },
    },
    async (request, reply) => {
      try {
        const libraries = await fastify.plexServerService.listLibraries()
        return { libraries }
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to list Plex libraries',
        })
        return reply.serviceUnavailable('Unable to reach the Plex server')
      }
    },
  )
}

export default plugin
