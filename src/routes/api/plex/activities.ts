import {
  ActivitiesResponseSchema,
  ErrorSchema,
} from '@schemas/plex/scan.schema.js'
import { logRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsyncZodOpenApi } from 'fastify-zod-openapi'

const plugin: FastifyPluginAsyncZodOpenApi = async (fastify) => {
  fastify.get(
    '/activities',
    {
      schema: {
        summary: 'List Plex server activities',
        operationId: 'listPlexActivities',
        description:
          'Background tasks running on the Plex server, such as library scans, with their progress',
        response: {
          200: ActivitiesResponseSchema,
          503: ErrorSchema,
        },
        tags: ['Plex'],
      },
    },
    async (request, reply) => {
      try {
        const activities = await fastify.plexServerService.getActivities()
        return { activities }
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to fetch Plex activities',
        })
        return reply.serviceUnavailable('Unable to reach the Plex server')
      }
    },
  )
}

export default plugin
